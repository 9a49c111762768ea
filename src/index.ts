/**
 * Main entry point for geopeek as a library: embed a MapPreview in another
 * terminal program, or reuse the fetcher and renderer on their own.
 */

export type {
  BBox,
  FetchRequest,
  FetchResult,
  ImageProtocol,
  LayerMetadata,
  LayerRef,
  PreviewStatus,
  ServerConnection,
  ServerCredentials,
  ViewportSnapshot,
} from './types/index.js';
export { WORLD_BBOX } from './types/index.js';

export { Viewport, recomputeBBox, sameBBox, type ViewportOptions } from './viewport/viewport.js';
export { StyleSelection } from './viewport/style-selection.js';

export {
  loadConfig,
  parseConfig,
  resolveConnection,
  type ConnectionOverrides,
  type ConnectionProfile,
  type GeopeekConfig,
} from './config/index.js';
export { createDebugLogger, type DebugLogger } from './infra/debug-log.js';

export { WmsMapFetcher, buildGetMapUrl, type MapImageFetcher } from './wms/get-map.js';
export { RestLayerMetadataSource, type LayerMetadataSource } from './wms/layer-metadata.js';

export {
  EnvironmentProtocolDetector,
  FixedProtocolDetector,
  type ProtocolDetector,
} from './render/protocol-detector.js';
export { SpawnHelperRunner, type HelperRunner, type HelperRunResult } from './render/helper-runner.js';
export { ImageRenderer, fallbackChain, type RenderedBy, type RenderedFrame } from './render/renderer.js';
export { renderAscii } from './render/ascii.js';

export {
  MapPreview,
  type FrameRenderer,
  type MapPreviewDeps,
  type MapPreviewOptions,
  type PreviewMessage,
} from './preview/map-preview.js';
export { PREVIEW_KEYMAP, type PreviewAction } from './preview/keymap.js';
export { runTerminalSession } from './cli/common/terminal-session.js';
