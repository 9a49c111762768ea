import chalk from 'chalk';
import {
  DEFAULT_FETCH_TIMEOUT_MS,
  DEFAULT_HELPER_TIMEOUT_MS,
  getEnvInt,
  loadConfig,
  resolveConnection,
} from '../../config/index.js';
import { createDebugLogger, type DebugLogger } from '../../infra/debug-log.js';
import { sanitizeForLog } from '../../infra/log-sanitizer.js';
import { MapPreview } from '../../preview/map-preview.js';
import { SpawnHelperRunner } from '../../render/helper-runner.js';
import {
  EnvironmentProtocolDetector,
  FixedProtocolDetector,
  type ProtocolDetector,
} from '../../render/protocol-detector.js';
import { ImageRenderer } from '../../render/renderer.js';
import type { LayerRef } from '../../types/index.js';
import { WmsMapFetcher } from '../../wms/get-map.js';
import { RestLayerMetadataSource, type LayerMetadataSource } from '../../wms/layer-metadata.js';
import type { PreviewCliOptions } from '../common/preview-args.js';
import { runTerminalSession } from '../common/terminal-session.js';

/**
 * Feed the preview its initial metadata. Without bounds or styles from the
 * server it still starts, on the world extent with the default style.
 */
export async function loadInitialMetadata(
  preview: MapPreview,
  source: LayerMetadataSource,
  ref: LayerRef,
  options: Pick<PreviewCliOptions, 'bbox' | 'styles'>,
  log: DebugLogger,
  signal?: AbortSignal,
): Promise<void> {
  let styles = options.styles ?? [];
  let bounds = options.bbox;

  if (!bounds || styles.length === 0) {
    try {
      const metadata = await source.load(ref, signal);
      if (styles.length === 0) styles = metadata.styles;
      bounds = bounds ?? metadata.bounds;
    } catch (error) {
      log(`layer metadata unavailable: ${error instanceof Error ? error.message : String(error)}`);
    }
  }

  if (!preview.post({ type: 'metadata', metadata: bounds ? { styles, bounds } : { styles } })) {
    log('layer metadata arrived after the preview closed; ignored');
  }
}

export async function previewCommand(options: PreviewCliOptions): Promise<void> {
  const { stdin, stdout } = process;
  if (!stdin.isTTY || !stdout.isTTY) {
    throw new Error('geopeek needs an interactive terminal (stdin and stdout must be a TTY)');
  }

  const connection = resolveConnection(loadConfig(), options);
  const log = createDebugLogger();
  const ref: LayerRef = { workspace: options.workspace, layer: options.layer };

  const detector: ProtocolDetector = options.protocol
    ? new FixedProtocolDetector(options.protocol)
    : new EnvironmentProtocolDetector();
  const fetcher = new WmsMapFetcher(connection, {
    timeoutMs: getEnvInt('GEOPEEK_FETCH_TIMEOUT_MS', DEFAULT_FETCH_TIMEOUT_MS),
  });
  const renderer = new ImageRenderer(
    new SpawnHelperRunner(getEnvInt('GEOPEEK_HELPER_TIMEOUT_MS', DEFAULT_HELPER_TIMEOUT_MS)),
  );
  const metadataSource = new RestLayerMetadataSource(connection);

  const metadataAbort = new AbortController();
  const preview = new MapPreview(
    {
      ...ref,
      width: stdout.columns,
      height: stdout.rows,
      onClose: () => metadataAbort.abort(),
    },
    { fetcher, detector, renderer, log },
  );

  log(`preview ${ref.workspace}:${ref.layer} on ${connection.url} (protocol ${preview.protocol})`);

  const session = runTerminalSession(preview, { stdin, stdout });
  const metadataLoad = loadInitialMetadata(preview, metadataSource, ref, options, log, metadataAbort.signal);
  await session;
  await metadataLoad;

  if (preview.errorMessage) {
    console.log(chalk.gray(`Last error: ${sanitizeForLog(preview.errorMessage)}`));
  }
}
