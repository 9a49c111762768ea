/**
 * Interactive map preview.
 *
 * One dispatcher task consumes a mailbox of tagged messages and owns all
 * state (viewport, style selection, frame). GetMap requests run as detached
 * promises that deliver a `fetched` message back to the mailbox; a result is
 * committed only if it still matches the current view, which is how stale
 * frames are dropped without cancelling the request.
 */

import type { DebugLogger } from '../infra/debug-log.js';
import { sanitizeForLog } from '../infra/log-sanitizer.js';
import { DEFAULT_PIXEL_SIZE, requestPixelSize, type PixelSize } from '../render/cell-grid.js';
import { protocolLabel, type ProtocolDetector } from '../render/protocol-detector.js';
import type { RenderedBy, RenderedFrame } from '../render/renderer.js';
import type {
  FetchRequest,
  FetchResult,
  ImageProtocol,
  LayerMetadata,
  LayerRef,
  PreviewStatus,
  ViewportSnapshot,
} from '../types/index.js';
import { StyleSelection } from '../viewport/style-selection.js';
import { sameBBox, Viewport, type ViewportOptions } from '../viewport/viewport.js';
import type { MapImageFetcher } from '../wms/get-map.js';
import { resolveKeyAction, type PreviewAction } from './keymap.js';
import { Mailbox } from './mailbox.js';
import { renderPreviewView, type PreviewViewModel } from './view.js';

/**
 * `redetect` re-runs capability detection; the terminal host sends it after
 * every resize, since a resize is also what a reattached multiplexer or a
 * moved window looks like.
 */
export type PreviewMessage =
  | { type: 'key'; key: string }
  | { type: 'metadata'; metadata: LayerMetadata }
  | { type: 'fetched'; request: FetchRequest; result: FetchResult }
  | { type: 'resize'; width: number; height: number }
  | { type: 'tick' }
  | { type: 'redetect' }
  | { type: 'close' };

export interface FrameRenderer {
  render(protocol: ImageProtocol, bytes: Uint8Array, width: number, height: number): RenderedFrame;
}

export interface MapPreviewDeps {
  fetcher: MapImageFetcher;
  detector: ProtocolDetector;
  renderer: FrameRenderer;
  log?: DebugLogger;
}

export interface MapPreviewOptions extends LayerRef {
  width?: number;
  height?: number;
  viewport?: ViewportOptions;
  styles?: readonly string[];
  mailboxCapacity?: number;
  onClose?: () => void;
}

const DEFAULT_WIDTH = 100;
const DEFAULT_HEIGHT = 40;

export class MapPreview {
  readonly workspace: string;
  readonly layer: string;

  private viewport: Viewport;
  private styles: StyleSelection;
  private mailbox: Mailbox<PreviewMessage>;
  private fetcher: MapImageFetcher;
  private detector: ProtocolDetector;
  private renderer: FrameRenderer;
  private log: DebugLogger;
  private onClose?: () => void;
  private updateListeners = new Set<() => void>();

  private statusValue: PreviewStatus = 'loading';
  private protocolValue: ImageProtocol;
  private width: number;
  private height: number;
  private pixelSize: PixelSize = DEFAULT_PIXEL_SIZE;
  private frameValue = '';
  private renderedByValue: RenderedBy | undefined;
  private errorValue = '';
  private imageBytes: Uint8Array | undefined;
  private spinnerIndex = 0;

  private seq = 0;
  private committedSeq = 0;
  private inFlight = new Set<Promise<void>>();

  constructor(options: MapPreviewOptions, deps: MapPreviewDeps) {
    this.workspace = options.workspace;
    this.layer = options.layer;
    this.viewport = new Viewport(options.viewport);
    this.styles = new StyleSelection(options.styles);
    this.mailbox = new Mailbox<PreviewMessage>(options.mailboxCapacity);
    this.fetcher = deps.fetcher;
    this.detector = deps.detector;
    this.renderer = deps.renderer;
    this.log = deps.log ?? (() => {});
    this.onClose = options.onClose;
    this.protocolValue = this.detector.detect();
    this.width = options.width ?? DEFAULT_WIDTH;
    this.height = options.height ?? DEFAULT_HEIGHT;
    if (options.width !== undefined && options.height !== undefined) {
      this.pixelSize = requestPixelSize(options.width, options.height);
    }
  }

  get status(): PreviewStatus {
    return this.statusValue;
  }

  get frame(): string {
    return this.frameValue;
  }

  get renderedBy(): RenderedBy | undefined {
    return this.renderedByValue;
  }

  get errorMessage(): string {
    return this.errorValue;
  }

  get protocol(): ImageProtocol {
    return this.protocolValue;
  }

  get currentStyle(): string {
    return this.styles.current();
  }

  get pendingFetches(): number {
    return this.inFlight.size;
  }

  viewportSnapshot(): ViewportSnapshot {
    return this.viewport.snapshot();
  }

  /** Queue operator input. Returns false if the input was dropped. */
  post(message: PreviewMessage): boolean {
    return this.mailbox.offer(message);
  }

  /** Dispatch loop; resolves once the preview is closed. */
  async run(): Promise<void> {
    for (;;) {
      const message = await this.mailbox.take();
      if (!message) return;
      this.dispatch(message);
      if (this.statusValue === 'closed') return;
    }
  }

  /** Resolves when every fetch issued so far has delivered its result. */
  async settled(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all(this.inFlight);
    }
  }

  dispatch(message: PreviewMessage): void {
    if (this.statusValue === 'closed') return;

    switch (message.type) {
      case 'key': {
        const action = resolveKeyAction(message.key);
        if (!action) return;
        this.applyAction(action);
        break;
      }
      case 'metadata':
        this.applyMetadata(message.metadata);
        break;
      case 'fetched':
        this.applyFetchResult(message.request, message.result);
        break;
      case 'resize':
        this.resize(message.width, message.height);
        break;
      case 'tick':
        if (this.statusValue !== 'loading') return;
        this.spinnerIndex += 1;
        break;
      case 'redetect':
        this.redetectProtocol();
        break;
      case 'close':
        this.close();
        break;
    }
    for (const listener of this.updateListeners) {
      listener();
    }
  }

  /** Listener runs after every dispatched message; the host redraws there. */
  registerUpdateListener(listener: () => void): () => void {
    this.updateListeners.add(listener);
    return () => {
      this.updateListeners.delete(listener);
    };
  }

  view(): string {
    return renderPreviewView(this.viewModel());
  }

  viewModel(): PreviewViewModel {
    return {
      workspace: this.workspace,
      layer: this.layer,
      status: this.statusValue,
      zoom: this.viewport.zoom,
      styleLabel: this.styles.label(),
      protocolLabel: protocolLabel(this.protocolValue),
      errorMessage: this.errorValue,
      frame: this.frameValue,
      spinnerIndex: this.spinnerIndex,
    };
  }

  private applyAction(action: PreviewAction): void {
    switch (action) {
      case 'close':
        this.close();
        return;
      case 'zoom-in':
        this.viewport.zoomIn();
        break;
      case 'zoom-out':
        this.viewport.zoomOut();
        break;
      case 'pan-up':
        this.viewport.panUp();
        break;
      case 'pan-down':
        this.viewport.panDown();
        break;
      case 'pan-left':
        this.viewport.panLeft();
        break;
      case 'pan-right':
        this.viewport.panRight();
        break;
      case 'refresh':
        break;
      case 'next-style':
        this.styles.next();
        break;
      case 'prev-style':
        this.styles.prev();
        break;
    }
    this.issueFetch();
  }

  private applyMetadata(metadata: LayerMetadata): void {
    if (metadata.bounds) {
      const [minX, minY, maxX, maxY] = metadata.bounds;
      this.viewport.setBounds(minX, minY, maxX, maxY);
    }
    if (metadata.styles.length > 0) {
      this.styles.setStyles(metadata.styles);
    }
    this.issueFetch();
  }

  private issueFetch(): void {
    this.seq += 1;
    const request: FetchRequest = {
      seq: this.seq,
      workspace: this.workspace,
      layer: this.layer,
      style: this.styles.current(),
      pixelWidth: this.pixelSize.width,
      pixelHeight: this.pixelSize.height,
      bbox: this.viewport.bbox,
    };
    this.statusValue = 'loading';
    this.frameValue = '';
    this.renderedByValue = undefined;
    this.errorValue = '';

    this.log(`fetch #${request.seq} style=${request.style || 'default'} bbox=${request.bbox.join(',')}`);

    const pending: Promise<void> = this.fetcher
      .fetch(request)
      .catch((error: unknown): FetchResult => ({
        ok: false,
        error: error instanceof Error ? error.message : String(error),
      }))
      .then((result) => {
        this.inFlight.delete(pending);
        this.mailbox.deliver({ type: 'fetched', request, result });
      });
    this.inFlight.add(pending);
  }

  private isCurrent(request: FetchRequest): boolean {
    return sameBBox(request.bbox, this.viewport.bbox) && request.style === this.styles.current();
  }

  private applyFetchResult(request: FetchRequest, result: FetchResult): void {
    if (!this.isCurrent(request) || request.seq < this.committedSeq) {
      this.log(`fetch #${request.seq} stale; discarded`);
      return;
    }
    this.committedSeq = request.seq;

    if (!result.ok) {
      this.log(`fetch #${request.seq} failed: ${result.error}`);
      this.statusValue = 'error';
      this.errorValue = sanitizeForLog(result.error);
      this.imageBytes = undefined;
      this.frameValue = '';
      this.renderedByValue = undefined;
      return;
    }

    this.imageBytes = result.bytes;
    this.renderCurrentImage();
    this.statusValue = 'ready';
    this.errorValue = '';
  }

  private renderCurrentImage(): void {
    if (!this.imageBytes) return;
    const rendered = this.renderer.render(this.protocolValue, this.imageBytes, this.width, this.height);
    for (const failure of rendered.failures) {
      this.log(`render fallback: ${failure}`);
    }
    this.frameValue = rendered.text;
    this.renderedByValue = rendered.renderedBy;
  }

  private resize(width: number, height: number): void {
    this.width = width;
    this.height = height;
    this.pixelSize = requestPixelSize(width, height);
    if (this.statusValue === 'ready') this.renderCurrentImage();
  }

  /** Re-run capability detection and redraw the held image with the result. */
  private redetectProtocol(): void {
    this.protocolValue = this.detector.detect();
    this.log(`image protocol: ${this.protocolValue}`);
    if (this.statusValue === 'ready') this.renderCurrentImage();
  }

  private close(): void {
    this.statusValue = 'closed';
    this.frameValue = '';
    this.imageBytes = undefined;
    this.mailbox.close();
    this.onClose?.();
  }
}
