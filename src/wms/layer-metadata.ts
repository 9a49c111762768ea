/**
 * Layer metadata (style names, geographic extent) from the server's REST API.
 */

import { DEFAULT_FETCH_TIMEOUT_MS } from '../config/index.js';
import { truncateContent } from '../infra/log-sanitizer.js';
import type { BBox, LayerMetadata, LayerRef, ServerConnection } from '../types/index.js';
import { basicAuthHeader, trimBaseUrl, type FetchFn } from './get-map.js';

export interface LayerMetadataSource {
  load(ref: LayerRef, signal?: AbortSignal): Promise<LayerMetadata>;
}

export type RestMetadataOptions = {
  timeoutMs?: number;
  fetchImpl?: FetchFn;
};

/** Aborts on the request timeout or when the caller gives up, whichever is first. */
function requestSignal(timeoutMs: number, signal?: AbortSignal): AbortSignal {
  const timeout = AbortSignal.timeout(timeoutMs);
  if (!signal) return timeout;

  const controller = new AbortController();
  const forward = (source: AbortSignal) => () => controller.abort(source.reason);
  if (signal.aborted) {
    controller.abort(signal.reason);
    return controller.signal;
  }
  signal.addEventListener('abort', forward(signal), { once: true });
  timeout.addEventListener('abort', forward(timeout), { once: true });
  return controller.signal;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function child(value: unknown, key: string): unknown {
  return isRecord(value) ? value[key] : undefined;
}

function nameOf(value: unknown): string | undefined {
  const name = child(value, 'name');
  return typeof name === 'string' && name.length > 0 ? name : undefined;
}

/**
 * Style names for a layer document, default style first.
 * `styles.style` is an object when the layer has a single extra style.
 */
export function parseLayerStyles(doc: unknown): string[] {
  const layer = child(doc, 'layer');
  const names: string[] = [];
  const defaultStyle = nameOf(child(layer, 'defaultStyle'));
  if (defaultStyle) names.push(defaultStyle);

  const extra = child(child(layer, 'styles'), 'style');
  const entries = Array.isArray(extra) ? extra : extra === undefined ? [] : [extra];
  for (const entry of entries) {
    const name = nameOf(entry);
    if (name && !names.includes(name)) names.push(name);
  }
  return names;
}

export function parseResourceHref(doc: unknown): string | undefined {
  const href = child(child(child(doc, 'layer'), 'resource'), 'href');
  return typeof href === 'string' && href.length > 0 ? href : undefined;
}

/** latLonBoundingBox of a featureType or coverage document. */
export function parseLatLonBounds(doc: unknown): BBox | undefined {
  const resource = child(doc, 'featureType') ?? child(doc, 'coverage');
  const box = child(resource, 'latLonBoundingBox');
  const values = ['minx', 'miny', 'maxx', 'maxy'].map((key) => child(box, key));
  const numbers = values.map((value) => (typeof value === 'number' ? value : Number(value)));
  if (values.some((value) => value === undefined) || numbers.some((n) => !Number.isFinite(n))) {
    return undefined;
  }
  const [minX, minY, maxX, maxY] = numbers;
  if (minX >= maxX || minY >= maxY) return undefined;
  return [minX, minY, maxX, maxY];
}

export class RestLayerMetadataSource implements LayerMetadataSource {
  private connection: ServerConnection;
  private timeoutMs: number;
  private fetchImpl: FetchFn;

  constructor(connection: ServerConnection, options?: RestMetadataOptions) {
    this.connection = { ...connection, url: trimBaseUrl(connection.url) };
    this.timeoutMs = options?.timeoutMs ?? DEFAULT_FETCH_TIMEOUT_MS;
    this.fetchImpl = options?.fetchImpl ?? fetch;
  }

  async load(ref: LayerRef, signal?: AbortSignal): Promise<LayerMetadata> {
    const layerName = `${encodeURIComponent(ref.workspace)}:${encodeURIComponent(ref.layer)}`;
    const layerDoc = await this.getJson(`${this.connection.url}/rest/layers/${layerName}.json`, signal);
    const styles = parseLayerStyles(layerDoc);

    const href = parseResourceHref(layerDoc);
    if (!href) return { styles };

    const resourceDoc = await this.getJson(href, signal);
    const bounds = parseLatLonBounds(resourceDoc);
    return bounds ? { styles, bounds } : { styles };
  }

  private async getJson(url: string, signal?: AbortSignal): Promise<unknown> {
    const response = await this.fetchImpl(url, {
      method: 'GET',
      headers: {
        Authorization: basicAuthHeader(this.connection),
        Accept: 'application/json',
      },
      signal: requestSignal(this.timeoutMs, signal),
    });

    if (!response.ok) {
      const body = await response.text().catch(() => '');
      throw new Error(`layer metadata request failed (${response.status}): ${truncateContent(body.trim())}`);
    }

    const text = await response.text();
    try {
      return JSON.parse(text);
    } catch {
      throw new Error(`invalid layer metadata response from ${url}: ${truncateContent(text.trim(), 80) || 'empty body'}`);
    }
  }
}
