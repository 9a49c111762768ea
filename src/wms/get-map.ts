/**
 * WMS GetMap requests for the preview image.
 */

import { DEFAULT_FETCH_TIMEOUT_MS } from '../config/index.js';
import { truncateContent } from '../infra/log-sanitizer.js';
import type { FetchRequest, FetchResult, ServerConnection, ServerCredentials } from '../types/index.js';

export type FetchFn = typeof fetch;

/** Anything that can turn a request snapshot into image bytes. */
export interface MapImageFetcher {
  fetch(request: FetchRequest): Promise<FetchResult>;
}

export type WmsFetcherOptions = {
  timeoutMs?: number;
  fetchImpl?: FetchFn;
};

function formatCoord(value: number): string {
  return value.toFixed(6);
}

export function trimBaseUrl(baseUrl: string): string {
  return baseUrl.replace(/\/+$/, '');
}

export function buildGetMapUrl(baseUrl: string, request: Omit<FetchRequest, 'seq'>): string {
  const [minX, minY, maxX, maxY] = request.bbox;
  const params = [
    'SERVICE=WMS',
    'VERSION=1.1.1',
    'REQUEST=GetMap',
    `LAYERS=${encodeURIComponent(request.workspace)}:${encodeURIComponent(request.layer)}`,
    `STYLES=${encodeURIComponent(request.style)}`,
    'FORMAT=image/png',
    'TRANSPARENT=true',
    'SRS=EPSG:4326',
    `WIDTH=${Math.round(request.pixelWidth)}`,
    `HEIGHT=${Math.round(request.pixelHeight)}`,
    `BBOX=${[minX, minY, maxX, maxY].map(formatCoord).join(',')}`,
  ];
  return `${trimBaseUrl(baseUrl)}/wms?${params.join('&')}`;
}

export function basicAuthHeader(credentials: ServerCredentials): string {
  const token = Buffer.from(`${credentials.username}:${credentials.password}`, 'utf8').toString('base64');
  return `Basic ${token}`;
}

function describeFetchError(error: unknown, timeoutMs: number): string {
  if (error instanceof Error) {
    if (error.name === 'TimeoutError' || error.name === 'AbortError') {
      return `request timed out after ${Math.round(timeoutMs / 1000)}s`;
    }
    const cause = error.cause instanceof Error ? `: ${error.cause.message}` : '';
    return `${error.message}${cause}`;
  }
  return String(error);
}

export class WmsMapFetcher implements MapImageFetcher {
  private connection: ServerConnection;
  private timeoutMs: number;
  private fetchImpl: FetchFn;

  constructor(connection: ServerConnection, options?: WmsFetcherOptions) {
    this.connection = { ...connection, url: trimBaseUrl(connection.url) };
    this.timeoutMs = options?.timeoutMs ?? DEFAULT_FETCH_TIMEOUT_MS;
    this.fetchImpl = options?.fetchImpl ?? fetch;
  }

  get baseUrl(): string {
    return this.connection.url;
  }

  /** Resolves with an error result instead of rejecting. */
  async fetch(request: FetchRequest): Promise<FetchResult> {
    const url = buildGetMapUrl(this.connection.url, request);

    try {
      const response = await this.fetchImpl(url, {
        method: 'GET',
        headers: { Authorization: basicAuthHeader(this.connection) },
        signal: AbortSignal.timeout(this.timeoutMs),
      });

      if (!response.ok) {
        const body = await response.text().catch(() => '');
        return { ok: false, error: `WMS error (${response.status}): ${truncateContent(body.trim())}` };
      }

      const bytes = new Uint8Array(await response.arrayBuffer());
      return { ok: true, bytes };
    } catch (error) {
      return { ok: false, error: describeFetchError(error, this.timeoutMs) };
    }
  }
}
