/**
 * Shared types for the map preview
 */

/** Geographic bounding box in EPSG:4326: [minX, minY, maxX, maxY]. */
export type BBox = readonly [number, number, number, number];

export const WORLD_BBOX: BBox = [-180, -90, 180, 90];

export interface ViewportSnapshot {
  centerLon: number;
  centerLat: number;
  zoom: number;
  bbox: BBox;
}

/** Terminal graphics tier, most capable first. */
export type ImageProtocol = 'native' | 'sixel-helper' | 'general-helper' | 'ascii';

export interface ServerCredentials {
  username: string;
  password: string;
}

export interface ServerConnection extends ServerCredentials {
  /** Base URL of the server, e.g. http://localhost:8080/geoserver */
  url: string;
}

export interface LayerRef {
  workspace: string;
  layer: string;
}

/**
 * Snapshot taken when a GetMap request is issued.
 * `seq` orders requests issued by one preview.
 */
export interface FetchRequest extends LayerRef {
  readonly seq: number;
  readonly style: string;
  readonly pixelWidth: number;
  readonly pixelHeight: number;
  readonly bbox: BBox;
}

export type FetchResult =
  | { ok: true; bytes: Uint8Array }
  | { ok: false; error: string };

export interface LayerMetadata {
  bounds?: BBox;
  styles: string[];
}

export type PreviewStatus = 'loading' | 'ready' | 'error' | 'closed';
