/**
 * Geographic viewport: center, zoom level and the bounding box derived from them.
 *
 * Zoom 0 shows the whole world (360 x 180 degrees); each level halves the extent.
 */

import { WORLD_BBOX, type BBox, type ViewportSnapshot } from '../types/index.js';

export const MIN_ZOOM = 0;
export const MAX_ZOOM = 20;
export const DEFAULT_ZOOM = 2;
export const ZOOM_STEP = 0.5;

/** Fraction of the visible extent moved by one pan. */
export const PAN_FRACTION = 0.125;

const WORLD_WIDTH = 360;
const WORLD_HEIGHT = 180;

export type ViewportOptions = {
  centerLon?: number;
  centerLat?: number;
  zoom?: number;
  bbox?: BBox;
};

/**
 * Compute the bbox for a center and zoom, shifting the window back inside the
 * world when an edge falls outside it.
 *
 * Edges are checked in order (west, east, south, north) and each shift keeps
 * the window size, so at a corner the later check wins.
 */
export function recomputeBBox(centerLon: number, centerLat: number, zoom: number): BBox {
  const scale = 1 / Math.pow(2, zoom);
  const width = WORLD_WIDTH * scale;
  const height = WORLD_HEIGHT * scale;

  let minX = centerLon - width / 2;
  let minY = centerLat - height / 2;
  let maxX = centerLon + width / 2;
  let maxY = centerLat + height / 2;

  if (minX < -180) {
    minX = -180;
    maxX = minX + width;
  }
  if (maxX > 180) {
    maxX = 180;
    minX = maxX - width;
  }
  if (minY < -90) {
    minY = -90;
    maxY = minY + height;
  }
  if (maxY > 90) {
    maxY = 90;
    minY = maxY - height;
  }

  return [minX, minY, maxX, maxY];
}

export function sameBBox(a: BBox, b: BBox): boolean {
  return a[0] === b[0] && a[1] === b[1] && a[2] === b[2] && a[3] === b[3];
}

export function bboxWidth(bbox: BBox): number {
  return bbox[2] - bbox[0];
}

export function bboxHeight(bbox: BBox): number {
  return bbox[3] - bbox[1];
}

export class Viewport {
  private centerLonValue: number;
  private centerLatValue: number;
  private zoomValue: number;
  private bboxValue: BBox;

  constructor(options?: ViewportOptions) {
    this.centerLonValue = options?.centerLon ?? 0;
    this.centerLatValue = options?.centerLat ?? 0;
    this.zoomValue = clampZoom(options?.zoom ?? DEFAULT_ZOOM);
    this.bboxValue = options?.bbox ?? WORLD_BBOX;
  }

  get centerLon(): number {
    return this.centerLonValue;
  }

  get centerLat(): number {
    return this.centerLatValue;
  }

  get zoom(): number {
    return this.zoomValue;
  }

  get bbox(): BBox {
    return this.bboxValue;
  }

  snapshot(): ViewportSnapshot {
    return {
      centerLon: this.centerLonValue,
      centerLat: this.centerLatValue,
      zoom: this.zoomValue,
      bbox: this.bboxValue,
    };
  }

  /** Returns false when already at the maximum zoom. */
  zoomIn(): boolean {
    if (this.zoomValue >= MAX_ZOOM) return false;
    this.zoomValue = clampZoom(this.zoomValue + ZOOM_STEP);
    this.recomputeBBox();
    return true;
  }

  /** Returns false when already at the minimum zoom. */
  zoomOut(): boolean {
    if (this.zoomValue <= MIN_ZOOM) return false;
    this.zoomValue = clampZoom(this.zoomValue - ZOOM_STEP);
    this.recomputeBBox();
    return true;
  }

  panUp(): void {
    this.centerLatValue += bboxHeight(this.bboxValue) * PAN_FRACTION;
    this.recomputeBBox();
  }

  panDown(): void {
    this.centerLatValue -= bboxHeight(this.bboxValue) * PAN_FRACTION;
    this.recomputeBBox();
  }

  panLeft(): void {
    this.centerLonValue -= bboxWidth(this.bboxValue) * PAN_FRACTION;
    this.recomputeBBox();
  }

  panRight(): void {
    this.centerLonValue += bboxWidth(this.bboxValue) * PAN_FRACTION;
    this.recomputeBBox();
  }

  /**
   * Center on a native extent. The extent itself is what the first request
   * shows; the next pan or zoom derives the bbox from center and zoom again.
   */
  setBounds(minX: number, minY: number, maxX: number, maxY: number): void {
    this.bboxValue = [minX, minY, maxX, maxY];
    this.centerLonValue = (minX + maxX) / 2;
    this.centerLatValue = (minY + maxY) / 2;
  }

  recomputeBBox(): BBox {
    this.bboxValue = recomputeBBox(this.centerLonValue, this.centerLatValue, this.zoomValue);
    return this.bboxValue;
  }
}

function clampZoom(zoom: number): number {
  if (!Number.isFinite(zoom)) return DEFAULT_ZOOM;
  return Math.max(MIN_ZOOM, Math.min(MAX_ZOOM, zoom));
}
