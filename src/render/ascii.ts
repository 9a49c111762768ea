/**
 * Software renderer: PNG to luminance glyphs. Always produces a frame.
 */

import { PNG } from 'pngjs';
import type { CellGrid } from './cell-grid.js';

/** Light to dark. */
export const GLYPH_RAMP = ' .:-=+*#%@';
export const BLANK_GLYPH = ' ';
export const DECODE_ERROR_FRAME = '[Image decode error]';

/** Pixels with alpha below this (0-255) are drawn blank. */
export const ALPHA_THRESHOLD = 128;

export type RasterImage = {
  width: number;
  height: number;
  /** RGBA, 4 bytes per pixel, row-major. */
  data: Uint8Array;
};

export function decodePng(bytes: Uint8Array): RasterImage {
  const png = PNG.sync.read(Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength));
  return { width: png.width, height: png.height, data: png.data };
}

export function glyphForPixel(r: number, g: number, b: number, a: number): string {
  if (a < ALPHA_THRESHOLD) return BLANK_GLYPH;
  const gray = Math.floor((r + g + b) / 3);
  const steps = GLYPH_RAMP.length - 1;
  const idx = steps - Math.floor((gray * steps) / 255);
  return GLYPH_RAMP[idx];
}

/** Nearest-neighbour source index for a cell, clamped to the last pixel. */
export function sampleIndex(cell: number, sourceExtent: number, gridExtent: number): number {
  const index = Math.floor((cell * sourceExtent) / gridExtent);
  return Math.min(index, sourceExtent - 1);
}

export function renderRasterAscii(image: RasterImage, grid: CellGrid): string {
  if (image.width <= 0 || image.height <= 0 || grid.cols <= 0 || grid.rows <= 0) return '';

  let out = '';
  for (let y = 0; y < grid.rows; y++) {
    const py = sampleIndex(y, image.height, grid.rows);
    for (let x = 0; x < grid.cols; x++) {
      const px = sampleIndex(x, image.width, grid.cols);
      const offset = (py * image.width + px) * 4;
      out += glyphForPixel(
        image.data[offset],
        image.data[offset + 1],
        image.data[offset + 2],
        image.data[offset + 3],
      );
    }
    out += '\n';
  }
  return out;
}

export function renderAscii(bytes: Uint8Array, grid: CellGrid): string {
  let image: RasterImage;
  try {
    image = decodePng(bytes);
  } catch {
    return DECODE_ERROR_FRAME;
  }
  return renderRasterAscii(image, grid);
}
