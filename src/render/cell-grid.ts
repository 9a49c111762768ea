/**
 * Sizing of the image area from the component's terminal size.
 *
 * Rows below the frame hold the title and control bar, so both the cell grid
 * and the requested image size subtract that chrome first. Requested pixels
 * use roughly 8x16 px per cell since cells are about twice as tall as wide.
 */

export type CellGrid = {
  cols: number;
  rows: number;
};

export type PixelSize = {
  width: number;
  height: number;
};

type Range = { min: number; max: number };

export const HELPER_COLS: Range = { min: 40, max: 120 };
export const HELPER_ROWS: Range = { min: 15, max: 50 };
export const ASCII_COLS: Range = { min: 40, max: 100 };
export const ASCII_ROWS: Range = { min: 15, max: 40 };
export const PIXEL_WIDTH: Range = { min: 256, max: 1024 };
export const PIXEL_HEIGHT: Range = { min: 192, max: 768 };

export const DEFAULT_PIXEL_SIZE: PixelSize = { width: 800, height: 600 };

const GRID_CHROME_COLS = 4;
const GRID_CHROME_ROWS = 8;
const PIXEL_CHROME_COLS = 20;
const PIXEL_CHROME_ROWS = 10;
const CELL_WIDTH_PX = 8;
const CELL_HEIGHT_PX = 16;

function clampInt(value: number, range: Range): number {
  const n = Number.isFinite(value) ? Math.floor(value) : range.min;
  return Math.max(range.min, Math.min(range.max, n));
}

export function helperCellGrid(width: number, height: number): CellGrid {
  return {
    cols: clampInt(width - GRID_CHROME_COLS, HELPER_COLS),
    rows: clampInt(height - GRID_CHROME_ROWS, HELPER_ROWS),
  };
}

export function asciiCellGrid(width: number, height: number): CellGrid {
  return {
    cols: clampInt(width - GRID_CHROME_COLS, ASCII_COLS),
    rows: clampInt(height - GRID_CHROME_ROWS, ASCII_ROWS),
  };
}

export function requestPixelSize(width: number, height: number): PixelSize {
  return {
    width: clampInt((width - PIXEL_CHROME_COLS) * CELL_WIDTH_PX, PIXEL_WIDTH),
    height: clampInt((height - PIXEL_CHROME_ROWS) * CELL_HEIGHT_PX, PIXEL_HEIGHT),
  };
}
