/**
 * Shape helpers shared by screens
 */

import type { Color } from './color';
import type { LEDGrid } from './ledGrid';

/** Filled circle by per-pixel distance test */
export function drawCirclePixels(grid: LEDGrid, cx: number, cy: number, radius: number, color: Color): void {
  for (let y = 0; y < grid.gridSize; y++) {
    for (let x = 0; x < grid.gridSize; x++) {
      if (Math.hypot(x - cx, y - cy) <= radius) {
        grid.setPixel(x, y, color);
      }
    }
  }
}

/** Five-pixel chevron pointing left or right, tip at (x, y) */
export function drawArrow(grid: LEDGrid, x: number, y: number, direction: 'left' | 'right', color: Color): void {
  const back = direction === 'left' ? 1 : -1;
  grid.setPixel(x, y, color);
  for (const step of [1, 2]) {
    grid.setPixel(x + back * step, y - step, color);
    grid.setPixel(x + back * step, y + step, color);
  }
}

/** One-pixel rectangle outline */
export function drawFrame(grid: LEDGrid, x: number, y: number, w: number, h: number, color: Color): void {
  for (let i = 0; i < w; i++) {
    grid.setPixel(x + i, y, color);
    grid.setPixel(x + i, y + h - 1, color);
  }
  for (let j = 0; j < h; j++) {
    grid.setPixel(x, y + j, color);
    grid.setPixel(x + w - 1, y + j, color);
  }
}
