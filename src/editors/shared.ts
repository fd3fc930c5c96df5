/**
 * Pieces shared by the pixel editors
 */

import type { Color } from '../grid/color';
import { playBeep } from '../games/sound';

export const PALETTE: readonly Color[] = [
  [255, 255, 255],
  [0, 0, 0],
  [255, 0, 0],
  [0, 255, 0],
  [0, 180, 255],
  [255, 220, 80],
  [255, 120, 180],
  [80, 80, 80],
];

export const FRAME_COLOR: Color = [40, 40, 40];
export const CURSOR_COLOR: Color = [255, 255, 0];

export interface Cursor {
  x: number;
  y: number;
}

/** Move a cursor with the arrow keys inside a w by h area; false for other keys */
export function moveCursor(cursor: Cursor, key: string, w: number, h: number): boolean {
  switch (key) {
    case 'ArrowLeft':
      cursor.x = Math.max(0, cursor.x - 1);
      return true;
    case 'ArrowRight':
      cursor.x = Math.min(w - 1, cursor.x + 1);
      return true;
    case 'ArrowUp':
      cursor.y = Math.max(0, cursor.y - 1);
      return true;
    case 'ArrowDown':
      cursor.y = Math.min(h - 1, cursor.y + 1);
      return true;
    default:
      return false;
  }
}

/**
 * Run a store save. A failure is logged and signalled with a low beep;
 * the editor keeps running either way.
 */
export function saveWithFeedback(tag: string, save: () => void): boolean {
  try {
    save();
  } catch (err) {
    console.error(`[${tag}] Save failed:`, err);
    playBeep(200, 150);
    return false;
  }
  playBeep(880, 40);
  return true;
}
