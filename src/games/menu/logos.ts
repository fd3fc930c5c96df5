/**
 * Built-in menu logos, with per-game sprite overrides
 */

import type { Color } from '../../grid/color';
import type { LEDGrid } from '../../grid/ledGrid';
import { type SpriteStore, drawSprite } from '../../storage/spriteStore';
import logoData from './logos.json';

interface LogoLayer {
  color: number[];
  pixels: number[][];
}

const LOGOS: Readonly<Record<string, LogoLayer[]>> = logoData;

/** Logo area on a card */
export const LOGO_WIDTH = 11;
export const LOGO_HEIGHT = 8;

export function logoSpriteName(cardName: string): string {
  return `menu_logo_${cardName}`;
}

/** Draw a card logo with its top-left at (x, y); a saved sprite wins over the built-in art */
export function renderLogo(grid: LEDGrid, cardName: string, x: number, y: number, sprites?: SpriteStore): void {
  const sprite = sprites?.get(logoSpriteName(cardName));
  if (sprite) {
    drawSprite(grid, sprite, x, y);
    return;
  }

  for (const layer of LOGOS[cardName] ?? []) {
    const color: Color = [layer.color[0], layer.color[1], layer.color[2]];
    for (const [dx, dy] of layer.pixels) {
      grid.setPixel(x + dx, y + dy, color);
    }
  }
}
