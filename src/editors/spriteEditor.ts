/**
 * Sprite overlay editor
 *
 * Paints a named w x h sprite (menu logos, HUD icons) drawn at (1,1)
 * inside a frame. Arrows move, Space paints, Backspace erases, C cycles
 * the palette, S saves. Left click paints, right click erases.
 */

import type { Color } from '../grid/color';
import { drawFrame } from '../grid/draw';
import type { LEDGrid } from '../grid/ledGrid';
import { type Sprite, type SpriteStore, drawSprite } from '../storage/spriteStore';
import { Game } from '../games/base';
import type { InputFrame } from '../games/input';
import { playBeep } from '../games/sound';
import { CURSOR_COLOR, type Cursor, FRAME_COLOR, PALETTE, moveCursor, saveWithFeedback } from './shared';

/** Sprite origin on the grid */
const ORIGIN = 1;
const LABEL_COLOR: Color = [180, 180, 180];

export class SpriteEditor extends Game {
  readonly sprite: Sprite;
  cursor: Cursor = { x: 0, y: 0 };
  paletteIndex = 0;

  constructor(
    grid: LEDGrid,
    private readonly store: SpriteStore,
    readonly spriteName: string,
    readonly w: number,
    readonly h: number,
  ) {
    super(grid);
    this.sprite = store.getOrCreate(spriteName, w, h);
  }

  /** Grid LED to sprite pixel, null outside the sprite */
  gridToSprite(gx: number, gy: number): Cursor | null {
    const x = gx - ORIGIN;
    const y = gy - ORIGIN;
    if (x < 0 || y < 0 || x >= this.w || y >= this.h) return null;
    return { x, y };
  }

  update(_dt: number): void {}

  render(): void {
    this.grid.clear();
    drawFrame(this.grid, 0, 0, this.w + 2, this.h + 2, FRAME_COLOR);
    drawSprite(this.grid, this.sprite, ORIGIN, ORIGIN);
    this.grid.setPixel(ORIGIN + this.cursor.x, ORIGIN + this.cursor.y, CURSOR_COLOR);

    const labelX = this.w + 3;
    this.grid.renderText('ED', labelX, 0, LABEL_COLOR);
    this.grid.renderText('C', labelX, 6, LABEL_COLOR);
    this.grid.renderText('S', labelX, 12, LABEL_COLOR);
    this.grid.setPixel(this.w + 4, this.h, PALETTE[this.paletteIndex]);
  }

  paint(): void {
    this.sprite.set(this.cursor.x, this.cursor.y, PALETTE[this.paletteIndex]);
  }

  erase(): void {
    this.sprite.set(this.cursor.x, this.cursor.y, null);
  }

  save(): boolean {
    return saveWithFeedback('SpriteEditor', () => this.store.save());
  }

  handleInput(input: InputFrame): void {
    for (const click of input.clicks) {
      const target = this.gridToSprite(click.x, click.y);
      if (!target) continue;
      this.cursor = target;
      if (click.button === 'left') {
        this.paint();
        playBeep(660, 15);
      } else {
        this.erase();
        playBeep(320, 15);
      }
    }

    for (const key of input.pressed) {
      if (key === 'Escape') {
        this.running = false;
        return;
      }
      if (moveCursor(this.cursor, key, this.w, this.h)) continue;

      switch (key) {
        case 'c':
          this.paletteIndex = (this.paletteIndex + 1) % PALETTE.length;
          playBeep(520, 20);
          break;
        case ' ':
          this.paint();
          playBeep(660, 20);
          break;
        case 'Backspace':
          this.erase();
          playBeep(320, 20);
          break;
        case 's':
          this.save();
          break;
      }
    }
  }
}
