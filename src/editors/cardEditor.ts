/**
 * Menu card editor
 *
 * Paints the 19x17 overlay sprite `menu_card_<NAME>` drawn over a
 * carousel card from row 2 down. Rows 0-1 hold the palette and its
 * selection marker; click a swatch to pick it. B copies the plain card
 * into the overlay as a starting point.
 */

import type { Color } from '../grid/color';
import { isBlack } from '../grid/color';
import type { LEDGrid } from '../grid/ledGrid';
import { type Sprite, type SpriteStore, drawSprite } from '../storage/spriteStore';
import { Game } from '../games/base';
import type { InputFrame } from '../games/input';
import {
  CARD_OVERLAY_HEIGHT,
  CARD_OVERLAY_WIDTH,
  CARD_OVERLAY_Y,
  type MenuCard,
  cardSpriteName,
  renderGameCard,
} from '../games/menu';
import { playBeep } from '../games/sound';
import { CURSOR_COLOR, type Cursor, PALETTE, moveCursor, saveWithFeedback } from './shared';

const MARKER_OFF: Color = [20, 20, 20];

export class CardEditor extends Game {
  readonly sprite: Sprite;
  cursor: Cursor = { x: 0, y: 0 };
  paletteIndex = 0;

  constructor(
    grid: LEDGrid,
    private readonly store: SpriteStore,
    readonly card: MenuCard,
  ) {
    super(grid);
    this.sprite = store.getOrCreate(cardSpriteName(card.name), CARD_OVERLAY_WIDTH, CARD_OVERLAY_HEIGHT);
  }

  gridToOverlay(gx: number, gy: number): Cursor | null {
    const y = gy - CARD_OVERLAY_Y;
    if (gx < 0 || y < 0 || gx >= CARD_OVERLAY_WIDTH || y >= CARD_OVERLAY_HEIGHT) return null;
    return { x: gx, y };
  }

  /** Replace the overlay with the card as drawn without it */
  bake(): void {
    this.grid.clear();
    renderGameCard(this.grid, this.card, 0, this.store, { overlay: false });
    for (let y = 0; y < CARD_OVERLAY_HEIGHT; y++) {
      for (let x = 0; x < CARD_OVERLAY_WIDTH; x++) {
        const color = this.grid.getPixel(x, y + CARD_OVERLAY_Y);
        this.sprite.set(x, y, isBlack(color) ? null : color);
      }
    }
  }

  update(_dt: number): void {}

  render(): void {
    this.grid.clear();
    renderGameCard(this.grid, this.card, 0, this.store, { overlay: false });
    drawSprite(this.grid, this.sprite, 0, CARD_OVERLAY_Y);

    PALETTE.forEach((color, i) => {
      this.grid.setPixel(i, 0, color);
      this.grid.setPixel(i, 1, i === this.paletteIndex ? CURSOR_COLOR : MARKER_OFF);
    });

    this.grid.setPixel(this.cursor.x, this.cursor.y + CARD_OVERLAY_Y, CURSOR_COLOR);
  }

  save(): boolean {
    return saveWithFeedback('CardEditor', () => this.store.save());
  }

  handleInput(input: InputFrame): void {
    for (const click of input.clicks) {
      if (click.y === 0 && click.x >= 0 && click.x < PALETTE.length) {
        this.paletteIndex = click.x;
        playBeep(520, 20);
        continue;
      }
      const target = this.gridToOverlay(click.x, click.y);
      if (!target) continue;
      this.cursor = target;
      if (click.button === 'left') {
        this.sprite.set(target.x, target.y, PALETTE[this.paletteIndex]);
        playBeep(660, 15);
      } else {
        this.sprite.set(target.x, target.y, null);
        playBeep(320, 15);
      }
    }

    for (const key of input.pressed) {
      if (key === 'Escape') {
        this.running = false;
        return;
      }
      if (moveCursor(this.cursor, key, CARD_OVERLAY_WIDTH, CARD_OVERLAY_HEIGHT)) continue;

      switch (key) {
        case 'c':
          this.paletteIndex = (this.paletteIndex + 1) % PALETTE.length;
          playBeep(520, 20);
          break;
        case ' ':
          this.sprite.set(this.cursor.x, this.cursor.y, PALETTE[this.paletteIndex]);
          playBeep(660, 20);
          break;
        case 'Backspace':
          this.sprite.set(this.cursor.x, this.cursor.y, null);
          playBeep(320, 20);
          break;
        case 's':
          this.save();
          break;
        case 'b':
          this.bake();
          playBeep(740, 60);
          break;
      }
    }
  }
}
