/**
 * Carousel Menu
 *
 * Horizontal carousel of game cards. Each card shows the game number,
 * a pixel-art logo and the short name; cards slide smoothly between
 * selections unless instant mode is on.
 */

import type { Color } from '../../grid/color';
import type { LEDGrid } from '../../grid/ledGrid';
import { HINT, TITLE, centeredX } from '../../grid/textLayout';
import { drawArrow } from '../../grid/draw';
import { type SpriteStore, drawSprite } from '../../storage/spriteStore';
import { Game, type GameManager, type ScreenRequest } from '../base';
import type { InputFrame } from '../input';
import { playBeep } from '../sound';
import { LOGO_HEIGHT, LOGO_WIDTH, logoSpriteName, renderLogo } from './logos';

export { renderLogo, logoSpriteName, LOGO_WIDTH, LOGO_HEIGHT } from './logos';

export interface MenuCard {
  /** Short name shown on the card, e.g. "PONG" */
  name: string;
  number: number;
}

// Card overlay sprite covers rows 2..18
export const CARD_OVERLAY_WIDTH = 19;
export const CARD_OVERLAY_HEIGHT = 17;
export const CARD_OVERLAY_Y = 2;

const SCROLL_SPEED = 8.0;
const BORDER: Color = [30, 30, 40];
const NUMBER_COLOR: Color = [255, 255, 0];
const NAME_COLOR: Color = [0, 255, 255];
const ARROW_COLOR: Color = [130, 130, 130];
const PREVIEW_COLOR: Color = [80, 80, 80];

export function cardSpriteName(cardName: string): string {
  return `menu_card_${cardName}`;
}

/**
 * Draw one card shifted horizontally by xShift pixels. Cards may extend
 * off-grid while sliding; pixel writes are bounds-checked.
 */
export function renderGameCard(
  grid: LEDGrid,
  card: MenuCard,
  xShift: number,
  sprites?: SpriteStore,
  options: { overlay?: boolean } = {},
): void {
  const size = grid.gridSize;

  for (let bx = 0; bx < size; bx++) {
    grid.setPixel(xShift + bx, 4, BORDER);
    grid.setPixel(xShift + bx, 18, BORDER);
  }
  for (let by = 4; by < size; by++) {
    grid.setPixel(xShift, by, BORDER);
    grid.setPixel(xShift + 18, by, BORDER);
  }

  grid.renderNumber(card.number, xShift + 8, 2, NUMBER_COLOR);
  renderLogo(grid, card.name, xShift + 4, 6, sprites);

  const textX = xShift + Math.floor((size - card.name.length * 4) / 2);
  grid.renderText(card.name, textX, 15, NAME_COLOR);

  if (options.overlay !== false) {
    const overlay = sprites?.get(cardSpriteName(card.name));
    if (overlay) drawSprite(grid, overlay, xShift, CARD_OVERLAY_Y);
  }
}

export class CarouselMenu extends Game {
  selectedIndex: number;
  currentOffset: number;
  smoothTransition: boolean;
  titlePulse = 0;
  private request: ScreenRequest | null = null;

  constructor(
    grid: LEDGrid,
    private readonly cards: readonly MenuCard[],
    private readonly manager: GameManager | null = null,
    private readonly sprites?: SpriteStore,
  ) {
    super(grid);
    const start = manager?.selectedGameIndex ?? 0;
    this.selectedIndex = Math.max(0, Math.min(cards.length - 1, start));
    this.currentOffset = this.selectedIndex;
    this.smoothTransition = manager?.smoothTransitions ?? true;
  }

  get selectedCard(): MenuCard | undefined {
    return this.cards[this.selectedIndex];
  }

  update(dt: number): void {
    this.titlePulse += dt;
    if (!this.smoothTransition) return;
    const diff = this.selectedIndex - this.currentOffset;
    if (Math.abs(diff) > 0.01) {
      this.currentOffset += diff * SCROLL_SPEED * dt;
    } else {
      this.currentOffset = this.selectedIndex;
    }
  }

  render(): void {
    this.grid.clear([0, 0, 8]);

    const pulse = (Math.sin(this.titlePulse * 2.0) + 1.0) / 2.0;
    const titleColor: Color = [Math.trunc(60 + 80 * pulse), Math.trunc(180 + 40 * pulse), 255];
    this.grid.renderText('GAMES', centeredX(TITLE, 5), TITLE.y, titleColor);

    const size = this.grid.gridSize;
    if (this.smoothTransition) {
      this.cards.forEach((card, i) => {
        if (Math.abs(i - this.currentOffset) <= 1.25) {
          renderGameCard(this.grid, card, Math.trunc((i - this.currentOffset) * size), this.sprites);
        }
      });
    } else {
      const card = this.selectedCard;
      if (card) renderGameCard(this.grid, card, 0, this.sprites);
      const previewY = Math.floor(size / 2) - 2;
      const left = this.cards[this.selectedIndex - 1];
      const right = this.cards[this.selectedIndex + 1];
      if (left) this.grid.renderNumber(left.number, 1, previewY, PREVIEW_COLOR);
      if (right) this.grid.renderNumber(right.number, 15, previewY, PREVIEW_COLOR);
    }

    if (this.selectedIndex > 0) drawArrow(this.grid, 1, 9, 'left', ARROW_COLOR);
    if (this.selectedIndex < this.cards.length - 1) drawArrow(this.grid, 17, 9, 'right', ARROW_COLOR);

    const hint = 'LR SEL';
    this.grid.renderText(hint, centeredX(HINT, hint.length), HINT.y, [120, 120, 120]);
  }

  handleInput(input: InputFrame): void {
    for (const key of input.pressed) {
      switch (key) {
        case 'ArrowLeft':
          playBeep(420, 35);
          this.moveSelection(-1);
          break;
        case 'ArrowRight':
          playBeep(520, 35);
          this.moveSelection(1);
          break;
        case ' ':
        case 'Enter':
          playBeep(740, 60);
          this.finish({ kind: 'play', gameIndex: this.selectedIndex });
          return;
        case 'm':
          this.smoothTransition = !this.smoothTransition;
          if (this.manager) this.manager.smoothTransitions = this.smoothTransition;
          if (!this.smoothTransition) this.currentOffset = this.selectedIndex;
          playBeep(660, 40);
          break;
        case 'e':
          this.openCardEditor();
          return;
        case 'g':
          this.openLogoEditor();
          return;
        case 'f':
          playBeep(740, 60);
          this.finish({ kind: 'edit', editor: { kind: 'font' } });
          return;
      }
    }
  }

  nextRequest(): ScreenRequest | null {
    return this.request;
  }

  moveSelection(direction: number): void {
    this.selectedIndex = Math.max(0, Math.min(this.cards.length - 1, this.selectedIndex + direction));
    if (this.manager) this.manager.selectedGameIndex = this.selectedIndex;
    if (!this.smoothTransition) this.currentOffset = this.selectedIndex;
  }

  private openCardEditor(): void {
    const card = this.selectedCard;
    if (!card) return;
    playBeep(740, 60);
    this.finish({ kind: 'edit', editor: { kind: 'card', gameName: card.name } });
  }

  private openLogoEditor(): void {
    const card = this.selectedCard;
    if (!card) return;
    playBeep(740, 60);
    this.finish({
      kind: 'edit',
      editor: { kind: 'sprite', name: logoSpriteName(card.name), w: LOGO_WIDTH, h: LOGO_HEIGHT },
    });
  }

  private finish(request: ScreenRequest): void {
    if (this.manager) this.manager.selectedGameIndex = this.selectedIndex;
    this.request = request;
    this.running = false;
  }
}
