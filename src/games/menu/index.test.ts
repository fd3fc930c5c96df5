import { describe, it, expect, beforeEach } from 'vitest';
import { LEDGrid } from '../../grid/ledGrid';
import { SpriteStore } from '../../storage/spriteStore';
import { inputFrame } from '../input';
import { setSoundEnabled } from '../sound';
import { CarouselMenu, renderGameCard, cardSpriteName, logoSpriteName, type MenuCard } from './index';

const CARDS: MenuCard[] = [
  { name: 'PONG', number: 1 },
  { name: 'SNAKE', number: 2 },
  { name: 'FLAP', number: 3 },
];

describe('CarouselMenu', () => {
  beforeEach(() => {
    setSoundEnabled(false);
  });

  it('clamps selection instead of wrapping', () => {
    const menu = new CarouselMenu(new LEDGrid(), CARDS);
    menu.handleInput(inputFrame(['ArrowLeft']));
    expect(menu.selectedIndex).toBe(0);
    menu.handleInput(inputFrame(['ArrowRight', 'ArrowRight', 'ArrowRight']));
    expect(menu.selectedIndex).toBe(2);
  });

  it('requests the selected game on space', () => {
    const menu = new CarouselMenu(new LEDGrid(), CARDS);
    menu.handleInput(inputFrame(['ArrowRight', ' ']));
    expect(menu.isRunning()).toBe(false);
    expect(menu.nextRequest()).toEqual({ kind: 'play', gameIndex: 1 });
  });

  it('stays open on escape', () => {
    const menu = new CarouselMenu(new LEDGrid(), CARDS);
    menu.handleInput(inputFrame(['Escape']));
    expect(menu.isRunning()).toBe(true);
    expect(menu.nextRequest()).toBeNull();
  });

  it('requests editors for the selected card', () => {
    const card = new CarouselMenu(new LEDGrid(), CARDS);
    card.handleInput(inputFrame(['e']));
    expect(card.nextRequest()).toEqual({ kind: 'edit', editor: { kind: 'card', gameName: 'PONG' } });

    const logo = new CarouselMenu(new LEDGrid(), CARDS);
    logo.handleInput(inputFrame(['ArrowRight', 'g']));
    expect(logo.nextRequest()).toEqual({
      kind: 'edit',
      editor: { kind: 'sprite', name: 'menu_logo_SNAKE', w: 11, h: 8 },
    });

    const font = new CarouselMenu(new LEDGrid(), CARDS);
    font.handleInput(inputFrame(['f']));
    expect(font.nextRequest()).toEqual({ kind: 'edit', editor: { kind: 'font' } });
  });

  it('scrolls smoothly toward the selection and snaps when close', () => {
    const menu = new CarouselMenu(new LEDGrid(), CARDS);
    menu.moveSelection(1);
    menu.update(0.05);
    // offset += (1 - 0) * 8 * 0.05
    expect(menu.currentOffset).toBeCloseTo(0.4);
    for (let i = 0; i < 200; i++) menu.update(0.05);
    expect(menu.currentOffset).toBe(1);
  });

  it('jumps immediately in instant mode', () => {
    const menu = new CarouselMenu(new LEDGrid(), CARDS);
    menu.handleInput(inputFrame(['m', 'ArrowRight']));
    expect(menu.smoothTransition).toBe(false);
    expect(menu.currentOffset).toBe(1);
  });

  it('shows arrows only where navigation is possible', () => {
    const grid = new LEDGrid();
    const menu = new CarouselMenu(grid, CARDS);
    menu.render();
    expect(grid.getPixel(1, 9)).toEqual([0, 0, 8]);
    expect(grid.getPixel(17, 9)).toEqual([130, 130, 130]);
  });
});

describe('renderGameCard', () => {
  it('draws border, number, logo and name', () => {
    const grid = new LEDGrid();
    renderGameCard(grid, CARDS[0], 0);
    expect(grid.getPixel(0, 4)).toEqual([30, 30, 40]);
    expect(grid.getPixel(18, 18)).toEqual([30, 30, 40]);
    // '1' lights its top-center pixel
    expect(grid.getPixel(9, 2)).toEqual([255, 255, 0]);
    // left paddle of the pong logo
    expect(grid.getPixel(4, 7)).toEqual([255, 255, 255]);
    // 'P' top row, name centered at x=1
    expect(grid.getPixel(1, 15)).toEqual([0, 255, 255]);
  });

  it('uses logo sprites and draws the card overlay', () => {
    const grid = new LEDGrid();
    const sprites = new SpriteStore('/unused/sprites.json');
    sprites.getOrCreate(logoSpriteName('PONG'), 11, 8).set(0, 0, [1, 2, 3]);
    sprites.getOrCreate(cardSpriteName('PONG'), 19, 17).set(0, 0, [200, 0, 0]);

    renderGameCard(grid, CARDS[0], 0, sprites);
    expect(grid.getPixel(4, 6)).toEqual([1, 2, 3]);
    expect(grid.getPixel(4, 7)).toEqual([0, 0, 0]);
    expect(grid.getPixel(0, 2)).toEqual([200, 0, 0]);
  });

  it('can skip the overlay', () => {
    const grid = new LEDGrid();
    const sprites = new SpriteStore('/unused/sprites.json');
    sprites.getOrCreate(cardSpriteName('PONG'), 19, 17).set(9, 0, [200, 0, 0]);
    renderGameCard(grid, CARDS[0], 0, sprites, { overlay: false });
    expect(grid.getPixel(9, 2)).toEqual([255, 255, 0]);
  });
});
