import { describe, it, expect } from 'vitest';
import { LEDGrid } from '../grid/ledGrid';
import { FontStore } from '../storage/fontStore';
import { SpriteStore } from '../storage/spriteStore';
import { CardEditor } from '../editors/cardEditor';
import { FontEditor } from '../editors/fontEditor';
import { SpriteEditor } from '../editors/spriteEditor';
import { GameManager } from './base';
import { BootScreen } from './boot';
import { CarouselMenu } from './menu';
import { RaceGame } from './race';
import { createEditor, createScreens, games, getGame, getGameIndex, menuCards } from './index';

function stores() {
  return {
    sprites: new SpriteStore('unused/sprites.json'),
    fonts: new FontStore('unused/font_overrides.json'),
  };
}

describe('game registry', () => {
  it('numbers menu cards from one in registry order', () => {
    expect(menuCards()).toEqual([
      { name: 'PONG', number: 1 },
      { name: 'SNAKE', number: 2 },
      { name: 'FLAP', number: 3 },
      { name: 'BBALL', number: 4 },
      { name: 'PETS', number: 5 },
      { name: 'VACAY', number: 6 },
      { name: 'FIGHT', number: 7 },
      { name: 'RACE', number: 8 },
    ]);
  });

  it('finds games by id regardless of case', () => {
    expect(getGame('Snake')?.name).toBe('SNAKE');
    expect(getGameIndex('race')).toBe(7);
    expect(getGameIndex('tetris')).toBe(-1);
  });

  it('creates every game as a running screen', () => {
    const grid = new LEDGrid();
    for (const game of games) {
      expect(game.create(grid, stores()).isRunning()).toBe(true);
    }
  });
});

describe('createScreens', () => {
  it('builds boot, menu and games', () => {
    const grid = new LEDGrid();
    const screens = createScreens(grid, stores());
    expect(screens.boot()).toBeInstanceOf(BootScreen);
    expect(screens.menu(new GameManager(grid, screens))).toBeInstanceOf(CarouselMenu);
    expect(screens.game(7)).toBeInstanceOf(RaceGame);
    expect(screens.game(8)).toBeNull();
  });

  it('builds each kind of editor', () => {
    const grid = new LEDGrid();
    const assets = stores();
    expect(createEditor(grid, assets, { kind: 'font' })).toBeInstanceOf(FontEditor);
    expect(createEditor(grid, assets, { kind: 'sprite', name: 'icon', w: 3, h: 3 })).toBeInstanceOf(SpriteEditor);

    const editor = createEditor(grid, assets, { kind: 'card', gameName: 'bball' });
    expect(editor).toBeInstanceOf(CardEditor);
    expect(editor instanceof CardEditor && editor.card).toEqual({ name: 'BBALL', number: 4 });
  });
});
