import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, readFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { LEDGrid } from '../grid/ledGrid';
import { SpriteStore } from '../storage/spriteStore';
import { inputFrame } from '../games/input';
import { setSoundEnabled } from '../games/sound';
import { PALETTE } from './shared';
import { SpriteEditor } from './spriteEditor';

describe('SpriteEditor', () => {
  let dir: string;
  let store: SpriteStore;

  beforeEach(() => {
    setSoundEnabled(false);
    dir = mkdtempSync(join(tmpdir(), 'sprite-editor-'));
    store = new SpriteStore(join(dir, 'sprites.json'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  it('creates the sprite in the store', () => {
    new SpriteEditor(new LEDGrid(), store, 'menu_logo_PONG', 11, 8);
    expect(store.get('menu_logo_PONG')?.w).toBe(11);
  });

  it('paints with the selected color and erases with backspace', () => {
    const editor = new SpriteEditor(new LEDGrid(), store, 'icon', 4, 4);
    editor.handleInput(inputFrame(['ArrowRight', 'ArrowDown', 'c', 'c', ' ']));
    expect(editor.sprite.get(1, 1)).toEqual(PALETTE[2]);

    editor.handleInput(inputFrame(['Backspace']));
    expect(editor.sprite.get(1, 1)).toBeUndefined();
  });

  it('keeps the cursor inside the sprite', () => {
    const editor = new SpriteEditor(new LEDGrid(), store, 'icon', 2, 2);
    editor.handleInput(inputFrame(['ArrowRight', 'ArrowRight', 'ArrowRight', 'ArrowUp']));
    expect(editor.cursor).toEqual({ x: 1, y: 0 });
  });

  it('paints on left click and erases on right click', () => {
    const editor = new SpriteEditor(new LEDGrid(), store, 'icon', 4, 4);
    editor.handleInput(inputFrame([], { clicks: [{ x: 3, y: 2, button: 'left' }] }));
    expect(editor.cursor).toEqual({ x: 2, y: 1 });
    expect(editor.sprite.get(2, 1)).toEqual(PALETTE[0]);

    editor.handleInput(inputFrame([], { clicks: [{ x: 3, y: 2, button: 'right' }] }));
    expect(editor.sprite.get(2, 1)).toBeUndefined();
  });

  it('ignores clicks on the frame', () => {
    const editor = new SpriteEditor(new LEDGrid(), store, 'icon', 4, 4);
    editor.handleInput(inputFrame([], { clicks: [{ x: 0, y: 0, button: 'left' }] }));
    expect(editor.sprite.size).toBe(0);
  });

  it('draws the sprite inside its frame', () => {
    const grid = new LEDGrid();
    const editor = new SpriteEditor(grid, store, 'icon', 4, 4);
    editor.sprite.set(1, 1, [255, 0, 0]);
    editor.render();
    expect(grid.getPixel(0, 0)).toEqual([40, 40, 40]);
    expect(grid.getPixel(2, 2)).toEqual([255, 0, 0]);
    expect(grid.getPixel(1, 1)).toEqual([255, 255, 0]);
  });

  it('saves the store on s', () => {
    const editor = new SpriteEditor(new LEDGrid(), store, 'icon', 2, 1);
    editor.handleInput(inputFrame([' ', 's']));
    const saved = JSON.parse(readFileSync(join(dir, 'sprites.json'), 'utf-8'));
    expect(saved).toEqual({ icon: { w: 2, h: 1, pixels: { '0,0': [255, 255, 255] } } });
  });

  it('keeps editing when the save fails', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    vi.spyOn(store, 'save').mockImplementation(() => {
      throw new Error('read-only');
    });
    const editor = new SpriteEditor(new LEDGrid(), store, 'icon', 2, 2);
    editor.handleInput(inputFrame(['s']));
    expect(error).toHaveBeenCalledTimes(1);
    expect(editor.isRunning()).toBe(true);
  });

  it('exits on escape', () => {
    const editor = new SpriteEditor(new LEDGrid(), store, 'icon', 2, 2);
    editor.handleInput(inputFrame(['Escape']));
    expect(editor.isRunning()).toBe(false);
  });
});
