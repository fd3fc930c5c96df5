/**
 * Font editor
 *
 * Live editing of the 3x5 glyphs behind LEDGrid.renderText(). The atlas
 * view shows a page of glyphs (click or type one to edit it); the edit
 * view magnifies a single glyph. Unsaved edits are previewed by pushing
 * them into the grid's font overrides on every render.
 */

import type { Color } from '../grid/color';
import { drawFrame } from '../grid/draw';
import type { FontOverrides, Glyph, LEDGrid } from '../grid/ledGrid';
import { type FontStore, GLYPH_COLS, GLYPH_ROWS, blankGlyph, copyGlyph } from '../storage/fontStore';
import { Game } from '../games/base';
import type { InputFrame } from '../games/input';
import { playBeep } from '../games/sound';
import { CURSOR_COLOR, type Cursor, FRAME_COLOR, moveCursor, saveWithFeedback } from './shared';

export const FONT_CHARSET = 'ABCDEFGHIJKLMNOPQRSTUVWXYZ0123456789 -';

// Atlas: 4 columns x 3 rows of 3x5 glyphs with a 1px gutter
const ATLAS_COLUMNS = 4;
const ATLAS_ROWS = 3;
const ATLAS_CELL_W = 4;
const ATLAS_CELL_H = 6;
export const ATLAS_PAGE_SIZE = ATLAS_COLUMNS * ATLAS_ROWS;
const ATLAS_PAGES = Math.ceil(FONT_CHARSET.length / ATLAS_PAGE_SIZE);

// Edit view: glyph magnified x3 at (1,1)
const EDIT_ORIGIN = 1;
const EDIT_SCALE = 3;

const GLYPH_COLOR: Color = [120, 200, 255];
const ON_COLOR: Color = [0, 255, 255];
const LABEL_COLOR: Color = [120, 120, 120];

export type FontEditorMode = 'atlas' | 'edit';

export class FontEditor extends Game {
  mode: FontEditorMode = 'atlas';
  atlasPage = 0;
  charIndex = 0;
  cursor: Cursor = { x: 0, y: 0 };
  glyph: Glyph = blankGlyph();

  constructor(
    grid: LEDGrid,
    private readonly store: FontStore,
    initialChar = 'A',
  ) {
    super(grid);
    this.selectChar(initialChar);
    this.atlasPage = Math.floor(this.charIndex / ATLAS_PAGE_SIZE);
  }

  get currentChar(): string {
    return FONT_CHARSET[this.charIndex];
  }

  /** Switch to a character and load its saved glyph; unknown characters pick the first */
  selectChar(char: string): void {
    const index = FONT_CHARSET.indexOf(char.toUpperCase());
    this.charIndex = index >= 0 ? index : 0;
    const saved = this.store.getGlyph(this.currentChar);
    this.glyph = saved ?? blankGlyph();
  }

  /** Saved overrides plus the glyph being edited */
  previewOverrides(): FontOverrides {
    const overrides = this.store.getOverrides();
    overrides[this.currentChar] = copyGlyph(this.glyph);
    return overrides;
  }

  atlasItems(): string[] {
    const start = this.atlasPage * ATLAS_PAGE_SIZE;
    return [...FONT_CHARSET.slice(start, start + ATLAS_PAGE_SIZE)];
  }

  /** Character under an atlas LED, null for gutters and empty cells */
  atlasCharAt(gx: number, gy: number): string | null {
    const col = Math.floor(gx / ATLAS_CELL_W);
    const row = Math.floor(gy / ATLAS_CELL_H);
    if (gx < 0 || gy < 0 || col >= ATLAS_COLUMNS || row >= ATLAS_ROWS) return null;
    if (gx % ATLAS_CELL_W >= GLYPH_COLS || gy % ATLAS_CELL_H >= GLYPH_ROWS) return null;
    return this.atlasItems()[row * ATLAS_COLUMNS + col] ?? null;
  }

  /** Glyph cell under an edit-view LED */
  glyphCellAt(gx: number, gy: number): Cursor | null {
    const x = gx - EDIT_ORIGIN;
    const y = gy - EDIT_ORIGIN;
    if (x < 0 || y < 0 || x >= GLYPH_COLS * EDIT_SCALE || y >= GLYPH_ROWS * EDIT_SCALE) return null;
    return { x: Math.floor(x / EDIT_SCALE), y: Math.floor(y / EDIT_SCALE) };
  }

  toggleCell(): void {
    const row = this.glyph[this.cursor.y];
    row[this.cursor.x] = row[this.cursor.x] ? 0 : 1;
  }

  save(): boolean {
    return saveWithFeedback('FontEditor', () => {
      this.store.setGlyph(this.currentChar, this.glyph);
      this.store.save();
    });
  }

  /** Drop the override so the built-in glyph applies again */
  reset(): boolean {
    this.glyph = blankGlyph();
    return saveWithFeedback('FontEditor', () => {
      this.store.clearGlyph(this.currentChar);
      this.store.save();
    });
  }

  update(_dt: number): void {}

  // ==========================================================================
  // Rendering
  // ==========================================================================

  render(): void {
    this.grid.clear();
    this.grid.setFontOverrides(this.previewOverrides());
    if (this.mode === 'atlas') {
      this.renderAtlas();
    } else {
      this.renderEditor();
    }
  }

  private renderAtlas(): void {
    this.atlasItems().forEach((char, i) => {
      const x = (i % ATLAS_COLUMNS) * ATLAS_CELL_W;
      const y = Math.floor(i / ATLAS_COLUMNS) * ATLAS_CELL_H;
      for (let dx = 0; dx < GLYPH_COLS; dx++) this.grid.setPixel(x + dx, y + GLYPH_ROWS, FRAME_COLOR);
      for (let dy = 0; dy < GLYPH_ROWS; dy++) this.grid.setPixel(x + GLYPH_COLS, y + dy, FRAME_COLOR);
      this.grid.renderText(char, x, y, char === this.currentChar ? CURSOR_COLOR : GLYPH_COLOR);
    });

    // Page indicator down the right edge
    for (let page = 0; page < ATLAS_PAGES; page++) {
      this.grid.setPixel(17, 1 + page * 2, page === this.atlasPage ? CURSOR_COLOR : FRAME_COLOR);
    }
  }

  private renderEditor(): void {
    drawFrame(this.grid, 0, 0, GLYPH_COLS * EDIT_SCALE + 2, GLYPH_ROWS * EDIT_SCALE + 2, FRAME_COLOR);

    this.glyph.forEach((row, y) => {
      row.forEach((cell, x) => {
        if (!cell) return;
        this.grid.fillRect(EDIT_ORIGIN + x * EDIT_SCALE, EDIT_ORIGIN + y * EDIT_SCALE, EDIT_SCALE, EDIT_SCALE, ON_COLOR);
      });
    });

    const cx = EDIT_ORIGIN + this.cursor.x * EDIT_SCALE;
    const cy = EDIT_ORIGIN + this.cursor.y * EDIT_SCALE;
    drawFrame(this.grid, cx, cy, EDIT_SCALE, EDIT_SCALE, CURSOR_COLOR);

    this.grid.renderText('CH', 12, 0, [140, 140, 140]);
    this.grid.renderText(this.currentChar, 16, 6, [255, 255, 255]);
    this.grid.renderText('S', 12, 12, LABEL_COLOR);
    this.grid.renderText('R', 16, 12, LABEL_COLOR);
  }

  // ==========================================================================
  // Input
  // ==========================================================================

  handleInput(input: InputFrame): void {
    for (const click of input.clicks) {
      if (click.button !== 'left') continue;
      if (this.mode === 'atlas') {
        const char = this.atlasCharAt(click.x, click.y);
        if (char === null) continue;
        this.selectChar(char);
        this.mode = 'edit';
        playBeep(740, 20);
      } else {
        const cell = this.glyphCellAt(click.x, click.y);
        if (!cell) continue;
        this.cursor = cell;
        this.toggleCell();
        playBeep(660, 15);
      }
    }

    for (const key of input.pressed) {
      if (key === 'Escape') {
        this.running = false;
        return;
      }
      if (key === 'Tab') {
        this.mode = this.mode === 'atlas' ? 'edit' : 'atlas';
        if (this.mode === 'atlas') this.atlasPage = Math.floor(this.charIndex / ATLAS_PAGE_SIZE);
        playBeep(520, 20);
        continue;
      }

      if (this.mode === 'atlas') {
        this.handleAtlasKey(key);
      } else {
        this.handleEditKey(key);
      }
    }
  }

  private handleAtlasKey(key: string): void {
    if (key === 'ArrowRight') {
      this.atlasPage = (this.atlasPage + 1) % ATLAS_PAGES;
      playBeep(520, 25);
    } else if (key === 'ArrowLeft') {
      this.atlasPage = (this.atlasPage - 1 + ATLAS_PAGES) % ATLAS_PAGES;
      playBeep(420, 25);
    } else if (key.length === 1 && FONT_CHARSET.includes(key.toUpperCase())) {
      this.selectChar(key);
      this.mode = 'edit';
      playBeep(520, 20);
    }
  }

  private handleEditKey(key: string): void {
    if (moveCursor(this.cursor, key, GLYPH_COLS, GLYPH_ROWS)) return;

    switch (key) {
      case ' ':
        this.toggleCell();
        playBeep(660, 15);
        break;
      case 'Backspace':
        this.glyph[this.cursor.y][this.cursor.x] = 0;
        playBeep(320, 15);
        break;
      case 's':
        this.save();
        break;
      case 'r':
        if (this.reset()) playBeep(320, 40);
        break;
    }
  }
}
