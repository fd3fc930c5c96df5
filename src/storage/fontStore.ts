/**
 * Font store for user-editable 3x5 glyph overrides
 *
 * Glyphs are binary masks used by LEDGrid.renderText(). Only overrides
 * are stored; missing characters fall back to the built-in font.
 *
 *   { "A": [[0,1,0],[1,0,1],[1,1,1],[1,0,1],[1,0,1]] }
 */

import { resolve } from 'path';
import type { FontOverrides, Glyph } from '../grid/ledGrid';
import { readJsonObject, writeJsonObject } from './json';

export const FONT_FILE = 'font_overrides.json';

export const GLYPH_ROWS = 5;
export const GLYPH_COLS = 3;

/** Validate a 5x3 glyph, normalising cells to 0/1. Null when the shape is wrong. */
export function coerceGlyph(raw: unknown): Glyph | null {
  if (!Array.isArray(raw) || raw.length !== GLYPH_ROWS) return null;
  const out: Glyph = [];
  for (const row of raw) {
    if (!Array.isArray(row) || row.length !== GLYPH_COLS) return null;
    const cells: number[] = [];
    for (const cell of row) {
      if (typeof cell !== 'number' && typeof cell !== 'boolean') return null;
      cells.push(Math.trunc(Number(cell)) ? 1 : 0);
    }
    out.push(cells);
  }
  return out;
}

export function copyGlyph(glyph: Glyph): Glyph {
  return glyph.map(row => [...row]);
}

export function blankGlyph(): Glyph {
  return Array.from({ length: GLYPH_ROWS }, () => Array.from({ length: GLYPH_COLS }, () => 0));
}

export class FontStore {
  private overrides: FontOverrides = {};

  constructor(readonly path: string = resolve('data', FONT_FILE)) {}

  load(): void {
    this.overrides = {};
    const raw = readJsonObject(this.path, 'FontStore');
    if (!raw) return;

    for (const [key, value] of Object.entries(raw)) {
      const glyph = coerceGlyph(value);
      if (!glyph) {
        console.warn(`[FontStore] Skipping malformed glyph "${key}"`);
        continue;
      }
      this.overrides[key.toUpperCase()] = glyph;
    }
  }

  /** Throws when the file cannot be written */
  save(): void {
    writeJsonObject(this.path, this.getOverrides());
  }

  /** A copy; mutating it does not touch the store */
  getOverrides(): FontOverrides {
    const copy: FontOverrides = {};
    for (const [key, glyph] of Object.entries(this.overrides)) {
      copy[key] = copyGlyph(glyph);
    }
    return copy;
  }

  setOverrides(overrides: FontOverrides): void {
    this.overrides = {};
    for (const [key, glyph] of Object.entries(overrides)) {
      this.setGlyph(key, glyph);
    }
  }

  /** Invalid glyphs are ignored */
  setGlyph(char: string, glyph: unknown): void {
    const coerced = coerceGlyph(glyph);
    if (!coerced) return;
    this.overrides[char.toUpperCase()] = coerced;
  }

  clearGlyph(char: string): void {
    delete this.overrides[char.toUpperCase()];
  }

  getGlyph(char: string): Glyph | undefined {
    const glyph = this.overrides[char.toUpperCase()];
    return glyph ? copyGlyph(glyph) : undefined;
  }
}
