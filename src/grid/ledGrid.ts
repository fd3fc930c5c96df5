/**
 * LED Grid: simulated 19x19 RGB LED matrix
 *
 * Holds the pixel buffer every screen draws into, the 3x5 bitmap font,
 * and the runtime display parameters (LED size, spacing, gap, style)
 * used by the terminal renderer to lay the grid out.
 */

import { type Color, BLACK, coerceColor } from './color';
import builtinFont from './font3x5.json';

// ============================================================================
// Constants
// ============================================================================

export const GRID_SIZE = 19;

/** A 3x5 glyph: five rows of three 0/1 cells */
export type Glyph = number[][];
export type FontOverrides = Record<string, Glyph>;

const BUILTIN_FONT: Readonly<Record<string, Glyph>> = builtinFont;

/** LED footprint height in terminal rows; width is twice that in columns */
export const LED_SIZE_RANGE = { min: 1, max: 4, initial: 1 } as const;
/** Rows between LEDs (columns are doubled) */
export const LED_SPACING_RANGE = { min: 0, max: 3, initial: 0 } as const;
/** Unlit border inside each LED footprint */
export const LED_GAP_RANGE = { min: 0, max: 2, initial: 0 } as const;

export interface GridPoint {
  x: number;
  y: number;
}

function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

// ============================================================================
// LEDGrid
// ============================================================================

export class LEDGrid {
  readonly gridSize = GRID_SIZE;

  ledSize: number = LED_SIZE_RANGE.initial;
  ledSpacing: number = LED_SPACING_RANGE.initial;
  ledGap: number = LED_GAP_RANGE.initial;
  circularMode = true;

  windowCols: number;
  windowRows: number;
  offsetX = 0;
  offsetY = 0;

  private pixels: Color[][];
  private fontOverrides: FontOverrides = {};

  constructor(windowCols = 80, windowRows = 24) {
    this.windowCols = windowCols;
    this.windowRows = windowRows;
    this.pixels = Array.from({ length: GRID_SIZE }, () =>
      Array.from({ length: GRID_SIZE }, (): Color => BLACK)
    );
    this.updateGridOffset();
  }

  // --------------------------------------------------------------------------
  // Layout
  // --------------------------------------------------------------------------

  /** Terminal columns taken by one LED */
  get cellWidth(): number {
    return this.ledSize * 2;
  }

  /** Terminal rows taken by one LED */
  get cellHeight(): number {
    return this.ledSize;
  }

  get pitchX(): number {
    return this.cellWidth + this.ledSpacing * 2;
  }

  get pitchY(): number {
    return this.cellHeight + this.ledSpacing;
  }

  /** Total grid footprint in terminal cells */
  get totalWidth(): number {
    return this.pitchX * GRID_SIZE - this.ledSpacing * 2;
  }

  get totalHeight(): number {
    return this.pitchY * GRID_SIZE - this.ledSpacing;
  }

  /** Update the hosting area size (e.g. on resize or layout toggle) */
  updateWindowSize(cols: number, rows: number): void {
    this.windowCols = cols;
    this.windowRows = rows;
    this.updateGridOffset();
  }

  /** Center the grid within the hosting area */
  updateGridOffset(): void {
    this.offsetX = Math.max(0, Math.floor((this.windowCols - this.totalWidth) / 2));
    this.offsetY = Math.max(0, Math.floor((this.windowRows - this.totalHeight) / 2));
  }

  adjustLedSize(delta: number): void {
    this.ledSize = clamp(this.ledSize + delta, LED_SIZE_RANGE.min, LED_SIZE_RANGE.max);
    this.updateGridOffset();
  }

  adjustLedSpacing(delta: number): void {
    this.ledSpacing = clamp(this.ledSpacing + delta, LED_SPACING_RANGE.min, LED_SPACING_RANGE.max);
    this.updateGridOffset();
  }

  adjustLedGap(delta: number): void {
    this.ledGap = clamp(this.ledGap + delta, LED_GAP_RANGE.min, LED_GAP_RANGE.max);
  }

  toggleStyle(): void {
    this.circularMode = !this.circularMode;
  }

  /**
   * Map a 0-based terminal cell to the LED under it.
   * Returns null for cells outside the grid or in the spacing between LEDs.
   */
  screenToGrid(col: number, row: number): GridPoint | null {
    const relX = col - this.offsetX;
    const relY = row - this.offsetY;
    if (relX < 0 || relY < 0) return null;
    const x = Math.floor(relX / this.pitchX);
    const y = Math.floor(relY / this.pitchY);
    if (x >= GRID_SIZE || y >= GRID_SIZE) return null;
    if (relX % this.pitchX >= this.cellWidth) return null;
    if (relY % this.pitchY >= this.cellHeight) return null;
    return { x, y };
  }

  // --------------------------------------------------------------------------
  // Pixels
  // --------------------------------------------------------------------------

  inBounds(x: number, y: number): boolean {
    return Number.isFinite(x) && Number.isFinite(y) &&
      x >= 0 && x < GRID_SIZE && y >= 0 && y < GRID_SIZE;
  }

  /** Set a single LED; fractional coordinates truncate, out-of-bounds writes are ignored */
  setPixel(x: number, y: number, color: readonly number[]): void {
    if (!this.inBounds(x, y)) return;
    this.pixels[Math.trunc(y)][Math.trunc(x)] = coerceColor(color);
  }

  getPixel(x: number, y: number): Color {
    if (!this.inBounds(x, y)) return BLACK;
    return this.pixels[Math.trunc(y)][Math.trunc(x)];
  }

  clear(color: Color = BLACK): void {
    const c = coerceColor(color);
    for (const row of this.pixels) {
      row.fill(c);
    }
  }

  fillRect(x: number, y: number, width: number, height: number, color: Color): void {
    for (let dy = 0; dy < height; dy++) {
      for (let dx = 0; dx < width; dx++) {
        this.setPixel(x + dx, y + dy, color);
      }
    }
  }

  /** Bresenham line, endpoints inclusive */
  drawLine(x1: number, y1: number, x2: number, y2: number, color: Color): void {
    x1 = Math.trunc(x1);
    y1 = Math.trunc(y1);
    x2 = Math.trunc(x2);
    y2 = Math.trunc(y2);
    const dx = Math.abs(x2 - x1);
    const dy = Math.abs(y2 - y1);
    const sx = x1 < x2 ? 1 : -1;
    const sy = y1 < y2 ? 1 : -1;
    let err = dx - dy;
    let x = x1;
    let y = y1;

    for (;;) {
      this.setPixel(x, y, color);
      if (x === x2 && y === y2) break;
      const e2 = 2 * err;
      if (e2 > -dy) {
        err -= dy;
        x += sx;
      }
      if (e2 < dx) {
        err += dx;
        y += sy;
      }
    }
  }

  // --------------------------------------------------------------------------
  // Text
  // --------------------------------------------------------------------------

  /**
   * Render text with the 3x5 font. Characters without a glyph are skipped
   * without advancing. Spacing is in unscaled pixels.
   */
  renderText(text: string, x: number, y: number, color: Color, scale = 1, spacing = 1): void {
    let cursorX = x;
    const advance = 3 * scale + Math.max(0, Math.trunc(spacing)) * scale;

    for (const char of text.toUpperCase()) {
      const glyph = this.glyphFor(char);
      if (!glyph) continue;
      for (let dy = 0; dy < 5; dy++) {
        for (let dx = 0; dx < 3; dx++) {
          if (!glyph[dy]?.[dx]) continue;
          for (let sy = 0; sy < scale; sy++) {
            for (let sx = 0; sx < scale; sx++) {
              this.setPixel(cursorX + dx * scale + sx, y + dy * scale + sy, color);
            }
          }
        }
      }
      cursorX += advance;
    }
  }

  renderNumber(value: number, x: number, y: number, color: Color, scale = 1): void {
    this.renderText(String(value), x, y, color, scale);
  }

  /** Resolve a glyph, preferring overrides */
  glyphFor(char: string): Glyph | undefined {
    return this.fontOverrides[char] ?? BUILTIN_FONT[char];
  }

  setFontOverrides(overrides: FontOverrides | null): void {
    this.fontOverrides = overrides ? { ...overrides } : {};
  }

  getFontOverrides(): FontOverrides {
    return this.fontOverrides;
  }
}
