/**
 * Terminal renderer for the LED grid
 *
 * Each LED is drawn as a block of `2*size` columns by `size` rows using
 * 24-bit background colors. Unlit LEDs keep a faint tint so the matrix
 * stays visible. Circular style masks the block with an ellipse, draws a
 * dim glow in the corners of lit LEDs and a highlight near the top-left.
 */

import { type Color, brighten, dimColor, isBlack, scaleColor } from './color';
import type { LEDGrid } from './ledGrid';

const RESET = '\x1b[0m';

function bg(color: Color): string {
  return `\x1b[48;2;${color[0]};${color[1]};${color[2]}m`;
}

function fg(color: Color): string {
  return `\x1b[38;2;${color[0]};${color[1]};${color[2]}m`;
}

/** Cell styles collected for one LED footprint */
type Cell = { kind: 'bg'; color: Color } | { kind: 'glyph'; glyph: string; color: Color } | { kind: 'empty' };

/** Is cell (i, j) inside the ellipse inscribed in a w by h box */
function insideEllipse(i: number, j: number, w: number, h: number): boolean {
  const nx = (i + 0.5 - w / 2) / (w / 2);
  const ny = (j + 0.5 - h / 2) / (h / 2);
  return nx * nx + ny * ny <= 1.0001;
}

/**
 * Lay out the cells of one LED.
 */
export function ledCells(grid: LEDGrid, color: Color): Cell[][] {
  const w = grid.cellWidth;
  const h = grid.cellHeight;
  const lit = !isBlack(color);
  const dim = dimColor(color);

  // Single-row LEDs are too small for masks; use glyphs instead
  if (h === 1) {
    if (grid.circularMode) {
      return [[{ kind: 'glyph', glyph: lit ? '●' : '·', color: lit ? color : dimColor(color, 10, 40) }, { kind: 'empty' }]];
    }
    return [[{ kind: 'bg', color: lit ? color : dim }, { kind: 'bg', color: lit ? color : dim }]];
  }

  const insetX = Math.min(grid.ledGap, Math.floor((w - 1) / 2));
  const insetY = Math.min(grid.ledGap, Math.floor((h - 1) / 2));
  const litW = w - insetX * 2;
  const litH = h - insetY * 2;
  const glow = scaleColor(color, 1 / 3);
  const highlight = brighten(color, 80);
  let highlightPlaced = false;

  const rows: Cell[][] = [];
  for (let j = 0; j < h; j++) {
    const row: Cell[] = [];
    for (let i = 0; i < w; i++) {
      const li = i - insetX;
      const lj = j - insetY;
      const inLitArea = li >= 0 && li < litW && lj >= 0 && lj < litH;

      if (!grid.circularMode) {
        row.push({ kind: 'bg', color: inLitArea && lit ? color : dim });
        continue;
      }

      if (inLitArea && insideEllipse(li, lj, litW, litH)) {
        if (!lit) {
          row.push({ kind: 'bg', color: dim });
        } else if (!highlightPlaced && h >= 3 && lj >= Math.floor(litH / 4) && li >= Math.floor(litW / 4)) {
          row.push({ kind: 'bg', color: highlight });
          highlightPlaced = true;
        } else {
          row.push({ kind: 'bg', color });
        }
      } else if (lit && insideEllipse(i, j, w, h)) {
        row.push({ kind: 'bg', color: glow });
      } else {
        row.push({ kind: 'empty' });
      }
    }
    rows.push(row);
  }
  return rows;
}

function cellToAnsi(cell: Cell): string {
  switch (cell.kind) {
    case 'bg':
      return `${bg(cell.color)} `;
    case 'glyph':
      return `${RESET}${fg(cell.color)}${cell.glyph}`;
    case 'empty':
      return `${RESET} `;
  }
}

/**
 * Render the whole grid to an ANSI string positioned at the grid offsets.
 * `originRow`/`originCol` are 0-based terminal offsets of the grid area.
 */
export function renderGrid(grid: LEDGrid, originCol = 0, originRow = 0): string {
  let output = '';
  const footprints = new Map<string, Cell[][]>();

  for (let y = 0; y < grid.gridSize; y++) {
    const lines: string[] = Array.from({ length: grid.cellHeight }, () => '');
    for (let x = 0; x < grid.gridSize; x++) {
      const color = grid.getPixel(x, y);
      const key = color.join(',');
      let cells = footprints.get(key);
      if (!cells) {
        cells = ledCells(grid, color);
        footprints.set(key, cells);
      }
      for (let j = 0; j < cells.length; j++) {
        lines[j] += cells[j].map(cellToAnsi).join('');
        if (x < grid.gridSize - 1 && grid.ledSpacing > 0) {
          lines[j] += `${RESET}${' '.repeat(grid.ledSpacing * 2)}`;
        }
      }
    }
    for (let j = 0; j < lines.length; j++) {
      const row = originRow + grid.offsetY + y * grid.pitchY + j;
      const col = originCol + grid.offsetX;
      output += `\x1b[${row + 1};${col + 1}H${lines[j]}${RESET}`;
    }
  }
  return output;
}

export type HelpLayout = 'portrait' | 'landscape';

/** Columns reserved for the help panel in landscape layout */
export const HELP_PANEL_WIDTH = 30;
/** Rows reserved for the help panel in portrait layout */
export const HELP_PANEL_HEIGHT = 3;

/**
 * Help text around the grid: below it in portrait, to its right in landscape.
 */
export function renderHelp(
  grid: LEDGrid,
  lines: readonly string[],
  layout: HelpLayout,
  color: string,
  subtle: string,
): string {
  let output = '';
  if (layout === 'portrait') {
    const top = grid.offsetY + grid.totalHeight + 1;
    lines.forEach((line, i) => {
      const text = line.slice(0, Math.max(0, grid.windowCols));
      const col = Math.max(0, Math.floor((grid.windowCols - text.length) / 2));
      output += `\x1b[${top + i + 1};1H\x1b[2K\x1b[${col + 1}G${i === 0 ? color : subtle}${text}${RESET}`;
    });
  } else {
    const left = grid.offsetX + grid.totalWidth + 3;
    const top = grid.offsetY + Math.max(0, Math.floor((grid.totalHeight - lines.length) / 2));
    lines.forEach((line, i) => {
      const text = line.slice(0, HELP_PANEL_WIDTH - 2);
      output += `\x1b[${top + i + 1};${left + 1}H\x1b[K${i === 0 ? color : subtle}${text}${RESET}`;
    });
  }
  return output;
}
