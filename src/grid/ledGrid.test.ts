import { describe, it, expect, vi } from 'vitest';
import { LEDGrid, GRID_SIZE } from './ledGrid';

describe('LEDGrid pixels', () => {
  it('rounds and clamps color channels', () => {
    const grid = new LEDGrid();
    grid.setPixel(0, 0, [12.7, -5, 9999]);
    expect(grid.getPixel(0, 0)).toEqual([13, 0, 255]);
  });

  it('stores black for a color of the wrong shape', () => {
    const grid = new LEDGrid();
    grid.setPixel(1, 0, [200, 100]);
    expect(grid.getPixel(1, 0)).toEqual([0, 0, 0]);
  });

  it('ignores out-of-bounds writes and reads black there', () => {
    const grid = new LEDGrid();
    grid.setPixel(GRID_SIZE, 0, [255, 255, 255]);
    grid.setPixel(-1, 3, [255, 255, 255]);
    expect(grid.getPixel(GRID_SIZE, 0)).toEqual([0, 0, 0]);
    expect(grid.getPixel(-1, 3)).toEqual([0, 0, 0]);
  });

  it('clears to a color and fills rectangles', () => {
    const grid = new LEDGrid();
    grid.clear([1, 2, 3]);
    expect(grid.getPixel(18, 18)).toEqual([1, 2, 3]);

    grid.fillRect(17, 17, 5, 5, [9, 9, 9]);
    expect(grid.getPixel(17, 17)).toEqual([9, 9, 9]);
    expect(grid.getPixel(18, 18)).toEqual([9, 9, 9]);
    expect(grid.getPixel(16, 17)).toEqual([1, 2, 3]);
  });

  it('draws lines with both endpoints', () => {
    const grid = new LEDGrid();
    grid.drawLine(0, 0, 3, 3, [255, 0, 0]);
    for (let i = 0; i <= 3; i++) {
      expect(grid.getPixel(i, i)).toEqual([255, 0, 0]);
    }
    expect(grid.getPixel(1, 0)).toEqual([0, 0, 0]);
  });

  it('truncates fractional line endpoints', () => {
    const grid = new LEDGrid();
    const setPixel = vi.spyOn(grid, 'setPixel');
    grid.drawLine(0.5, 0, 5.7, 0, [255, 0, 0]);
    expect(setPixel).toHaveBeenCalledTimes(6);
    for (let x = 0; x <= 5; x++) {
      expect(grid.getPixel(x, 0)).toEqual([255, 0, 0]);
    }
    expect(grid.getPixel(6, 0)).toEqual([0, 0, 0]);
  });
});

describe('LEDGrid text', () => {
  it('renders with font overrides', () => {
    const grid = new LEDGrid();
    grid.setFontOverrides({
      A: [[0, 1, 0], [0, 0, 0], [0, 0, 0], [0, 0, 0], [0, 0, 0]],
    });
    grid.renderText('A', 0, 0, [9, 8, 7]);

    expect(grid.getPixel(1, 0)).toEqual([9, 8, 7]);
    expect(grid.getPixel(0, 0)).toEqual([0, 0, 0]);
    expect(grid.getPixel(2, 0)).toEqual([0, 0, 0]);
    expect(grid.getPixel(0, 1)).toEqual([0, 0, 0]);
  });

  it('upper-cases text and advances by glyph width plus spacing', () => {
    const grid = new LEDGrid();
    grid.renderText('-a', 0, 0, [255, 255, 255]);
    // '-' lights its middle row
    expect(grid.getPixel(0, 2)).toEqual([255, 255, 255]);
    // 'A' starts four pixels in with its top-center lit
    expect(grid.getPixel(5, 0)).toEqual([255, 255, 255]);
    expect(grid.getPixel(4, 0)).toEqual([0, 0, 0]);
  });

  it('skips unknown characters without advancing', () => {
    const grid = new LEDGrid();
    grid.renderText('?1', 0, 0, [0, 0, 255]);
    // '1' top row is 0,1,0
    expect(grid.getPixel(1, 0)).toEqual([0, 0, 255]);
  });

  it('scales glyphs', () => {
    const grid = new LEDGrid();
    grid.renderText('-', 0, 0, [255, 0, 0], 2);
    expect(grid.getPixel(0, 4)).toEqual([255, 0, 0]);
    expect(grid.getPixel(5, 5)).toEqual([255, 0, 0]);
    expect(grid.getPixel(0, 3)).toEqual([0, 0, 0]);
  });

  it('clears overrides with null', () => {
    const grid = new LEDGrid();
    grid.setFontOverrides({ A: [[1, 1, 1], [1, 1, 1], [1, 1, 1], [1, 1, 1], [1, 1, 1]] });
    grid.setFontOverrides(null);
    expect(grid.getFontOverrides()).toEqual({});
  });
});

describe('LEDGrid layout', () => {
  it('clamps display parameters', () => {
    const grid = new LEDGrid(200, 100);
    grid.adjustLedSize(10);
    expect(grid.ledSize).toBe(4);
    grid.adjustLedSpacing(-3);
    expect(grid.ledSpacing).toBe(0);
    grid.adjustLedGap(5);
    expect(grid.ledGap).toBe(2);
  });

  it('centers the grid in the window', () => {
    const grid = new LEDGrid(80, 25);
    // size 1: 38 columns by 19 rows
    expect(grid.totalWidth).toBe(38);
    expect(grid.totalHeight).toBe(19);
    expect(grid.offsetX).toBe(21);
    expect(grid.offsetY).toBe(3);
  });

  it('maps terminal cells back to LEDs', () => {
    const grid = new LEDGrid(80, 25);
    grid.adjustLedSpacing(1);
    // pitch is 4 columns by 2 rows; total 74 by 37, offsets 3 and 0
    expect(grid.offsetX).toBe(3);
    expect(grid.screenToGrid(3, 0)).toEqual({ x: 0, y: 0 });
    expect(grid.screenToGrid(8, 2)).toEqual({ x: 1, y: 1 });
    expect(grid.screenToGrid(5, 0)).toBeNull();
    expect(grid.screenToGrid(3, 1)).toBeNull();
    expect(grid.screenToGrid(2, 0)).toBeNull();
  });
});
