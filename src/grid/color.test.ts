import { describe, it, expect } from 'vitest';
import { coerceColor, blendColors, hsvToRgb, dimColor } from './color';

describe('coerceColor', () => {
  it('maps non-triples to black', () => {
    expect(coerceColor(123)).toEqual([0, 0, 0]);
    expect(coerceColor([1, 2, 3, 4])).toEqual([0, 0, 0]);
    expect(coerceColor(null)).toEqual([0, 0, 0]);
  });

  it('zeroes channels that are not numbers', () => {
    expect(coerceColor(['a', 10, 300])).toEqual([0, 10, 255]);
  });
});

describe('color math', () => {
  it('blends linearly', () => {
    expect(blendColors([0, 0, 0], [200, 100, 50], 0.5)).toEqual([100, 50, 25]);
  });

  it('converts primary hues', () => {
    expect(hsvToRgb(0, 1, 1)).toEqual([255, 0, 0]);
    expect(hsvToRgb(120, 1, 1)).toEqual([0, 255, 0]);
    expect(hsvToRgb(240, 1, 1)).toEqual([0, 0, 255]);
    expect(hsvToRgb(360, 1, 1)).toEqual([255, 0, 0]);
  });

  it('keeps a floor on dimmed channels', () => {
    expect(dimColor([0, 200, 255])).toEqual([5, 20, 25]);
  });
});
