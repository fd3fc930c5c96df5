import { describe, it, expect } from 'vitest';
import { HINT, HUD_LEFT, HUD_RIGHT, TITLE, centeredX, textWidth } from './textLayout';

describe('text zones', () => {
  it('splits the top of the grid into two HUD halves', () => {
    expect(HUD_LEFT).toEqual({ x: 0, y: 0, w: 9, h: 7 });
    expect(HUD_RIGHT).toEqual({ x: 10, y: 0, w: 9, h: 7 });
    expect(HUD_LEFT.x + HUD_LEFT.w).toBeLessThan(HUD_RIGHT.x);
  });

  it('keeps title and hint at opposite edges', () => {
    expect(TITLE).toEqual({ x: 0, y: 0, w: 19, h: 5 });
    expect(HINT.y + HINT.h).toBe(19);
  });

  it('measures text with unscaled spacing', () => {
    expect(textWidth(2)).toBe(8);
    expect(textWidth(2, 2)).toBe(16);
  });

  it('centers text inside a HUD zone', () => {
    expect(centeredX(HUD_LEFT, 1)).toBe(2);
    expect(centeredX(HUD_RIGHT, 2)).toBe(10);
  });

  it('pins text wider than the zone to its left edge', () => {
    expect(centeredX(HUD_RIGHT, 5)).toBe(10);
  });
});
