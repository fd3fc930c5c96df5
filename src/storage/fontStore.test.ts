import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { FontStore, coerceGlyph } from './fontStore';

const GLYPH = [[1, 0, 1], [0, 1, 0], [1, 1, 1], [0, 1, 0], [1, 0, 1]];

describe('coerceGlyph', () => {
  it('normalises truthy cells to 1', () => {
    expect(coerceGlyph([[2, 0, 1], [0, 0, 0], [0, 0, 0], [0, 0, 0], [0, 0, -1]])).toEqual([
      [1, 0, 1], [0, 0, 0], [0, 0, 0], [0, 0, 0], [0, 0, 1],
    ]);
  });

  it('rejects the wrong shape', () => {
    expect(coerceGlyph([[1, 0, 1]])).toBeNull();
    expect(coerceGlyph([[1, 0], [0, 0], [0, 0], [0, 0], [0, 0]])).toBeNull();
    expect(coerceGlyph('A')).toBeNull();
  });
});

describe('FontStore', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'font-'));
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  it('round-trips a glyph and looks it up case-insensitively', () => {
    const path = join(dir, 'font_overrides.json');
    const store = new FontStore(path);
    store.setGlyph('A', GLYPH);
    store.save();

    const reloaded = new FontStore(path);
    reloaded.load();
    const glyph = reloaded.getGlyph('a');
    expect(glyph).toHaveLength(5);
    expect(glyph?.[0]).toEqual([1, 0, 1]);
  });

  it('upper-cases keys when loading', () => {
    const path = join(dir, 'font_overrides.json');
    writeFileSync(path, JSON.stringify({ b: GLYPH, c: [[1]] }));
    const store = new FontStore(path);
    store.load();
    expect(Object.keys(store.getOverrides())).toEqual(['B']);
  });

  it('ignores invalid glyphs and clears overrides', () => {
    const store = new FontStore(join(dir, 'font_overrides.json'));
    store.setGlyph('x', [[1, 1, 1]]);
    expect(store.getGlyph('X')).toBeUndefined();

    store.setGlyph('x', GLYPH);
    store.clearGlyph('X');
    expect(store.getGlyph('x')).toBeUndefined();
  });

  it('returns copies of its overrides', () => {
    const store = new FontStore(join(dir, 'font_overrides.json'));
    store.setGlyph('Z', GLYPH);
    const copy = store.getOverrides();
    copy.Z[0][0] = 0;
    expect(store.getGlyph('Z')?.[0][0]).toBe(1);
  });
});
