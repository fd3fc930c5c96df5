/**
 * Sprite store for user-editable pixel art
 *
 * Persists named sprites (menu logos, card overlays, HUD icons) as JSON:
 *
 *   { "<name>": { "w": 3, "h": 3, "pixels": { "x,y": [r, g, b] } } }
 */

import { resolve } from 'path';
import { type Color, coerceColor } from '../grid/color';
import type { LEDGrid } from '../grid/ledGrid';
import { isRecord, readJsonObject, writeJsonObject } from './json';

export const SPRITES_FILE = 'sprites.json';

function pixelKey(x: number, y: number): string {
  return `${x},${y}`;
}

export class Sprite {
  readonly pixels = new Map<string, Color>();

  constructor(readonly w: number, readonly h: number) {}

  get(x: number, y: number): Color | undefined {
    return this.pixels.get(pixelKey(x, y));
  }

  /** Set a pixel; null erases. Out-of-bounds writes are ignored. */
  set(x: number, y: number, color: Color | null): void {
    if (!Number.isInteger(x) || !Number.isInteger(y)) return;
    if (x < 0 || x >= this.w || y < 0 || y >= this.h) return;
    if (color === null) {
      this.pixels.delete(pixelKey(x, y));
    } else {
      this.pixels.set(pixelKey(x, y), coerceColor(color));
    }
  }

  clear(): void {
    this.pixels.clear();
  }

  *entries(): IterableIterator<{ x: number; y: number; color: Color }> {
    for (const [key, color] of this.pixels) {
      const [x, y] = key.split(',').map(Number);
      yield { x, y, color };
    }
  }

  get size(): number {
    return this.pixels.size;
  }
}

function isDimension(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value > 0;
}

/** Parse one stored sprite; null when any part is malformed */
function parseSprite(raw: unknown): Sprite | null {
  if (!isRecord(raw) || !isDimension(raw.w) || !isDimension(raw.h)) return null;
  const sprite = new Sprite(raw.w, raw.h);
  const pixels = raw.pixels ?? {};
  if (!isRecord(pixels)) return null;

  for (const [key, value] of Object.entries(pixels)) {
    const match = /^(-?\d+),(-?\d+)$/.exec(key);
    if (!match) return null;
    if (!Array.isArray(value) || value.length !== 3 || !value.every(v => typeof v === 'number')) {
      return null;
    }
    sprite.pixels.set(pixelKey(Number(match[1]), Number(match[2])), coerceColor(value));
  }
  return sprite;
}

export class SpriteStore {
  private sprites = new Map<string, Sprite>();

  constructor(readonly path: string = resolve('data', SPRITES_FILE)) {}

  /** Load from disk. Malformed sprites are skipped; a malformed file empties the store. */
  load(): void {
    this.sprites = new Map();
    const raw = readJsonObject(this.path, 'SpriteStore');
    if (!raw) return;

    for (const [name, value] of Object.entries(raw)) {
      const sprite = parseSprite(value);
      if (sprite) {
        this.sprites.set(name, sprite);
      } else {
        console.warn(`[SpriteStore] Skipping malformed sprite "${name}"`);
      }
    }
  }

  /** Write every sprite to disk; throws when the file cannot be written */
  save(): void {
    const raw: Record<string, unknown> = {};
    for (const [name, sprite] of this.sprites) {
      const pixels: Record<string, number[]> = {};
      for (const { x, y, color } of sprite.entries()) {
        pixels[pixelKey(x, y)] = [color[0], color[1], color[2]];
      }
      raw[name] = { w: sprite.w, h: sprite.h, pixels };
    }
    writeJsonObject(this.path, raw);
  }

  get(name: string): Sprite | undefined {
    return this.sprites.get(name);
  }

  /** Existing sprite of this size, or a fresh empty one replacing any other */
  getOrCreate(name: string, w: number, h: number): Sprite {
    const existing = this.sprites.get(name);
    if (existing && existing.w === w && existing.h === h) return existing;
    const sprite = new Sprite(w, h);
    this.sprites.set(name, sprite);
    return sprite;
  }

  names(): string[] {
    return [...this.sprites.keys()].sort();
  }

  delete(name: string): boolean {
    return this.sprites.delete(name);
  }
}

export function drawSprite(grid: LEDGrid, sprite: Sprite, ox: number, oy: number): void {
  for (const { x, y, color } of sprite.entries()) {
    grid.setPixel(ox + x, oy + y, color);
  }
}
