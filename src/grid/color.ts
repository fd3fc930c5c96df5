/**
 * RGB color helpers for the LED grid
 */

/** An RGB triple, each channel 0..255 */
export type Color = readonly [number, number, number];

export const BLACK: Color = [0, 0, 0];
export const WHITE: Color = [255, 255, 255];

function clampChannel(value: unknown): number {
  const n = typeof value === 'number' ? value : Number(value);
  if (!Number.isFinite(n)) return 0;
  const rounded = Math.round(n);
  return rounded < 0 ? 0 : rounded > 255 ? 255 : rounded;
}

/**
 * Coerce arbitrary color-like input into an integer RGB triple.
 * Anything that is not a three-element array becomes black.
 */
export function coerceColor(value: unknown): Color {
  if (!Array.isArray(value) || value.length !== 3) return BLACK;
  return [clampChannel(value[0]), clampChannel(value[1]), clampChannel(value[2])];
}

export function isBlack(color: Color): boolean {
  return color[0] === 0 && color[1] === 0 && color[2] === 0;
}

/** Blend two colors, alpha 0 = a, 1 = b */
export function blendColors(a: Color, b: Color, alpha: number): Color {
  return [
    Math.trunc(a[0] * (1 - alpha) + b[0] * alpha),
    Math.trunc(a[1] * (1 - alpha) + b[1] * alpha),
    Math.trunc(a[2] * (1 - alpha) + b[2] * alpha),
  ];
}

/** Multiply every channel, truncating toward zero */
export function scaleColor(color: Color, factor: number): Color {
  return coerceColor([
    Math.trunc(color[0] * factor),
    Math.trunc(color[1] * factor),
    Math.trunc(color[2] * factor),
  ]);
}

/** Unlit LED tint: a tenth of the color with a floor so the LED stays visible */
export function dimColor(color: Color, divisor = 10, floor = 5): Color {
  return [
    Math.max(floor, Math.floor(color[0] / divisor)),
    Math.max(floor, Math.floor(color[1] / divisor)),
    Math.max(floor, Math.floor(color[2] / divisor)),
  ];
}

export function brighten(color: Color, amount: number): Color {
  return coerceColor([color[0] + amount, color[1] + amount, color[2] + amount]);
}

/**
 * HSV to RGB (h: 0-360, s: 0-1, v: 0-1)
 */
export function hsvToRgb(h: number, s: number, v: number): Color {
  const hue = (((h / 360) % 1) + 1) % 1;
  if (s === 0) {
    const c = Math.trunc(v * 255);
    return [c, c, c];
  }
  const i = Math.floor(hue * 6);
  const f = hue * 6 - i;
  const p = v * (1 - s);
  const q = v * (1 - s * f);
  const t = v * (1 - s * (1 - f));
  let r: number, g: number, b: number;
  switch (i % 6) {
    case 0: r = v; g = t; b = p; break;
    case 1: r = q; g = v; b = p; break;
    case 2: r = p; g = v; b = t; break;
    case 3: r = p; g = q; b = v; break;
    case 4: r = t; g = p; b = v; break;
    default: r = v; g = p; b = q; break;
  }
  return [Math.trunc(r * 255), Math.trunc(g * 255), Math.trunc(b * 255)];
}
