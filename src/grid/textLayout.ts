/**
 * Text zones for the 19x19 grid
 *
 * Screens place titles, HUD readouts and hints inside these zones so
 * text stays readable and never overlaps the play area by accident.
 */

export interface TextZone {
  readonly x: number;
  readonly y: number;
  readonly w: number;
  readonly h: number;
}

export const TITLE: TextZone = { x: 0, y: 0, w: 19, h: 5 };
export const HINT: TextZone = { x: 0, y: 14, w: 19, h: 5 };
export const HUD_LEFT: TextZone = { x: 0, y: 0, w: 9, h: 7 };
export const HUD_RIGHT: TextZone = { x: 10, y: 0, w: 9, h: 7 };

/** Width in pixels of `chars` characters; spacing is unscaled */
export function textWidth(chars: number, scale = 1, spacing = 1): number {
  return chars * ((3 + spacing) * scale);
}

export function centeredX(zone: TextZone, chars: number, scale = 1, spacing = 1): number {
  const w = textWidth(chars, scale, spacing);
  return zone.x + Math.max(0, Math.floor((zone.w - w) / 2));
}
