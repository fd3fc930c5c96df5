/**
 * Race road geometry
 *
 * The road is drawn in fake perspective: narrow at the horizon, wide at
 * the bottom row, with a curve that bends the lower rows the most.
 */

export interface RoadShape {
  size: number;
  horizon: number;
  /** Horizontal bend at the bottom row, in pixels; positive bends right */
  curve: number;
}

/** 0 at (or above) the horizon, 1 at the bottom row */
function depth(road: RoadShape, y: number): number {
  if (y <= road.horizon) return 0;
  return (y - road.horizon) / Math.max(1, road.size - 1 - road.horizon);
}

/** Half the road width at row y, 3 at the horizon growing to 8 */
export function roadHalfWidth(road: RoadShape, y: number): number {
  const row = Math.max(0, Math.min(road.size - 1, y));
  return Math.round(3 + 5 * depth(road, row));
}

export function roadCenterAt(road: RoadShape, y: number): number {
  const center = Math.floor(road.size / 2);
  const t = depth(road, y);
  return Math.round(center + road.curve * t * t);
}
