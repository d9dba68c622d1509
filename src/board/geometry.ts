/**
 * Point helpers for component placement.
 * All angles are in degrees. Locations stay on the integer grid.
 */
import type { Point, Vector } from "./types";

const DEG_TO_RAD = Math.PI / 180;

/** Translate a point by a vector. Returns a new point. */
export function translatePoint(p: Point, v: Vector): Point {
  return { x: p.x + v.x, y: p.y + v.y };
}

/**
 * Turn a point counter-clockwise by `factor * 90` degrees around `pole`.
 * Exact, no rounding involved.
 */
export function turn90(p: Point, factor: number, pole: Point): Point {
  const dx = p.x - pole.x;
  const dy = p.y - pole.y;
  switch (normalizeQuarterTurns(factor)) {
    case 1:
      return { x: pole.x - dy, y: pole.y + dx };
    case 2:
      return { x: pole.x - dx, y: pole.y - dy };
    case 3:
      return { x: pole.x + dy, y: pole.y - dx };
    default:
      return { x: p.x, y: p.y };
  }
}

/**
 * Rotate a point counter-clockwise by `angle` degrees around `pole`
 * and round the result back onto the grid.
 */
export function rotatePoint(p: Point, angle: number, pole: Point): Point {
  const rad = angle * DEG_TO_RAD;
  const cos = Math.cos(rad);
  const sin = Math.sin(rad);
  const dx = p.x - pole.x;
  const dy = p.y - pole.y;
  return {
    x: roundToGrid(pole.x + dx * cos - dy * sin),
    y: roundToGrid(pole.y + dx * sin + dy * cos),
  };
}

/** Mirror a point at the vertical line through `pole`. */
export function mirrorVertical(p: Point, pole: Point): Point {
  return { x: 2 * pole.x - p.x, y: p.y };
}

/** Normalize an angle in degrees into [0, 360). */
export function normalizeAngle(angle: number): number {
  const result = angle % 360;
  return result < 0 ? result + 360 : result + 0;
}

function normalizeQuarterTurns(factor: number): number {
  const result = factor % 4;
  return result < 0 ? result + 4 : result;
}

// Math.round maps -0.5 to -0, keep plain zeros out of the pose
function roundToGrid(value: number): number {
  return Math.round(value) + 0;
}
