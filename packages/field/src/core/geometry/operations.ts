import type { Dimensions, Direction, Point } from "./types";

export function euclideanDistance(a: Point, b: Point): number {
  return Math.hypot(a.x - b.x, a.y - b.y);
}

export function squaredDistance(a: Point, b: Point): number {
  const dx = a.x - b.x;
  const dy = a.y - b.y;
  return dx * dx + dy * dy;
}

export function translate(p: Point, d: Direction, steps = 1): Point {
  return { x: p.x + d.x * steps, y: p.y + d.y * steps };
}

export function reverse(d: Direction): Direction {
  return { x: negate(d.x), y: negate(d.y) };
}

/**
 * Quarter turn clockwise on screen: east becomes south
 */
export function rotateClockwise(d: Direction): Direction {
  return { x: negate(d.y), y: d.x };
}

function negate(v: -1 | 0 | 1): -1 | 0 | 1 {
  return v === 1 ? -1 : v === -1 ? 1 : 0;
}

export function pointsEqual(a: Point, b: Point): boolean {
  return a.x === b.x && a.y === b.y;
}

export function directionsEqual(a: Direction, b: Direction): boolean {
  return a.x === b.x && a.y === b.y;
}

/**
 * Stable string key for sets and maps
 */
export function pointKey(p: Point): string {
  return `${p.x},${p.y}`;
}

/**
 * The four corners of a field, clockwise from the origin
 */
export function corners(dim: Dimensions): [Point, Point, Point, Point] {
  const maxX = dim.width - 1;
  const maxY = dim.height - 1;
  return [
    { x: 0, y: 0 },
    { x: maxX, y: 0 },
    { x: maxX, y: maxY },
    { x: 0, y: maxY },
  ];
}

/**
 * Unit step whose angle is closest to `radians` (0 = east, y downwards)
 */
export function directionFromAngle(radians: number): Direction {
  return {
    x: signOf(Math.round(Math.cos(radians))),
    y: signOf(Math.round(Math.sin(radians))),
  };
}

function signOf(v: number): -1 | 0 | 1 {
  return v > 0 ? 1 : v < 0 ? -1 : 0;
}

export function angleOf(d: Direction): number {
  return Math.atan2(d.y, d.x);
}
