/**
 * Core geometry types. All values are immutable.
 */

/**
 * 2D point with integer coordinates (x = column, y = row)
 */
export interface Point {
  readonly x: number;
  readonly y: number;
}

export interface Dimensions {
  readonly width: number;
  readonly height: number;
}

/**
 * Unit step between neighbouring cells
 */
export interface Direction {
  readonly x: -1 | 0 | 1;
  readonly y: -1 | 0 | 1;
}

export const DIRECTIONS_4 = [
  { x: 0, y: -1 }, // North
  { x: 1, y: 0 }, // East
  { x: 0, y: 1 }, // South
  { x: -1, y: 0 }, // West
] as const satisfies readonly Direction[];

/**
 * Compass rose starting east and turning clockwise on screen (y grows downwards).
 */
export const COMPASS_8 = [
  { x: 1, y: 0 }, // E
  { x: 1, y: 1 }, // SE
  { x: 0, y: 1 }, // S
  { x: -1, y: 1 }, // SW
  { x: -1, y: 0 }, // W
  { x: -1, y: -1 }, // NW
  { x: 0, y: -1 }, // N
  { x: 1, y: -1 }, // NE
] as const satisfies readonly Direction[];

export type CompassDirection = (typeof COMPASS_8)[number];
