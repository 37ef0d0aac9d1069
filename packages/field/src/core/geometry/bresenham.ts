import type { Point } from "./types";

/**
 * Rasterize the segment between two cells with Bresenham's line algorithm.
 * Both endpoints are included and consecutive cells are 8-connected.
 *
 * @example
 * ```typescript
 * traceLine({ x: 0, y: 0 }, { x: 3, y: 1 });
 * // (0,0) (1,0) (2,1) (3,1)
 * ```
 */
export function traceLine(from: Point, to: Point): Point[] {
  const path: Point[] = [];

  let x = from.x;
  let y = from.y;
  const dx = Math.abs(to.x - from.x);
  const dy = Math.abs(to.y - from.y);
  const sx = from.x < to.x ? 1 : -1;
  const sy = from.y < to.y ? 1 : -1;
  let err = dx - dy;

  for (;;) {
    path.push({ x, y });
    if (x === to.x && y === to.y) break;

    const e2 = 2 * err;
    if (e2 > -dy) {
      err -= dy;
      x += sx;
    }
    if (e2 < dx) {
      err += dx;
      y += sy;
    }
  }

  return path;
}
