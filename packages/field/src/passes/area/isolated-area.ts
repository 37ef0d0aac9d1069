import { Markers, type SeededRandom } from "@lawnsim/contracts";
import { corners } from "../../core/geometry/operations";
import type { Point } from "../../core/geometry/types";
import type { GridModel } from "../../core/grid/grid-model";
import type { IsolatedArea } from "../../pipeline/types";

export interface RectangularAreaOptions {
  readonly widthCells: number;
  readonly lengthCells: number;
  /** Carve-in corner; drawn at random when omitted. */
  readonly corner?: Point;
  /** Openings to cut; drawn at random when omitted. */
  readonly openingBudget?: number;
}

export interface CircularAreaOptions {
  readonly radiusCells: number;
  readonly corner?: Point;
  readonly openingBudget?: number;
}

/**
 * Carve a width × length rectangle inward from a field corner.
 *
 * Enclosure tassels are the rectangle's boundary cells facing the rest of
 * the field, minus the rectangle's own corners.
 */
export function carveRectangularArea(
  grid: GridModel,
  rng: SeededRandom,
  options: RectangularAreaOptions,
): IsolatedArea {
  const corner = options.corner ?? pickCorner(grid, rng);
  const width = Math.min(options.widthCells, grid.width);
  const length = Math.min(options.lengthCells, grid.height);

  const x0 = corner.x === 0 ? 0 : grid.width - width;
  const x1 = x0 + width - 1;
  const y0 = corner.y === 0 ? 0 : grid.height - length;
  const y1 = y0 + length - 1;

  // Side of the rectangle that faces the field interior (null when flush with the border)
  const innerX = corner.x === 0 ? (x1 < grid.width - 1 ? x1 : null) : x0 > 0 ? x0 : null;
  const innerY = corner.y === 0 ? (y1 < grid.height - 1 ? y1 : null) : y0 > 0 ? y0 : null;

  const cells: Point[] = [];
  const enclosure: Point[] = [];

  for (let x = x0; x <= x1; x++) {
    for (let y = y0; y <= y1; y++) {
      if (!grid.place(Markers.isolatedArea(), x, y)) continue;
      cells.push({ x, y });

      const isRectCorner = (x === x0 || x === x1) && (y === y0 || y === y1);
      if (!isRectCorner && (x === innerX || y === innerY)) {
        enclosure.push({ x, y });
      }
    }
  }

  const budget = options.openingBudget ?? rng.range(1, width) % grid.width;
  return finishArea(grid, rng, "rectangle", corner, cells, enclosure, budget);
}

/**
 * Quarter disc of the given radius centred on a field corner.
 *
 * Enclosure tassels are the rim cells, ordered by angle around the corner.
 */
export function carveCircularArea(
  grid: GridModel,
  rng: SeededRandom,
  options: CircularAreaOptions,
): IsolatedArea {
  const corner = options.corner ?? pickCorner(grid, rng);
  const r = options.radiusCells;
  const sx = corner.x === 0 ? 1 : -1;
  const sy = corner.y === 0 ? 1 : -1;

  const inDisc = (i: number, j: number) => i * i + j * j <= r * r;

  const cells: Point[] = [];
  const rim: Array<{ p: Point; angle: number; dist: number }> = [];

  for (let i = 0; i <= r; i++) {
    for (let j = 0; j <= r; j++) {
      if (!inDisc(i, j)) continue;
      const x = corner.x + sx * i;
      const y = corner.y + sy * j;
      if (!grid.place(Markers.isolatedArea(), x, y)) continue;
      cells.push({ x, y });

      const outward = [
        [i + 1, j],
        [i, j + 1],
      ] as const;
      const onRim = outward.some(
        ([oi, oj]) =>
          !inDisc(oi, oj) && grid.withinBounds(corner.x + sx * oi, corner.y + sy * oj),
      );
      if (onRim) {
        rim.push({ p: { x, y }, angle: Math.atan2(j, i), dist: i * i + j * j });
      }
    }
  }

  rim.sort((a, b) => a.angle - b.angle || a.dist - b.dist);
  const enclosure = rim.map((entry) => entry.p);

  const budget = options.openingBudget ?? rng.range(1, Math.max(1, r)) % grid.width;
  return finishArea(grid, rng, "circle", corner, cells, enclosure, budget);
}

/**
 * Convert enclosure tassels to openings, round-robin from a random start.
 * Each step advances one index and spends one unit of budget; a tassel is
 * never opened twice.
 */
export function cutOpenings(
  grid: GridModel,
  rng: SeededRandom,
  enclosure: readonly Point[],
  budget: number,
): Point[] {
  const openings: Point[] = [];
  if (enclosure.length === 0) return openings;

  let index = rng.range(0, enclosure.length - 1);
  let remaining = budget;
  while (remaining > 0 && openings.length < enclosure.length) {
    const tassel = enclosure[index];
    if (tassel && grid.place(Markers.opening(), tassel.x, tassel.y)) {
      openings.push(tassel);
    }
    index = (index + 1) % enclosure.length;
    remaining -= 1;
  }
  return openings;
}

function finishArea(
  grid: GridModel,
  rng: SeededRandom,
  shape: IsolatedArea["shape"],
  corner: Point,
  cells: Point[],
  enclosure: Point[],
  budget: number,
): IsolatedArea {
  const openings = cutOpenings(grid, rng, enclosure, budget);
  return {
    shape,
    corner,
    cells,
    enclosure,
    openings,
    referenceTassel: rng.choice(openings) ?? null,
  };
}

function pickCorner(grid: GridModel, rng: SeededRandom): Point {
  return rng.choice(corners(grid));
}
