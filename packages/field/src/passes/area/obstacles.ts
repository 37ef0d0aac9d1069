import { MarkerKind, Markers, type SeededRandom } from "@lawnsim/contracts";
import { pointKey } from "../../core/geometry/operations";
import type { Point } from "../../core/geometry/types";
import type { GridModel } from "../../core/grid/grid-model";
import type { ObstacleCluster } from "../../pipeline/types";

/** Anchor draws per obstacle before it is skipped. */
export const MAX_ANCHOR_ATTEMPTS = 35;

export interface SquareObstacleOptions {
  readonly widthCells: number;
  readonly heightCells: number;
}

export interface CircleObstacleOptions {
  /** Radius in length units. */
  readonly radius: number;
  readonly tasselDim: number;
}

/**
 * True when p or any Moore neighbour holds an opening
 */
export function isOpeningAdjacent(grid: GridModel, p: Point): boolean {
  return grid
    .neighborhood(p, { includeCenter: true })
    .some((q) => grid.has(q, MarkerKind.Opening));
}

function isFreeForObstacle(grid: GridModel, p: Point): boolean {
  return grid.markersAt(p).length === 0 && !isOpeningAdjacent(grid, p);
}

/**
 * Draw an empty cell away from openings.
 * @returns null once the attempts run out
 */
export function sampleAnchor(grid: GridModel, rng: SeededRandom): Point | null {
  for (let attempt = 0; attempt < MAX_ANCHOR_ATTEMPTS; attempt++) {
    const p = {
      x: rng.range(0, grid.width - 1),
      y: rng.range(0, grid.height - 1),
    };
    if (isFreeForObstacle(grid, p)) return p;
  }
  return null;
}

/**
 * Free cells in the Moore ring around a cluster, in discovery order
 */
export function collectAnchors(grid: GridModel, cells: readonly Point[]): Point[] {
  const members = new Set(cells.map(pointKey));
  const seen = new Set<string>();
  const anchors: Point[] = [];

  for (const cell of cells) {
    for (const q of grid.neighborhood(cell)) {
      const key = pointKey(q);
      if (members.has(key) || seen.has(key)) continue;
      seen.add(key);
      if (grid.isImpassable(q) || isOpeningAdjacent(grid, q)) continue;
      anchors.push(q);
    }
  }
  return anchors;
}

/**
 * Rectangle of SquaredBlockedArea cells growing right and down from a
 * random anchor. Occupied and opening-adjacent cells are left out.
 */
export function placeSquareObstacle(
  grid: GridModel,
  rng: SeededRandom,
  options: SquareObstacleOptions,
): ObstacleCluster | null {
  const anchor = sampleAnchor(grid, rng);
  if (!anchor) return null;

  const id = grid.nextClusterId();
  const cells: Point[] = [];

  for (let x = anchor.x; x < anchor.x + options.widthCells; x++) {
    for (let y = anchor.y; y < anchor.y + options.heightCells; y++) {
      const p = { x, y };
      if (!grid.contains(p) || !isFreeForObstacle(grid, p)) continue;
      if (grid.place(Markers.square(id), x, y)) cells.push(p);
    }
  }

  if (cells.length === 0) return null;
  return { id, shape: "square", cells, anchors: collectAnchors(grid, cells) };
}

/**
 * Ring-like cluster: discs flooded around midpoints sampled evenly by angle
 * around a random anchor.
 */
export function placeCircleObstacle(
  grid: GridModel,
  rng: SeededRandom,
  options: CircleObstacleOptions,
): ObstacleCluster | null {
  const tasselArea = options.tasselDim * options.tasselDim;
  const count = Math.ceil((Math.PI * options.radius * options.radius) / tasselArea);
  if (!Number.isFinite(count) || count <= 0) return null;

  const anchor = sampleAnchor(grid, rng);
  if (!anchor) return null;

  const midpoints = new Map<string, Point>();
  for (let k = 0; k < count; k++) {
    const theta = (2 * Math.PI * k) / count;
    const m = {
      x: anchor.x + Math.round(Math.cos(theta)),
      y: anchor.y + Math.round(Math.sin(theta)),
    };
    midpoints.set(pointKey(m), m);
  }

  const id = grid.nextClusterId();
  const cellRadius = Math.floor(options.radius / options.tasselDim);
  const cells: Point[] = [];

  for (const m of midpoints.values()) {
    for (let dy = -cellRadius; dy <= cellRadius; dy++) {
      for (let dx = -cellRadius; dx <= cellRadius; dx++) {
        if (dx * dx + dy * dy > cellRadius * cellRadius) continue;
        const p = { x: m.x + dx, y: m.y + dy };
        if (!grid.contains(p) || !isFreeForObstacle(grid, p)) continue;
        if (grid.place(Markers.circle(id, options.radius), p.x, p.y)) cells.push(p);
      }
    }
  }

  if (cells.length === 0) return null;
  return { id, shape: "circle", cells, anchors: collectAnchors(grid, cells) };
}
