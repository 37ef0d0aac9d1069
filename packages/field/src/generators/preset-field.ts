import {
  Err,
  Markers,
  Ok,
  type ObstacleMarker,
  type Result,
  SimulationError,
} from "@lawnsim/contracts";
import { UnionFind } from "../core/algorithms/union-find";
import { corners, euclideanDistance } from "../core/geometry/operations";
import type { Point } from "../core/geometry/types";
import { GridModel } from "../core/grid/grid-model";
import { collectAnchors } from "../passes/area/obstacles";
import { buildFieldArtifact } from "../passes/common/finalize";
import { routeGuidelines } from "../passes/guidelines/pass";
import type {
  FieldArtifact,
  FieldStateArtifact,
  IsolatedArea,
  ObstacleCluster,
  ObstacleShape,
} from "../pipeline/types";

export interface PresetFieldSpec {
  readonly width: number;
  readonly height: number;
  readonly squares?: readonly Point[];
  readonly circles?: readonly Point[];
  /** Radius recorded on circle markers. Default: 1 */
  readonly circleRadius?: number;
  readonly isolatedArea?: readonly Point[];
  /** Passable gaps; the first one becomes the reference tassel. */
  readonly openings?: readonly Point[];
}

/**
 * Build a field from explicit cell lists, then route guidelines as for a
 * generated one. Obstacle cells touching in any of the 8 directions form
 * one cluster.
 *
 * @example
 * ```typescript
 * const field = buildPresetField({
 *   width: 12,
 *   height: 8,
 *   squares: [{ x: 5, y: 3 }, { x: 6, y: 3 }],
 * }).getOrThrow();
 * ```
 */
export function buildPresetField(spec: PresetFieldSpec): Result<FieldArtifact, SimulationError> {
  let grid: GridModel;
  try {
    grid = new GridModel(spec.width, spec.height);
  } catch (error) {
    return Err(
      SimulationError.generationFailed(
        error instanceof Error ? error.message : String(error),
        { width: spec.width, height: spec.height },
      ),
    );
  }

  const isolatedCells = spec.isolatedArea ?? [];
  const openings = spec.openings ?? [];

  for (const p of isolatedCells) {
    if (!grid.place(Markers.isolatedArea(), p.x, p.y)) return refused("isolated area", p);
  }
  for (const p of openings) {
    if (!grid.place(Markers.opening(), p.x, p.y)) return refused("opening", p);
  }

  const clusters: ObstacleCluster[] = [];
  const groups: Array<[ObstacleShape, readonly Point[]]> = [
    ["square", spec.squares ?? []],
    ["circle", spec.circles ?? []],
  ];
  for (const [shape, cells] of groups) {
    for (const component of connectedComponents(cells)) {
      const id = grid.nextClusterId();
      for (const p of component) {
        const marker: ObstacleMarker =
          shape === "square"
            ? Markers.square(id)
            : Markers.circle(id, spec.circleRadius ?? 1);
        if (!grid.place(marker, p.x, p.y)) return refused(`${shape} obstacle`, p);
      }
      clusters.push({ id, shape, cells: component, anchors: [] });
    }
  }

  const withAnchors = clusters.map((cluster) => ({
    ...cluster,
    anchors: collectAnchors(grid, cluster.cells),
  }));

  const state: FieldStateArtifact = {
    type: "field-state",
    id: "field-state",
    grid,
    isolatedArea: presetArea(grid, isolatedCells, openings),
    clusters: withAnchors,
  };
  routeGuidelines(state);
  return Ok(buildFieldArtifact(state, null));
}

/**
 * 8-connected groups, each listed in input order
 */
function connectedComponents(cells: readonly Point[]): Point[][] {
  const uf = new UnionFind(cells.length);
  const index = new Map<string, number>();
  cells.forEach((p, i) => index.set(`${p.x},${p.y}`, i));

  cells.forEach((p, i) => {
    for (let dy = -1; dy <= 1; dy++) {
      for (let dx = -1; dx <= 1; dx++) {
        const j = index.get(`${p.x + dx},${p.y + dy}`);
        if (j !== undefined && j !== i) uf.union(i, j);
      }
    }
  });

  const byRoot = new Map<number, Point[]>();
  cells.forEach((p, i) => {
    if (index.get(`${p.x},${p.y}`) !== i) return; // duplicate entry
    const root = uf.find(i);
    const group = byRoot.get(root);
    if (group) {
      group.push(p);
    } else {
      byRoot.set(root, [p]);
    }
  });
  return [...byRoot.values()];
}

function presetArea(
  grid: GridModel,
  cells: readonly Point[],
  openings: readonly Point[],
): IsolatedArea | null {
  const first = cells[0];
  if (!first) return null;

  const [origin, ...others] = corners(grid);
  const corner = others.reduce(
    (best, c) => (euclideanDistance(c, first) < euclideanDistance(best, first) ? c : best),
    origin,
  );

  return {
    shape: "preset",
    corner,
    cells,
    enclosure: openings,
    openings,
    referenceTassel: openings[0] ?? null,
  };
}

function refused(what: string, p: Point): Result<FieldArtifact, SimulationError> {
  return Err(
    SimulationError.generationFailed(`Cannot place ${what} at (${p.x}, ${p.y})`, {
      x: p.x,
      y: p.y,
    }),
  );
}
