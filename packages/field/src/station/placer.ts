import { Markers } from "@lawnsim/contracts";
import { corners, squaredDistance } from "../core/geometry/operations";
import type { Point } from "../core/geometry/types";
import type { GridModel } from "../core/grid/grid-model";
import { drawGuideline } from "../passes/guidelines/perimeter";
import type { BaseStationStrategy } from "./strategies";

export interface StationPlacementInput {
  readonly centerTassel: Point;
  readonly largestCluster: readonly Point[];
  /** First guideline goes here; skipped when null. */
  readonly referenceTassel: Point | null;
}

export interface StationPlacement {
  readonly position: Point;
  readonly farthestCorner: Point;
  readonly paths: readonly (readonly Point[])[];
}

/**
 * Grid corner at the greatest distance from p; the first corner wins ties
 */
export function farthestCorner(grid: GridModel, p: Point): Point {
  const [first, ...rest] = corners(grid);
  return rest.reduce(
    (best, c) => (squaredDistance(c, p) > squaredDistance(best, p) ? c : best),
    first,
  );
}

/**
 * Locate, place and connect the base station.
 * @returns null when the strategy finds no cell
 */
export function placeBaseStation(
  grid: GridModel,
  strategy: BaseStationStrategy,
  input: StationPlacementInput,
): StationPlacement | null {
  const position = strategy.locate(grid, input.centerTassel, input.largestCluster);
  if (!position || !grid.place(Markers.baseStation(), position.x, position.y)) {
    return null;
  }

  const paths: Point[][] = [];
  if (input.referenceTassel) {
    paths.push(drawGuideline(grid, position, input.referenceTassel));
  }
  const corner = farthestCorner(grid, position);
  paths.push(drawGuideline(grid, position, corner));

  return { position, farthestCorner: corner, paths };
}
