import type { Point } from "../core/geometry/types";
import type { GridModel } from "../core/grid/grid-model";

export interface MowingParameters {
  readonly tasselDim: number;
  readonly cuttingDiameter: number;
  /** Length units per second. */
  readonly speed: number;
}

/**
 * Strips of the cutting width needed to cover an area
 */
export function passesNeeded(totalArea: number, cuttingWidth: number): number {
  return Math.ceil(totalArea / cuttingWidth);
}

/**
 * Seconds spent mowing one tassel
 */
export function mowingTime(params: MowingParameters): number {
  const tasselArea = params.tasselDim * params.tasselDim;
  const passes = passesNeeded(tasselArea, params.cuttingDiameter);
  const distance = (passes * tasselArea) / params.cuttingDiameter;
  return distance / params.speed;
}

/**
 * Cutting radius in cells
 */
export function cuttingRadius(params: Pick<MowingParameters, "tasselDim" | "cuttingDiameter">): number {
  return Math.floor(params.cuttingDiameter / params.tasselDim / 2);
}

/**
 * Tassels stepped back after a collision
 */
export function backoffSteps(params: Pick<MowingParameters, "tasselDim" | "cuttingDiameter">): number {
  return Math.ceil(params.cuttingDiameter / params.tasselDim);
}

/**
 * Increment the cut count of every grass tassel in the Von Neumann
 * neighbourhood of p, centre included.
 * @returns number of tassels cut
 */
export function cutAround(grid: GridModel, p: Point, radius: number): number {
  let cut = 0;
  for (const q of grid.neighborhood(p, { moore: false, radius, includeCenter: true })) {
    const grass = grid.grassAt(q);
    if (grass) {
      grass.cutCount++;
      cut++;
    }
  }
  return cut;
}
