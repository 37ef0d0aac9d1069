import type { SeededRandom } from "@lawnsim/contracts";
import { squaredDistance } from "../core/geometry/operations";
import type { Point } from "../core/geometry/types";
import type { GridModel } from "../core/grid/grid-model";

/** Candidate draws per placement before giving up. */
export const MAX_STATION_ATTEMPTS = 35;

/** Repair offsets tried around an unusable candidate, after the candidate itself. */
const REPAIR_OFFSETS = [
  { x: -1, y: 0 },
  { x: 1, y: 0 },
  { x: 0, y: -1 },
  { x: 0, y: 1 },
] as const;

export const StationStrategy = {
  PerimeterPair: "perimeter-pair",
  BiggestRandomPair: "biggest-random-pair",
  BiggestCenterPair: "biggest-center-pair",
} as const;

export type StationStrategyName = (typeof StationStrategy)[keyof typeof StationStrategy];

export const STATION_STRATEGIES: readonly StationStrategyName[] = Object.values(StationStrategy);

export interface BaseStationStrategy {
  readonly name: StationStrategyName;
  /**
   * @returns a free cell for the station, or null when none was found within the attempt cap
   */
  locate(
    grid: GridModel,
    centerTassel: Point,
    largestClusterCells: readonly Point[],
  ): Point | null;
}

/**
 * The candidate itself if usable, otherwise its first usable 4-neighbour
 */
export function repairCandidate(
  grid: GridModel,
  candidate: Point,
  isUsable: (p: Point) => boolean,
): Point | null {
  if (isUsable(candidate)) return candidate;
  for (const offset of REPAIR_OFFSETS) {
    const p = { x: candidate.x + offset.x, y: candidate.y + offset.y };
    if (isUsable(p)) return p;
  }
  return null;
}

function isFreeCell(grid: GridModel, p: Point): boolean {
  return grid.contains(p) && !grid.isImpassable(p) && grid.baseStation() === null;
}

/**
 * Random point on the top row or left column; repairs stay on the border.
 */
export class PerimeterPairStrategy implements BaseStationStrategy {
  readonly name = StationStrategy.PerimeterPair;

  constructor(private readonly rng: SeededRandom) {}

  locate(grid: GridModel): Point | null {
    const usable = (p: Point) => isFreeCell(grid, p) && grid.isBorder(p);

    for (let attempt = 0; attempt < MAX_STATION_ATTEMPTS; attempt++) {
      const candidate = this.rng.probability(0.5)
        ? { x: 0, y: this.rng.range(0, grid.height) }
        : { x: this.rng.range(0, grid.width), y: 0 };
      const placed = repairCandidate(grid, candidate, usable);
      if (placed) return placed;
    }
    return null;
  }
}

/**
 * Random cell of the largest obstacle cluster, moved to a free neighbour.
 */
export class BiggestRandomPairStrategy implements BaseStationStrategy {
  readonly name = StationStrategy.BiggestRandomPair;

  constructor(private readonly rng: SeededRandom) {}

  locate(grid: GridModel, _centerTassel: Point, largestClusterCells: readonly Point[]): Point | null {
    if (largestClusterCells.length === 0) return null;
    const usable = (p: Point) => isFreeCell(grid, p);

    for (let attempt = 0; attempt < MAX_STATION_ATTEMPTS; attempt++) {
      const candidate = this.rng.choice(largestClusterCells);
      if (!candidate) return null;
      const placed = repairCandidate(grid, candidate, usable);
      if (placed) return placed;
    }
    return null;
  }
}

/**
 * Cluster cell closest to the field centre, moved to a free neighbour.
 * Each retry moves on to the next closest cell.
 */
export class BiggestCenterPairStrategy implements BaseStationStrategy {
  readonly name = StationStrategy.BiggestCenterPair;

  locate(grid: GridModel, centerTassel: Point, largestClusterCells: readonly Point[]): Point | null {
    const usable = (p: Point) => isFreeCell(grid, p);
    const byDistance = largestClusterCells
      .map((p, index) => ({ p, index, d: squaredDistance(p, centerTassel) }))
      .sort((a, b) => a.d - b.d || a.index - b.index);

    for (const { p } of byDistance.slice(0, MAX_STATION_ATTEMPTS)) {
      const placed = repairCandidate(grid, p, usable);
      if (placed) return placed;
    }
    return null;
  }
}

export function createStationStrategy(
  name: StationStrategyName,
  rng: SeededRandom,
): BaseStationStrategy {
  switch (name) {
    case StationStrategy.PerimeterPair:
      return new PerimeterPairStrategy(rng);
    case StationStrategy.BiggestRandomPair:
      return new BiggestRandomPairStrategy(rng);
    case StationStrategy.BiggestCenterPair:
      return new BiggestCenterPairStrategy();
  }
}
