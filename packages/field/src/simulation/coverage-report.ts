import type { CycleReport } from "@lawnsim/contracts";
import type { GridModel } from "../core/grid/grid-model";

export interface CycleLabels {
  readonly mapIndex: number;
  readonly repetition: number;
  readonly strategy: string;
}

/**
 * Snapshot the grass counters of a grid at the end of a cycle
 */
export function buildCycleReport(
  grid: GridModel,
  labels: CycleLabels,
  cycle: number,
  elapsed: number,
): CycleReport {
  const counts = Array.from({ length: grid.height }, () => new Array<number>(grid.width).fill(0));
  let mowable = 0;
  let mowed = 0;
  let maxCutCount = 0;

  grid.forEachCell((p) => {
    const grass = grid.grassAt(p);
    if (!grass) return;
    mowable++;
    if (grass.cutCount > 0) mowed++;
    maxCutCount = Math.max(maxCutCount, grass.cutCount);
    const row = counts[p.y];
    if (row) row[p.x] = grass.cutCount;
  });

  return {
    ...labels,
    cycle,
    counts,
    mowedTassels: mowed,
    mowableTassels: mowable,
    coverage: mowable === 0 ? 0 : mowed / mowable,
    maxCutCount,
    elapsed,
  };
}
