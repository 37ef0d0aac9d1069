import type { SeededRandom } from "@lawnsim/contracts";

/**
 * Spread allowed around a minimum: ⌊((a − b) / 2)² / 2⌋
 */
export function variance(a: number, b: number): number {
  const half = (a - b) / 2;
  return Math.floor((half * half) / 2);
}

/**
 * Size in length units between min and max, skewed towards min
 */
export function sampleSize(rng: SeededRandom, min: number, max: number): number {
  return Math.min(max, min + rng.range(0, variance(min, max)));
}

/**
 * Length units to whole cells, rounding up (at least one cell)
 */
export function toCells(length: number, tasselDim: number): number {
  return Math.max(1, Math.ceil(length / tasselDim));
}

/**
 * Radius in length units to a cell radius, rounding down
 */
export function toCellRadius(radius: number, tasselDim: number): number {
  return Math.floor(radius / tasselDim);
}
