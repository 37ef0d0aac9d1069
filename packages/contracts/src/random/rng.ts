/**
 * Helpers shared by every random source. Each takes a generator returning
 * values in [0, 1) so callers can plug in scripted sequences.
 */

/**
 * Anything that yields uniform values in [0, 1).
 */
export interface RandomSource {
  next(): number;
}

/**
 * Random integer between min and max (inclusive)
 */
export function range(rng: () => number, min: number, max: number): number {
  return ~~(rng() * (max - min + 1)) + min;
}

/**
 * Random element of an array, undefined when the array is empty
 */
export function choice<T>(rng: () => number, array: readonly [T, ...T[]]): T;
export function choice<T>(rng: () => number, array: readonly T[]): T | undefined;
export function choice<T>(rng: () => number, array: readonly T[]): T | undefined {
  if (array.length === 0) return undefined;
  return array[range(rng, 0, array.length - 1)];
}

/**
 * Fisher-Yates shuffle into a new array
 */
export function shuffle<T>(rng: () => number, array: readonly T[]): T[] {
  const result: T[] = Array.from(array);
  for (let i = result.length - 1; i > 0; i--) {
    const j = range(rng, 0, i);
    const temp = result[i] as T;
    result[i] = result[j] as T;
    result[j] = temp;
  }
  return result;
}

/**
 * True with the given probability (0 to 1)
 */
export function probability(rng: () => number, chance: number): boolean {
  return rng() < chance;
}

/**
 * Uniform real in [min, max)
 */
export function uniform(rng: () => number, min: number, max: number): number {
  return min + rng() * (max - min);
}
