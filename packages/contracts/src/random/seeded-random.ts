import {
  choice,
  probability,
  type RandomSource,
  range,
  shuffle,
  uniform,
} from "./rng";

/**
 * Deterministic PRNG (xoshiro128++), seeded through SplitMix32.
 *
 * Every generator, placer and simulator receives one of these explicitly;
 * nothing in the simulation reads a global random source.
 *
 * Reference: https://prng.di.unimi.it/xoshiro128plusplus.c
 */

function splitmix32(seed: number): () => number {
  let z = seed >>> 0;
  return () => {
    z = (z + 0x9e3779b9) >>> 0;
    let t = z;
    t = Math.imul(t ^ (t >>> 16), 0x21f0aaad);
    t = Math.imul(t ^ (t >>> 15), 0x735a2d97);
    return (t ^ (t >>> 15)) >>> 0;
  };
}

function rotl(x: number, k: number): number {
  return ((x << k) | (x >>> (32 - k))) >>> 0;
}

/**
 * Four 32-bit state words
 */
export type RngState = [number, number, number, number];

export class SeededRandom implements RandomSource {
  private s: RngState;

  constructor(seed: number) {
    const mix = splitmix32(seed >>> 0);
    this.s = [mix(), mix(), mix(), mix()];

    // xoshiro needs at least one non-zero word
    if ((this.s[0] | this.s[1] | this.s[2] | this.s[3]) === 0) {
      this.s[0] = 1;
    }

    for (let i = 0; i < 8; i++) {
      this.next32();
    }
  }

  private next32(): number {
    const s = this.s;
    const result = (rotl((s[0] + s[3]) >>> 0, 7) + s[0]) >>> 0;

    const t = (s[1] << 9) >>> 0;

    s[2] ^= s[0];
    s[3] ^= s[1];
    s[1] ^= s[2];
    s[0] ^= s[3];

    s[2] ^= t;
    s[3] = rotl(s[3], 11);

    return result;
  }

  /**
   * Next value in [0, 1)
   */
  next(): number {
    return this.next32() / 0x100000000;
  }

  /**
   * Next unsigned 32-bit integer, used to derive child seeds
   */
  nextUint32(): number {
    return Math.floor(this.next() * 0x100000000) >>> 0;
  }

  /**
   * Random integer between min and max (inclusive)
   */
  range(min: number, max: number): number {
    return range(() => this.next(), min, max);
  }

  /**
   * Uniform real in [min, max)
   */
  uniform(min: number, max: number): number {
    return uniform(() => this.next(), min, max);
  }

  choice<T>(array: readonly [T, ...T[]]): T;
  choice<T>(array: readonly T[]): T | undefined;
  choice<T>(array: readonly T[]): T | undefined {
    return choice(() => this.next(), array);
  }

  shuffle<T>(array: readonly T[]): T[] {
    return shuffle(() => this.next(), array);
  }

  probability(chance: number): boolean {
    return probability(() => this.next(), chance);
  }

  /**
   * Independent generator whose sequence is fixed by this one's next output
   */
  fork(): SeededRandom {
    return new SeededRandom(this.nextUint32());
  }

  getState(): RngState {
    return [...this.s];
  }

  setState(state: RngState): void {
    this.s = [state[0] >>> 0, state[1] >>> 0, state[2] >>> 0, state[3] >>> 0];
  }
}
