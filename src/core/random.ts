/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

export const DEFAULT_SAMPLE_SEED = 42;
export const MAX_SAMPLE_SEED = 0xffffffff;

/** Seeds are unsigned 32-bit integers. */
export const isValidSeed = (seed: number): boolean =>
  Number.isInteger(seed) && seed >= 0 && seed <= MAX_SAMPLE_SEED;

/**
 * Seeded random stream. Owned by the caller and passed down explicitly so a
 * whole run draws from one advancing sequence.
 */
export interface DeterministicRng {
  /** Next value in [0, 1). */
  next(): number;
  /** Next integer in [min, max] (inclusive). */
  nextInt(min: number, max: number): number;
  readonly seed: number;
}

/**
 * mulberry32: 32-bit state, full period of 2^32.
 */
export class SeededRng implements DeterministicRng {
  private state: number;

  constructor(readonly seed: number) {
    if (!isValidSeed(seed)) {
      throw new RangeError(`Seed must be an integer in [0, ${MAX_SAMPLE_SEED}], got ${seed}.`);
    }
    this.state = seed;
  }

  next(): number {
    this.state = (this.state + 0x6d2b79f5) >>> 0;
    let t = this.state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  }

  nextInt(min: number, max: number): number {
    const range = max - min + 1;
    return min + Math.floor(this.next() * range);
  }
}

export function createDeterministicRng(seed: number = DEFAULT_SAMPLE_SEED): DeterministicRng {
  return new SeededRng(seed);
}

/**
 * Picks `count` distinct positions from [0, population) without replacement
 * and returns them in ascending order.
 */
export const pickSortedIndices = (
  rng: DeterministicRng,
  population: number,
  count: number,
): number[] => {
  if (!Number.isInteger(count) || count < 0 || count > population) {
    throw new RangeError(
      `Cannot pick ${count} distinct positions from a population of ${population}.`,
    );
  }
  const pool = Array.from({ length: population }, (_, index) => index);
  // Partial Fisher-Yates: the first `count` slots end up holding the draw.
  for (let i = 0; i < count; i += 1) {
    const j = rng.nextInt(i, population - 1);
    const swap = pool[i];
    pool[i] = pool[j];
    pool[j] = swap;
  }
  return pool.slice(0, count).sort((a, b) => a - b);
};
