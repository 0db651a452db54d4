/**
 * Random sources and the Fisher-Yates shuffler.
 *
 * Randomness is always injected: nothing in the engine reaches for
 * `Math.random` on its own. Tests pass a seeded source to get the same
 * deal every run; hosts pass `defaultRandomSource` (or their own).
 */

import type { Result } from '../core-engine/GameError';
import { ok, err } from '../core-engine/GameError';

/**
 * A source of uniformly distributed indices.
 */
export interface RandomSource {
  /** An integer in `[0, bound)`. `bound` is always a positive integer. */
  nextIndex(bound: number): number;
}

const UINT32_RANGE = 0x1_0000_0000;

/**
 * mulberry32: a small, fast 32-bit generator. Not cryptographic, but
 * statistically sound for dealing cards.
 */
function mulberry32(seed: number): () => number {
  let current = seed >>> 0;
  return () => {
    current = (current + 0x6d2b79f5) | 0;
    let t = Math.imul(current ^ (current >>> 15), 1 | current);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return (t ^ (t >>> 14)) >>> 0;
  };
}

/**
 * Create a deterministic source from a 32-bit seed.
 *
 * Indices are drawn with rejection sampling, so every value in
 * `[0, bound)` is exactly equally likely.
 */
export function createSeededSource(seed: number): RandomSource {
  const next = mulberry32(seed);
  return {
    nextIndex(bound: number): number {
      const limit = UINT32_RANGE - (UINT32_RANGE % bound);
      let value = next();
      while (value >= limit) {
        value = next();
      }
      return value % bound;
    },
  };
}

/**
 * Adapt a float generator with the `Math.random` contract
 * (values in `[0, 1)`) to a `RandomSource`.
 */
export function fromFloatGenerator(rng: () => number): RandomSource {
  return {
    nextIndex(bound: number): number {
      return Math.floor(rng() * bound);
    },
  };
}

/** Non-deterministic source backed by `Math.random`. */
export const defaultRandomSource: RandomSource = fromFloatGenerator(Math.random);

/**
 * Draw one index in `[0, bound)` and check the source honoured its
 * contract.
 */
export function drawIndex(source: RandomSource, bound: number): Result<number> {
  const value = source.nextIndex(bound);
  if (!Number.isInteger(value) || value < 0 || value >= bound) {
    return err({
      kind: 'InvalidRandomSource',
      message: `Random source returned ${value}, expected an integer in [0, ${bound})`,
      value,
      bound,
    });
  }
  return ok(value);
}

/**
 * Shuffle an array in place using the Fisher-Yates algorithm.
 *
 * Makes exactly `length - 1` draws. All draws are taken and checked
 * before any element moves, so a misbehaving source leaves the array
 * untouched.
 *
 * @returns The same array reference (mutated), or `InvalidRandomSource`.
 */
export function fisherYates<T>(items: T[], source: RandomSource): Result<T[]> {
  const swaps: number[] = [];
  for (let i = items.length - 1; i > 0; i--) {
    const drawn = drawIndex(source, i + 1);
    if (!drawn.ok) return drawn;
    swaps.push(drawn.value);
  }

  let s = 0;
  for (let i = items.length - 1; i > 0; i--) {
    const j = swaps[s++];
    [items[i], items[j]] = [items[j], items[i]];
  }
  return ok(items);
}
