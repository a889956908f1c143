/**
 * Seeded pseudo-random numbers
 *
 * mulberry32: small, fast and reproducible across platforms. Scrambles
 * built from the same seed are identical everywhere.
 */

import { CubeInternalError } from "../errors.js";

export type RandomSource = () => number;

/**
 * Create a generator of floats in [0, 1) from a 32-bit seed
 */
export function createRandom(seed: number): RandomSource {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/**
 * Integer in [0, max)
 */
export function randomInt(random: RandomSource, max: number): number {
  return Math.floor(random() * max);
}

/**
 * Pick one element of a non-empty list
 */
export function randomPick<T>(random: RandomSource, items: readonly T[]): T {
  if (items.length === 0) {
    throw new CubeInternalError(`randomPick: empty list`);
  }
  return items[randomInt(random, items.length)];
}
