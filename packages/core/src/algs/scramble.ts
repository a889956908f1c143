/**
 * Deterministic scrambles
 */

import { createRandom, randomInt, randomPick } from "../num/random.js";
import { FACES, SLICES } from "../topo/topology.js";
import { type Alg, type SimpleAlg, face, layerRange, seq, slice } from "./alg.js";

const COUNTS: readonly number[] = [1, -1, 2];

/**
 * Default scramble length for a cube size
 */
export function defaultScrambleLength(size: number): number {
  return Math.max(20, size * 10);
}

/**
 * Random face turns and single inner-layer slice turns from a seed
 *
 * The same (size, seed, length) always gives the same algorithm.
 */
export function scrambleAlg(size: number, seed: number, length = defaultScrambleLength(size)): Alg {
  const random = createRandom(seed);
  const inner = size - 2;
  const moves: SimpleAlg[] = [];
  for (let i = 0; i < length; i++) {
    const count = randomPick(random, COUNTS);
    if (inner > 0 && randomInt(random, 3) === 0) {
      const layer = 1 + randomInt(random, inner);
      moves.push(slice(randomPick(random, SLICES), layerRange(layer), count));
    } else {
      moves.push(face(randomPick(random, FACES), count));
    }
  }
  return seq(...moves);
}
