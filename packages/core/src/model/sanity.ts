/**
 * Structural checks on a cube's sticker state
 */

import { CubeInternalError } from "../errors.js";
import { COLORS } from "./colors.js";
import type { Cube } from "./Cube.js";

/**
 * Throw unless every slot holds a distinct sticker and every color
 * appears exactly N * N times
 */
export function assertCubeSanity(cube: Cube): void {
  const stickers = cube.allStickers();
  if (stickers.length !== cube.slotCount || new Set(stickers).size !== cube.slotCount) {
    throw new CubeInternalError(`Sticker table is not a permutation of the slots`);
  }
  const expected = cube.size * cube.size;
  for (const color of COLORS) {
    const count = stickers.filter((s) => s.color === color).length;
    if (count !== expected) {
      throw new CubeInternalError(`Color ${color} appears ${count} times, expected ${expected}`);
    }
  }
}
