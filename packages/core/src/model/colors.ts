/**
 * Sticker colors and the BOY color scheme
 */

import { CubeInternalError } from "../errors.js";
import { rotate90 } from "../num/rotation.js";
import { AXES } from "../num/vec3.js";
import { type FaceName, FACES, faceNormal, faceOfNormal, mapFaces, opposite } from "../topo/topology.js";

export type Color = `BLUE` | `RED` | `YELLOW` | `ORANGE` | `WHITE` | `GREEN`;

export const COLORS: readonly Color[] = [`BLUE`, `RED`, `YELLOW`, `ORANGE`, `WHITE`, `GREEN`];

/**
 * Color assigned to each face
 */
export type FaceColors = Readonly<Record<FaceName, Color>>;

/**
 * Blue, orange and yellow meet at one corner (F, L, U)
 */
export const BOY_SCHEME: FaceColors = {
  F: `BLUE`,
  R: `RED`,
  U: `YELLOW`,
  L: `ORANGE`,
  D: `WHITE`,
  B: `GREEN`,
};

function schemeFaceOf(scheme: FaceColors, color: Color): FaceName {
  const face = FACES.find((f) => scheme[f] === color);
  if (face === undefined) {
    throw new CubeInternalError(`Color ${color} is not part of the scheme`);
  }
  return face;
}

/**
 * Color on the face opposite to `color` in the BOY scheme
 */
export function oppositeColor(color: Color): Color {
  return BOY_SCHEME[opposite(schemeFaceOf(BOY_SCHEME, color))];
}

// ============================================================================
// Orientations
// ============================================================================

/** Where each face goes under a whole-cube orientation */
type FacePermutation = Readonly<Record<FaceName, FaceName>>;

function buildOrientations(): FacePermutation[] {
  const identity = mapFaces((f) => f);
  const seen = new Map<string, FacePermutation>([[FACES.map((f) => identity[f]).join(``), identity]]);
  const queue: FacePermutation[] = [identity];
  while (queue.length > 0) {
    const current = queue.shift();
    if (current === undefined) break;
    for (const axis of AXES) {
      const next = mapFaces((f) => faceOfNormal(rotate90(faceNormal(current[f]), axis)));
      const key = FACES.map((f) => next[f]).join(``);
      if (!seen.has(key)) {
        seen.set(key, next);
        queue.push(next);
      }
    }
  }
  return [...seen.values()];
}

let orientations: FacePermutation[] | null = null;

/**
 * The 24 whole-cube orientations as face permutations
 */
export function allOrientations(): readonly FacePermutation[] {
  orientations ??= buildOrientations();
  return orientations;
}

/**
 * True when the face colors are the BOY scheme seen from some orientation
 */
export function isBoyScheme(colors: Partial<Record<FaceName, Color>>): boolean {
  return allOrientations().some((g) => FACES.every((f) => colors[g[f]] === BOY_SCHEME[f]));
}

/**
 * True when every color is used by exactly one face
 */
export function isColorPermutation(colors: Partial<Record<FaceName, Color>>): boolean {
  const used = new Set(FACES.map((f) => colors[f]));
  return used.size === COLORS.length && COLORS.every((c) => used.has(c));
}
