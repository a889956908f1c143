/**
 * Quarter-turn rotations about the coordinate axes
 *
 * A positive turn is +90° by the right-hand rule about the positive axis.
 * Turn counts are kept normalized to 0..3.
 */

import type { Axis, Vec3 } from "./vec3.js";

/**
 * A rotation by a whole number of quarter turns about one axis
 */
export interface QuarterRotation {
  readonly axis: Axis;
  /** Quarter turns, 0..3 */
  readonly turns: number;
}

/**
 * Normalize a turn count into 0..3
 */
export function normalizeTurns(turns: number): number {
  return ((turns % 4) + 4) % 4;
}

/**
 * Signed form of a turn count: -1, 0, 1 or 2
 */
export function signedTurns(turns: number): number {
  const t = normalizeTurns(turns);
  return t === 3 ? -1 : t;
}

/**
 * Rotate by +90° about an axis
 */
export function rotate90(v: Vec3, axis: Axis): Vec3 {
  switch (axis) {
    case 0:
      return [v[0], -v[2], v[1]];
    case 1:
      return [v[2], v[1], -v[0]];
    case 2:
      return [-v[1], v[0], v[2]];
  }
}

/**
 * Rotate by a number of quarter turns about an axis
 */
export function rotateQuarter(v: Vec3, axis: Axis, turns: number): Vec3 {
  let out = v;
  for (let i = normalizeTurns(turns); i > 0; i--) {
    out = rotate90(out, axis);
  }
  return out;
}

export function applyRotation(rotation: QuarterRotation, v: Vec3): Vec3 {
  return rotateQuarter(v, rotation.axis, rotation.turns);
}

export function inverseRotation(rotation: QuarterRotation): QuarterRotation {
  return { axis: rotation.axis, turns: normalizeTurns(-rotation.turns) };
}
