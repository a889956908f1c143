/**
 * Row/column transforms between faces under whole-cube rotations
 */

import { CubeInternalError } from "../errors.js";
import { type QuarterRotation, applyRotation } from "../num/rotation.js";
import { type Axis, AXES, equals3, neg3 } from "../num/vec3.js";
import { type FaceName, faceAxis, faceFrame, faceNormal, isAdjacent } from "../topo/topology.js";
import { type Point, rotatePointCw } from "./grid.js";

/**
 * How (row, col) on a source face relates to (row, col) on the target
 */
export type TransformType = `IDENTITY` | `ROT_90_CW` | `ROT_90_CCW` | `ROT_180`;

/**
 * The quarter rotation about a coordinate axis that carries `source` onto
 * `target`
 *
 * Adjacent faces have exactly one such rotation. Opposite faces have two
 * (half turns about either perpendicular axis); the first axis in x, y, z
 * order is used.
 */
export function rotationBetween(source: FaceName, target: FaceName): QuarterRotation {
  if (source === target) {
    throw new CubeInternalError(`No rotation between ${source} and itself`);
  }
  const candidates: Axis[] = isAdjacent(source, target)
    ? AXES.filter((a) => a !== faceAxis(source) && a !== faceAxis(target))
    : AXES.filter((a) => a !== faceAxis(source));
  const axis = candidates[0];
  for (let turns = 1; turns < 4; turns++) {
    const rotation = { axis, turns };
    if (equals3(applyRotation(rotation, faceNormal(source)), faceNormal(target))) {
      return rotation;
    }
  }
  throw new CubeInternalError(`Faces ${source} and ${target} are not connected by axis ${axis}`);
}

/**
 * Classify a rotation that maps `source` onto `target` by where it sends the
 * source's right vector
 */
export function classifyRotation(
  rotation: QuarterRotation,
  source: FaceName,
  target: FaceName
): TransformType {
  const right = applyRotation(rotation, faceFrame(source).right);
  const t = faceFrame(target);
  if (equals3(right, t.right)) return `IDENTITY`;
  if (equals3(right, neg3(t.right))) return `ROT_180`;
  if (equals3(right, neg3(t.up))) return `ROT_90_CW`;
  if (equals3(right, t.up)) return `ROT_90_CCW`;
  throw new CubeInternalError(`Rotation does not map ${source} onto ${target}`);
}

/**
 * Transform type of the whole-cube rotation bringing `source` to `target`,
 * or null for the same face
 */
export function deriveTransformType(source: FaceName, target: FaceName): TransformType | null {
  if (source === target) {
    return null;
  }
  return classifyRotation(rotationBetween(source, target), source, target);
}

/**
 * Number of clockwise quarter turns a transform type stands for
 */
export function transformTurns(type: TransformType): number {
  switch (type) {
    case `IDENTITY`:
      return 0;
    case `ROT_90_CW`:
      return 1;
    case `ROT_180`:
      return 2;
    case `ROT_90_CCW`:
      return 3;
  }
}

/**
 * Apply a transform type to a center-grid point of size n
 */
export function applyTransformType(type: TransformType, p: Point, n: number): Point {
  return rotatePointCw(p, n, transformTurns(type));
}
