/**
 * Size-independent cube topology
 *
 * Faces, their spatial frames, adjacency, and the three inner slice groups.
 * Every relation here is derived from the face frames rather than listed
 * per face pair.
 */

import { CubeInternalError } from "../errors.js";
import {
  type Axis,
  type Vec3,
  axisOf,
  dot3,
  equals3,
  isParallel3,
  neg3,
} from "../num/vec3.js";
import { rotateQuarter } from "../num/rotation.js";

// ============================================================================
// Names
// ============================================================================

export type FaceName = `U` | `R` | `F` | `D` | `L` | `B`;
export const FACES: readonly FaceName[] = [`U`, `R`, `F`, `D`, `L`, `B`];

/** Inner slice groups, turned like their reference face */
export type SliceName = `M` | `E` | `S`;
export const SLICES: readonly SliceName[] = [`M`, `E`, `S`];

/** Whole-cube rotations */
export type WholeAxisName = `X` | `Y` | `Z`;
export const WHOLE_AXES: readonly WholeAxisName[] = [`X`, `Y`, `Z`];

/**
 * ROW when the slice cuts across the rows of a face (it forms a column),
 * COL when it cuts across the columns (it forms a row)
 */
export type SliceCut = `ROW` | `COL`;

export function isFaceName(value: string): value is FaceName {
  return (FACES as readonly string[]).includes(value);
}

export function isSliceName(value: string): value is SliceName {
  return (SLICES as readonly string[]).includes(value);
}

// ============================================================================
// Face frames
// ============================================================================

/**
 * Orientation of a face as seen from outside the cube
 *
 * `right` and `up` span the face; row indices grow along `up` and column
 * indices along `right`. Row 0 is the bottom row.
 */
export interface FaceFrame {
  readonly normal: Vec3;
  readonly right: Vec3;
  readonly up: Vec3;
}

const FACE_FRAMES: Record<FaceName, FaceFrame> = {
  U: { normal: [0, 1, 0], right: [1, 0, 0], up: [0, 0, -1] },
  D: { normal: [0, -1, 0], right: [1, 0, 0], up: [0, 0, 1] },
  F: { normal: [0, 0, 1], right: [1, 0, 0], up: [0, 1, 0] },
  B: { normal: [0, 0, -1], right: [-1, 0, 0], up: [0, 1, 0] },
  R: { normal: [1, 0, 0], right: [0, 0, -1], up: [0, 1, 0] },
  L: { normal: [-1, 0, 0], right: [0, 0, 1], up: [0, 1, 0] },
};

export function faceFrame(face: FaceName): FaceFrame {
  const frame = FACE_FRAMES[face];
  if (!frame) {
    throw new CubeInternalError(`Unknown face: ${String(face)}`);
  }
  return frame;
}

export function faceNormal(face: FaceName): Vec3 {
  return faceFrame(face).normal;
}

/**
 * Axis of the face normal
 */
export function faceAxis(face: FaceName): Axis {
  const axis = axisOf(faceNormal(face));
  if (axis === null) {
    throw new CubeInternalError(`Face ${face} has no axis-aligned normal`);
  }
  return axis;
}

/**
 * The face whose outward normal is `normal`
 */
export function faceOfNormal(normal: Vec3): FaceName {
  for (const face of FACES) {
    if (equals3(FACE_FRAMES[face].normal, normal)) {
      return face;
    }
  }
  throw new CubeInternalError(`No face with normal (${normal.join(`, `)})`);
}

// ============================================================================
// Adjacency
// ============================================================================

export function opposite(face: FaceName): FaceName {
  return faceOfNormal(neg3(faceNormal(face)));
}

export function isAdjacent(a: FaceName, b: FaceName): boolean {
  return dot3(faceNormal(a), faceNormal(b)) === 0;
}

/**
 * The four neighbours of a face in the order up, right, down, left of its
 * frame
 */
export function adjacentFaces(face: FaceName): readonly [FaceName, FaceName, FaceName, FaceName] {
  const { right, up } = faceFrame(face);
  return [faceOfNormal(up), faceOfNormal(right), faceOfNormal(neg3(up)), faceOfNormal(neg3(right))];
}

// ============================================================================
// Turn senses
// ============================================================================

/**
 * How a named move maps onto geometric quarter turns: one unit of the
 * move is `sense` turns (+90° right-handed) about `axis`
 */
export interface MoveAxis {
  readonly axis: Axis;
  readonly sense: 1 | -1;
}

const SLICE_AXES: Record<SliceName, MoveAxis> = {
  M: { axis: 0, sense: 1 },
  E: { axis: 1, sense: 1 },
  S: { axis: 2, sense: -1 },
};

const WHOLE_AXIS_SENSES: Record<WholeAxisName, MoveAxis> = {
  X: { axis: 0, sense: -1 },
  Y: { axis: 1, sense: -1 },
  Z: { axis: 2, sense: -1 },
};

/**
 * A clockwise face turn, seen from outside, is -90° about the outward normal
 */
export function faceMoveAxis(face: FaceName): MoveAxis {
  const axis = faceAxis(face);
  return { axis, sense: faceNormal(face)[axis] > 0 ? -1 : 1 };
}

export function sliceMoveAxis(slice: SliceName): MoveAxis {
  const entry = SLICE_AXES[slice];
  if (!entry) {
    throw new CubeInternalError(`Unknown slice: ${String(slice)}`);
  }
  return entry;
}

export function wholeMoveAxis(name: WholeAxisName): MoveAxis {
  const entry = WHOLE_AXIS_SENSES[name];
  if (!entry) {
    throw new CubeInternalError(`Unknown whole-cube axis: ${String(name)}`);
  }
  return entry;
}

export function wholeAxisOfAxis(axis: Axis): WholeAxisName {
  return WHOLE_AXES[axis];
}

// ============================================================================
// Slices
// ============================================================================

const REFERENCE_FACES: Record<SliceName, FaceName> = { M: `L`, E: `D`, S: `F` };

/**
 * The face whose clockwise turn defines the slice's positive direction
 */
export function referenceFaceOf(slice: SliceName): FaceName {
  const face = REFERENCE_FACES[slice];
  if (!face) {
    throw new CubeInternalError(`Unknown slice: ${String(slice)}`);
  }
  return face;
}

/**
 * Faces of a slice ring in content-flow order: a positive slice turn moves
 * content from each face to the next one
 */
export function cycleOrder(slice: SliceName): readonly [FaceName, FaceName, FaceName, FaceName] {
  const { axis, sense } = sliceMoveAxis(slice);
  const start = FACES.find((f) => faceAxis(f) !== axis);
  if (start === undefined) {
    throw new CubeInternalError(`Slice ${slice} has no ring`);
  }
  const ring: FaceName[] = [start];
  let normal = faceNormal(start);
  for (let i = 0; i < 3; i++) {
    normal = rotateQuarter(normal, axis, sense);
    ring.push(faceOfNormal(normal));
  }
  return [ring[0], ring[1], ring[2], ring[3]];
}

/**
 * True when the face belongs to the ring of the slice
 */
export function isOnSliceRing(slice: SliceName, face: FaceName): boolean {
  return faceAxis(face) !== sliceMoveAxis(slice).axis;
}

/**
 * Whether the slice cuts across the rows (ROW) or the columns (COL) of a
 * face on its ring
 *
 * M always forms a column and E a row; S forms a column on L/R and a row
 * on U/D.
 */
export function doesSliceCutRowsOrColumns(slice: SliceName, face: FaceName): SliceCut {
  if (!isOnSliceRing(slice, face)) {
    throw new CubeInternalError(`Face ${face} is not on the ring of slice ${slice}`);
  }
  const axis = sliceMoveAxis(slice).axis;
  const slicePlaneNormal: [number, number, number] = [0, 0, 0];
  slicePlaneNormal[axis] = 1;
  return isParallel3(faceFrame(face).right, slicePlaneNormal) ? `ROW` : `COL`;
}

/**
 * Slices whose ring contains both faces
 */
export function slicesConnecting(a: FaceName, b: FaceName): SliceName[] {
  return SLICES.filter((s) => isOnSliceRing(s, a) && isOnSliceRing(s, b));
}

/**
 * Build a per-face record from a function of the face
 */
export function mapFaces<T>(fn: (face: FaceName) => T): Record<FaceName, T> {
  return { U: fn(`U`), R: fn(`R`), F: fn(`F`), D: fn(`D`), L: fn(`L`), B: fn(`B`) };
}
