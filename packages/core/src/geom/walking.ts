/**
 * Walking a slice ring
 *
 * A positive slice turn carries each ring face onto the next one while
 * keeping two coordinates fixed: the slice index (distance from the
 * reference face) and the slot (distance from the edge the content entered
 * through). Per face, (index, slot) maps to (row, col) through one of eight
 * closed forms: {horizontal, vertical entry edge} x {slot inverted or not}
 * x {index inverted or not}.
 */

import { CubeInternalError } from "../errors.js";
import { type Vec3, add3, dot3, equals3, isParallel3, mul3 } from "../num/vec3.js";
import { type FaceName, type SliceName, cycleOrder, faceFrame, faceNormal } from "../topo/topology.js";
import type { CubeGeometry } from "./CubeGeometry.js";
import type { Point } from "./grid.js";

/**
 * One face of a slice walk
 */
export interface FaceWalk {
  readonly face: FaceName;
  /** Previous ring face; content enters through the edge shared with it */
  readonly enteredFrom: FaceName;
  /** Next ring face; content leaves through the edge shared with it */
  readonly leavesTo: FaceName;
  /** Entry edge is the top or bottom edge of the face */
  readonly horizontalEdge: boolean;
  readonly slotInverted: boolean;
  readonly indexInverted: boolean;
}

/**
 * Coordinate transform between two faces of one slice ring
 */
export interface Transform {
  readonly from: FaceName;
  readonly to: FaceName;
  /** Positive slice quarter turns that carry `from` onto `to` */
  readonly steps: number;
  apply(p: Point): Point;
}

export class WalkingInfo {
  readonly slice: SliceName;
  readonly faces: readonly FaceWalk[];

  private readonly _geometry: CubeGeometry;

  constructor(geometry: CubeGeometry, slice: SliceName) {
    this._geometry = geometry;
    this.slice = slice;

    const ring = cycleOrder(slice);
    const indexDir = geometry.sliceIndexDirection(slice);
    this.faces = ring.map((face, i) => {
      const enteredFrom = ring[(i + 3) % 4];
      const leavesTo = ring[(i + 1) % 4];
      const entry = faceNormal(enteredFrom);
      const { right, up } = faceFrame(face);
      const horizontalEdge = isParallel3(entry, up);
      return {
        face,
        enteredFrom,
        leavesTo,
        horizontalEdge,
        slotInverted: horizontalEdge ? equals3(entry, up) : equals3(entry, right),
        indexInverted: dot3(indexDir, horizontalEdge ? right : up) < 0,
      };
    });
  }

  walkOf(face: FaceName): FaceWalk {
    const walk = this.faces.find((w) => w.face === face);
    if (!walk) {
      throw new CubeInternalError(`Face ${face} is not on the ring of slice ${this.slice}`);
    }
    return walk;
  }

  /**
   * Center cell on `face` at 0-based slice index and slot
   */
  computePoint(face: FaceName, sliceIndex: number, slot: number): Point {
    const walk = this.walkOf(face);
    const n = this._geometry.n;
    const s = walk.slotInverted ? n - 1 - slot : slot;
    const i = walk.indexInverted ? n - 1 - sliceIndex : sliceIndex;
    return walk.horizontalEdge ? { row: s, col: i } : { row: i, col: s };
  }

  /**
   * Inverse of computePoint
   */
  indexAndSlotOf(face: FaceName, p: Point): { sliceIndex: number; slot: number } {
    const walk = this.walkOf(face);
    const n = this._geometry.n;
    const s = walk.horizontalEdge ? p.row : p.col;
    const i = walk.horizontalEdge ? p.col : p.row;
    return {
      sliceIndex: walk.indexInverted ? n - 1 - i : i,
      slot: walk.slotInverted ? n - 1 - s : s,
    };
  }

  /**
   * 3D position of (index, slot) on a ring face, straight from the frames
   *
   * Used to check the closed forms.
   */
  positionOf(face: FaceName, sliceIndex: number, slot: number): Vec3 {
    const walk = this.walkOf(face);
    const size = this._geometry.size;
    const along = mul3(this._geometry.sliceIndexDirection(this.slice), 2 * (sliceIndex + 1) - (size - 1));
    const across = mul3(faceNormal(walk.enteredFrom), size - 3 - 2 * slot);
    return add3(add3(mul3(faceNormal(face), size - 1), along), across);
  }

  /**
   * Transform carrying center cells of `from` to `to` under positive slice
   * turns
   */
  getTransform(from: FaceName, to: FaceName): Transform {
    const a = this.faces.indexOf(this.walkOf(from));
    const b = this.faces.indexOf(this.walkOf(to));
    return {
      from,
      to,
      steps: (b - a + 4) % 4,
      apply: (p) => {
        const { sliceIndex, slot } = this.indexAndSlotOf(from, p);
        return this.computePoint(to, sliceIndex, slot);
      },
    };
  }
}
