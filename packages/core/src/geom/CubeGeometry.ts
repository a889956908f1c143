/**
 * Size-dependent cube geometry
 *
 * Maps face grid coordinates to integer 3D positions and back, and derives
 * slice layer indices from positions. Nothing here is tabulated per face
 * pair; everything follows from the face frames in topology.
 */

import { CubeInternalError } from "../errors.js";
import { type Vec3, add3, dot3, mul3, neg3 } from "../num/vec3.js";
import {
  type FaceName,
  type SliceName,
  faceAxis,
  faceFrame,
  faceNormal,
  faceOfNormal,
  isAdjacent,
  referenceFaceOf,
  sliceMoveAxis,
} from "../topo/topology.js";
import type { Point } from "./grid.js";
import { WalkingInfo } from "./walking.js";

/**
 * A sticker location on the full N x N grid of a face
 */
export interface FaceCell {
  readonly face: FaceName;
  readonly row: number;
  readonly col: number;
}

export class CubeGeometry {
  /** Cube size N */
  readonly size: number;
  /** Center grid size, N - 2 */
  readonly n: number;

  private readonly _walking = new Map<SliceName, WalkingInfo>();

  constructor(size: number) {
    if (!Number.isInteger(size) || size < 2) {
      throw new CubeInternalError(`Cube size must be an integer >= 2, got ${size}`);
    }
    this.size = size;
    this.n = size - 2;
  }

  // ==========================================================================
  // Positions
  // ==========================================================================

  /**
   * 3D position of a sticker on the full grid (row and col in 0..N-1)
   */
  stickerPosition(face: FaceName, row: number, col: number): Vec3 {
    const m = this.size - 1;
    const { normal, right, up } = faceFrame(face);
    return add3(add3(mul3(normal, m), mul3(right, 2 * col - m)), mul3(up, 2 * row - m));
  }

  /**
   * 3D position of a center cell (row and col in 0..n-1)
   */
  centerPosition(face: FaceName, p: Point): Vec3 {
    return this.stickerPosition(face, p.row + 1, p.col + 1);
  }

  /**
   * Full-grid cell of a sticker at `position` facing `normal`
   */
  locate(position: Vec3, normal: Vec3): FaceCell {
    const face = faceOfNormal(normal);
    const m = this.size - 1;
    const { right, up } = faceFrame(face);
    return {
      face,
      row: (dot3(position, up) + m) / 2,
      col: (dot3(position, right) + m) / 2,
    };
  }

  /**
   * Center cell at `position` facing `normal`
   */
  locateCenter(position: Vec3, normal: Vec3): { face: FaceName; point: Point } {
    const cell = this.locate(position, normal);
    const point = { row: cell.row - 1, col: cell.col - 1 };
    if (!this.isCenterPoint(point)) {
      throw new CubeInternalError(`Position (${position.join(`, `)}) is not a center cell of ${cell.face}`);
    }
    return { face: cell.face, point };
  }

  isCenterPoint(p: Point): boolean {
    return (
      Number.isInteger(p.row) &&
      Number.isInteger(p.col) &&
      p.row >= 0 &&
      p.col >= 0 &&
      p.row < this.n &&
      p.col < this.n
    );
  }

  /**
   * True for the single middle cell of an odd cube's center grid
   */
  isMiddlePoint(p: Point): boolean {
    return this.n % 2 === 1 && p.row === (this.n - 1) / 2 && p.col === (this.n - 1) / 2;
  }

  // ==========================================================================
  // Layers
  // ==========================================================================

  /**
   * Layer of a position counted from a face: 0 is the face's own layer
   */
  layerFromFace(face: FaceName, position: Vec3): number {
    return (this.size - 1 - dot3(position, faceNormal(face))) / 2;
  }

  /**
   * 1-based slice index of a center cell, counted from the slice's
   * reference face
   */
  sliceIndexOf(slice: SliceName, face: FaceName, p: Point): number {
    if (faceAxis(face) === sliceMoveAxis(slice).axis) {
      throw new CubeInternalError(`Face ${face} is not on the ring of slice ${slice}`);
    }
    return this.layerFromFace(referenceFaceOf(slice), this.centerPosition(face, p));
  }

  // ==========================================================================
  // Walking info and layer iteration
  // ==========================================================================

  /**
   * Walk of the four faces of a slice; cached per slice
   */
  createWalkingInfo(slice: SliceName): WalkingInfo {
    let info = this._walking.get(slice);
    if (!info) {
      info = new WalkingInfo(this, slice);
      this._walking.set(slice, info);
    }
    return info;
  }

  /**
   * Center cells on `sideFace` lying in one layer parallel to `layerFace`
   *
   * Layer 0 is the one closest to `layerFace`. Cells are yielded in
   * ascending order of the free coordinate.
   */
  *iterateOrthogonalFaceCenterPieces(
    layerFace: FaceName,
    sideFace: FaceName,
    layerSliceIndex: number
  ): Generator<Point> {
    if (!isAdjacent(layerFace, sideFace)) {
      throw new CubeInternalError(`Face ${sideFace} is not orthogonal to ${layerFace}`);
    }
    if (!Number.isInteger(layerSliceIndex) || layerSliceIndex < 0 || layerSliceIndex >= this.n) {
      throw new CubeInternalError(`Layer index ${layerSliceIndex} out of range 0..${this.n - 1}`);
    }
    for (let a = 0; a < this.n; a++) {
      for (let b = 0; b < this.n; b++) {
        const p = { row: a, col: b };
        if (this.layerFromFace(layerFace, this.centerPosition(sideFace, p)) === layerSliceIndex + 1) {
          yield p;
        }
      }
    }
  }

  /**
   * Direction in which slice indices grow: away from the reference face
   */
  sliceIndexDirection(slice: SliceName): Vec3 {
    return neg3(faceNormal(referenceFaceOf(slice)));
  }
}
