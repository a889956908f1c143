/**
 * Face-to-face coordinate translation
 *
 * Answers: to get content to `targetCoord` on `targetFace`, where on
 * `sourceFace` must it start, and which moves deliver it? Every answer is
 * computed from one geometric rotation, so the coordinate and the move that
 * realizes it cannot disagree.
 */

import { type SliceAlg, type WholeAlg, layerRange, slice, whole } from "../algs/alg.js";
import { CubeInternalError } from "../errors.js";
import type { CubeGeometry } from "../geom/CubeGeometry.js";
import type { Point } from "../geom/grid.js";
import { rotationBetween } from "../geom/transform.js";
import {
  type QuarterRotation,
  applyRotation,
  inverseRotation,
  signedTurns,
} from "../num/rotation.js";
import { equals3 } from "../num/vec3.js";
import {
  type FaceName,
  type SliceName,
  faceNormal,
  slicesConnecting,
  sliceMoveAxis,
  wholeAxisOfAxis,
  wholeMoveAxis,
} from "../topo/topology.js";

/**
 * One inner-slice way of moving content from source to target
 */
export interface SliceAlgorithmResult {
  readonly sliceName: SliceName;
  /** 1-based index of the layer holding the target cell */
  readonly sliceIndex: number;
  /** Signed slice turns carrying the source face onto the target face */
  readonly count: number;
  /** Where the content starts for this slice path */
  readonly sourceCoord: Point;
  /** The single-layer move */
  readonly alg: SliceAlg;
}

export interface TranslationResult {
  readonly targetFace: FaceName;
  readonly sourceFace: FaceName;
  readonly targetCoord: Point;
  /** Source position for the whole-cube rotation */
  readonly sourceCoord: Point;
  readonly wholeCubeRotation: WholeAlg;
  /** One entry for adjacent faces, two for opposite faces */
  readonly sliceAlgorithms: readonly SliceAlgorithmResult[];
}

export class FaceTranslator {
  readonly geometry: CubeGeometry;

  constructor(geometry: CubeGeometry) {
    this.geometry = geometry;
  }

  /**
   * Source coordinate and the moves that bring it to `targetCoord`
   *
   * @throws CubeInternalError for the same face or a point outside the
   *   center grid
   */
  translate(targetFace: FaceName, sourceFace: FaceName, targetCoord: Point): TranslationResult {
    this._checkPoint(targetFace, targetCoord);
    const wholeRotation = rotationBetween(sourceFace, targetFace);
    const sliceAlgorithms = slicesConnecting(sourceFace, targetFace).map((name) => {
      const rotation = this.sliceRotation(sourceFace, targetFace, name);
      const count = signedTurns(rotation.turns * sliceMoveAxis(name).sense);
      const sliceIndex = this.geometry.sliceIndexOf(name, targetFace, targetCoord);
      return {
        sliceName: name,
        sliceIndex,
        count,
        sourceCoord: this._carry(inverseRotation(rotation), targetFace, sourceFace, targetCoord),
        alg: slice(name, layerRange(sliceIndex), count),
      };
    });
    return {
      targetFace,
      sourceFace,
      targetCoord,
      sourceCoord: this._carry(inverseRotation(wholeRotation), targetFace, sourceFace, targetCoord),
      wholeCubeRotation: this.wholeCubeRotationBetween(sourceFace, targetFace),
      sliceAlgorithms,
    };
  }

  /**
   * Target coordinate reached from `sourceCoord` by the given slice; the
   * inverse of the slice half of translate
   */
  translateTargetFromSource(
    sourceFace: FaceName,
    targetFace: FaceName,
    sourceCoord: Point,
    sliceName: SliceName
  ): Point {
    this._checkPoint(sourceFace, sourceCoord);
    const rotation = this.sliceRotation(sourceFace, targetFace, sliceName);
    return this._carry(rotation, sourceFace, targetFace, sourceCoord);
  }

  /**
   * Whole-cube rotation carrying `sourceFace` onto `targetFace`
   */
  wholeCubeRotationBetween(sourceFace: FaceName, targetFace: FaceName): WholeAlg {
    const rotation = rotationBetween(sourceFace, targetFace);
    const name = wholeAxisOfAxis(rotation.axis);
    return whole(name, signedTurns(rotation.turns * wholeMoveAxis(name).sense));
  }

  /**
   * Geometric rotation of `sliceName` that carries `sourceFace` onto
   * `targetFace`
   *
   * @throws CubeInternalError when the slice ring does not hold both faces
   */
  sliceRotation(sourceFace: FaceName, targetFace: FaceName, sliceName: SliceName): QuarterRotation {
    if (sourceFace === targetFace) {
      throw new CubeInternalError(`Source and target are both ${sourceFace}`);
    }
    if (!slicesConnecting(sourceFace, targetFace).includes(sliceName)) {
      throw new CubeInternalError(`Slice ${sliceName} does not connect ${sourceFace} and ${targetFace}`);
    }
    const axis = sliceMoveAxis(sliceName).axis;
    for (let turns = 1; turns < 4; turns++) {
      const rotation = { axis, turns };
      if (equals3(applyRotation(rotation, faceNormal(sourceFace)), faceNormal(targetFace))) {
        return rotation;
      }
    }
    throw new CubeInternalError(`Slice ${sliceName} cannot carry ${sourceFace} onto ${targetFace}`);
  }

  /**
   * The slice algorithm for a given slice, picked out of translate
   */
  sliceAlgorithmFor(
    targetFace: FaceName,
    sourceFace: FaceName,
    targetCoord: Point,
    sliceName: SliceName
  ): SliceAlgorithmResult {
    const found = this.translate(targetFace, sourceFace, targetCoord).sliceAlgorithms.find(
      (a) => a.sliceName === sliceName
    );
    if (!found) {
      throw new CubeInternalError(`Slice ${sliceName} does not connect ${sourceFace} and ${targetFace}`);
    }
    return found;
  }

  private _carry(rotation: QuarterRotation, from: FaceName, to: FaceName, p: Point): Point {
    const position = applyRotation(rotation, this.geometry.centerPosition(from, p));
    const located = this.geometry.locateCenter(position, applyRotation(rotation, faceNormal(from)));
    if (located.face !== to) {
      throw new CubeInternalError(`Rotation carries ${from} to ${located.face}, not ${to}`);
    }
    return located.point;
  }

  private _checkPoint(face: FaceName, p: Point): void {
    if (!this.geometry.isCenterPoint(p)) {
      throw new CubeInternalError(`Point (${p.row},${p.col}) outside the center of ${face}`);
    }
  }
}
