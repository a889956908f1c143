/**
 * Complete slice swap
 *
 * When the source face holds a full line of the wanted color and the
 * target holds none in a line of the same slice, one slice turn, a half
 * turn of the source and the slice turn back exchange the two lines:
 *
 *   A S2 A'
 *
 * A carries the target line onto the source, the half turn puts the full
 * line in its place (the mirrored layer) and A' brings it to the target.
 * The half turn moves edges, so the swap is not cage safe.
 */

import { type Alg, type SeqAlg, face, inverseAlg, layerRange, seq, slice } from "../algs/alg.js";
import { type Point, rotatePointCw } from "../geom/grid.js";
import type { Color } from "../model/colors.js";
import type { Cube } from "../model/Cube.js";
import type { Operator } from "../ops/Operator.js";
import { signedTurns } from "../num/rotation.js";
import { type FaceName, type SliceName, sliceMoveAxis } from "../topo/topology.js";
import type { FaceTranslator } from "../translate/FaceTranslator.js";

export interface SliceSwapPlan {
  readonly targetFace: FaceName;
  readonly sourceFace: FaceName;
  readonly sliceName: SliceName;
  /** 1-based slice layer of the target line */
  readonly layer: number;
  /** Target turn that lines a perpendicular target line up with the slice, or null */
  readonly conversion: Alg | null;
  /** Source turn that moves the full line to the mirrored layer, or null */
  readonly setup: Alg | null;
  /** The swap itself, without conversion and setup */
  readonly algorithm: SeqAlg;
  /** Cells of the wanted color the target gains */
  readonly gain: number;
}

export interface SliceSwapSearch {
  readonly targetFace: FaceName;
  readonly sourceFace: FaceName;
  readonly sliceName: SliceName;
  readonly color: Color;
  /** Only use target lines holding none of the color */
  readonly onlyTargetZero: boolean;
}

function lineCells(cube: Cube, sliceName: SliceName, face: FaceName, layer: number): Point[] {
  const cells: Point[] = [];
  for (const { point } of cube.centerCells(face)) {
    if (cube.geometry.sliceIndexOf(sliceName, face, point) === layer) {
      cells.push(point);
    }
  }
  return cells;
}

function countColor(cube: Cube, face: FaceName, cells: readonly Point[], color: Color): number {
  return cells.filter((p) => cube.centerColor(face, p) === color).length;
}

/**
 * First line swap that brings at least one cell of `color` to the target
 */
export function findSliceSwap(cube: Cube, translator: FaceTranslator, search: SliceSwapSearch): SliceSwapPlan | null {
  const { targetFace, sourceFace, sliceName, color } = search;
  const n = cube.n;
  const rotation = translator.sliceRotation(targetFace, sourceFace, sliceName);
  const toSource = signedTurns(rotation.turns * sliceMoveAxis(sliceName).sense);

  for (let layer = 1; layer <= n; layer++) {
    const mirror = n + 1 - layer;
    if (mirror === layer) {
      continue;
    }
    const targetLine = lineCells(cube, sliceName, targetFace, layer);
    const sourceLine = lineCells(cube, sliceName, sourceFace, mirror);

    for (const convert of [false, true]) {
      // A counter-clockwise target turn carries the cell at cw(q) onto q
      const before = convert ? targetLine.map((q) => rotatePointCw(q, n, 1)) : targetLine;
      const present = countColor(cube, targetFace, before, color);
      if (present === n || (search.onlyTargetZero && present > 0)) {
        continue;
      }
      for (let k = 0; k < 4; k++) {
        const source = sourceLine.map((q) => rotatePointCw(q, n, -k));
        if (countColor(cube, sourceFace, source, color) !== n) {
          continue;
        }
        const a = slice(sliceName, layerRange(layer), toSource);
        return {
          targetFace,
          sourceFace,
          sliceName,
          layer,
          conversion: convert ? face(targetFace, -1) : null,
          setup: k === 0 ? null : face(sourceFace, signedTurns(k)),
          algorithm: seq(a, face(sourceFace, 2), inverseAlg(a)),
          gain: n - present,
        };
      }
    }
  }
  return null;
}

/**
 * Play a swap; with `preserveState` the setup and conversion turns are
 * undone afterwards
 */
export function executeSliceSwap(operator: Operator, plan: SliceSwapPlan, preserveState: boolean): void {
  if (plan.conversion) operator.play(plan.conversion);
  if (plan.setup) operator.play(plan.setup);
  operator.play(plan.algorithm);
  if (preserveState) {
    if (plan.setup) operator.play(inverseAlg(plan.setup));
    if (plan.conversion) operator.play(inverseAlg(plan.conversion));
  }
}
