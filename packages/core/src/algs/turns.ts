/**
 * Lowering algorithms to geometric layer turns
 */

import { CubeInternalError } from "../errors.js";
import type { LayerTurn } from "../model/Cube.js";
import { normalizeTurns } from "../num/rotation.js";
import {
  type FaceName,
  type MoveAxis,
  faceMoveAxis,
  faceNormal,
  faceAxis,
  referenceFaceOf,
  sliceMoveAxis,
  wholeMoveAxis,
} from "../topo/topology.js";
import { type Alg, type LayerRange, type SimpleAlg, flattenAlg } from "./alg.js";

/**
 * Cubie coordinate of the layer `distance` layers in from a face
 */
function layerFrom(face: FaceName, distance: number, size: number): number {
  return faceNormal(face)[faceAxis(face)] > 0 ? size - 1 - distance : distance;
}

function rangeLayers(face: FaceName, range: LayerRange, size: number): number[] {
  const out: number[] = [];
  for (let d = range.from; d <= range.to; d++) {
    out.push(layerFrom(face, d - 1, size));
  }
  return out;
}

function checkRange(range: LayerRange, min: number, max: number, what: string): void {
  if (!Number.isInteger(range.from) || !Number.isInteger(range.to) || range.from < min || range.to > max) {
    throw new CubeInternalError(`${what} layers [${range.from}:${range.to}] outside ${min}..${max}`);
  }
}

function turnOf(axis: MoveAxis, count: number, layers: number[]): LayerTurn {
  return { axis: axis.axis, layers, turns: normalizeTurns(count * axis.sense) };
}

/**
 * Layer turn of one move on a cube of the given size
 */
export function simpleAlgTurn(alg: SimpleAlg, size: number): LayerTurn {
  switch (alg.kind) {
    case `face`: {
      const range = alg.layers ?? { from: 1, to: 1 };
      checkRange(range, 1, size, alg.face);
      return turnOf(faceMoveAxis(alg.face), alg.count, rangeLayers(alg.face, range, size));
    }
    case `slice`: {
      const range = alg.layers ?? { from: 1, to: size - 2 };
      if (size < 3) {
        return turnOf(sliceMoveAxis(alg.slice), 0, []);
      }
      checkRange(range, 1, size - 2, alg.slice);
      // Slice layer i sits i layers in from the reference face
      const ref = referenceFaceOf(alg.slice);
      return turnOf(sliceMoveAxis(alg.slice), alg.count, rangeLayers(ref, { from: range.from + 1, to: range.to + 1 }, size));
    }
    case `whole`: {
      const all = Array.from({ length: size }, (_, i) => i);
      return turnOf(wholeMoveAxis(alg.axis), alg.count, all);
    }
  }
}

/**
 * Layer turns of an algorithm in play order, skipping moves with no effect
 */
export function algTurns(alg: Alg, size: number): LayerTurn[] {
  return flattenAlg(alg)
    .map((a) => simpleAlgTurn(a, size))
    .filter((t) => t.turns !== 0 && t.layers.length > 0);
}
