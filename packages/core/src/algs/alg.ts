/**
 * Algorithms
 *
 * An algorithm is an immutable value: a single face, slice or whole-cube
 * move with a signed repeat count, or a sequence of algorithms with its own
 * count. Counts are quarter turns in the move's clockwise sense; negative
 * counts are prime moves.
 *
 * Supported kinds:
 * - face: outer layer turn, optionally wide or inner via a layer range
 * - slice: inner layers of M, E or S, all of them by default
 * - whole: whole-cube rotation X, Y or Z
 * - seq: ordered sequence
 */

import type { FaceName, SliceName, WholeAxisName } from "../topo/topology.js";

// ============================================================================
// Alg Kinds
// ============================================================================

export type AlgKind = `face` | `slice` | `whole` | `seq`;

/**
 * 1-based inclusive layer range; face layers count from the face, slice
 * layers from the slice's reference face
 */
export interface LayerRange {
  readonly from: number;
  readonly to: number;
}

export interface FaceAlg {
  readonly kind: `face`;
  readonly face: FaceName;
  readonly count: number;
  /** Defaults to the outer layer only */
  readonly layers?: LayerRange;
}

export interface SliceAlg {
  readonly kind: `slice`;
  readonly slice: SliceName;
  readonly count: number;
  /** Defaults to every inner layer */
  readonly layers?: LayerRange;
}

export interface WholeAlg {
  readonly kind: `whole`;
  readonly axis: WholeAxisName;
  readonly count: number;
}

export interface SeqAlg {
  readonly kind: `seq`;
  readonly algs: readonly Alg[];
  readonly count: number;
}

export type Alg = FaceAlg | SliceAlg | WholeAlg | SeqAlg;

/** Single moves, everything except sequences */
export type SimpleAlg = FaceAlg | SliceAlg | WholeAlg;

// ============================================================================
// Creators
// ============================================================================

export function layerRange(from: number, to: number = from): LayerRange {
  return { from: Math.min(from, to), to: Math.max(from, to) };
}

export function face(name: FaceName, count = 1, layers?: LayerRange): FaceAlg {
  return layers ? { kind: `face`, face: name, count, layers } : { kind: `face`, face: name, count };
}

export function slice(name: SliceName, layers?: LayerRange, count = 1): SliceAlg {
  return layers ? { kind: `slice`, slice: name, count, layers } : { kind: `slice`, slice: name, count };
}

export function whole(axis: WholeAxisName, count = 1): WholeAlg {
  return { kind: `whole`, axis, count };
}

export function seq(...algs: Alg[]): SeqAlg {
  return { kind: `seq`, algs, count: 1 };
}

export const NOOP: SeqAlg = seq();

// ============================================================================
// Algebra
// ============================================================================

/**
 * Algorithm that undoes `alg`
 */
export function inverseAlg(alg: Alg): Alg {
  if (alg.kind === `seq`) {
    return { kind: `seq`, algs: [...alg.algs].reverse().map(inverseAlg), count: alg.count };
  }
  return { ...alg, count: -alg.count };
}

/**
 * `alg` repeated `n` times; negative `n` repeats the inverse
 */
export function timesAlg(alg: Alg, n: number): Alg {
  return { ...alg, count: alg.count * n };
}

/**
 * Single moves of an algorithm in play order
 */
export function flattenAlg(alg: Alg): SimpleAlg[] {
  if (alg.kind !== `seq`) {
    return [alg];
  }
  const once = alg.algs.flatMap(flattenAlg);
  const unit = alg.count < 0 ? flattenAlg(inverseAlg({ ...alg, count: 1 })) : once;
  const out: SimpleAlg[] = [];
  for (let i = 0; i < Math.abs(alg.count); i++) {
    out.push(...unit);
  }
  return out;
}

/**
 * Number of single moves with a non-zero effect
 */
export function countMoves(alg: Alg): number {
  return flattenAlg(alg).filter((a) => a.count % 4 !== 0).length;
}

function sameTarget(a: SimpleAlg, b: SimpleAlg): boolean {
  if (a.kind === `face` && b.kind === `face`) {
    return a.face === b.face && rangeKey(a.layers) === rangeKey(b.layers);
  }
  if (a.kind === `slice` && b.kind === `slice`) {
    return a.slice === b.slice && rangeKey(a.layers) === rangeKey(b.layers);
  }
  return a.kind === `whole` && b.kind === `whole` && a.axis === b.axis;
}

function rangeKey(range: LayerRange | undefined): string {
  return range ? `${range.from}:${range.to}` : `default`;
}

function normalizeCount(count: number): number {
  const t = ((count % 4) + 4) % 4;
  return t === 3 ? -1 : t;
}

/**
 * Merge adjacent moves on the same layers and drop moves that cancel
 */
export function simplifyAlg(alg: Alg): SeqAlg {
  const stack: SimpleAlg[] = [];
  for (const move of flattenAlg(alg)) {
    const top = stack[stack.length - 1];
    if (top !== undefined && sameTarget(top, move)) {
      stack.pop();
      const merged = normalizeCount(top.count + move.count);
      if (merged !== 0) {
        stack.push({ ...top, count: merged });
      }
    } else if (normalizeCount(move.count) !== 0) {
      stack.push({ ...move, count: normalizeCount(move.count) });
    }
  }
  return { kind: `seq`, algs: stack, count: 1 };
}

// ============================================================================
// Formatting
// ============================================================================

function formatCount(count: number): string {
  if (count === 1) return ``;
  if (count === -1) return `'`;
  if (count < 0) return `${-count}'`;
  return `${count}`;
}

function formatRange(range: LayerRange | undefined): string {
  if (!range) return ``;
  return range.from === range.to ? `[${range.from}]` : `[${range.from}:${range.to}]`;
}

/**
 * Notation accepted by parseAlg
 */
export function algToString(alg: Alg): string {
  switch (alg.kind) {
    case `face`:
      return `${alg.face}${formatRange(alg.layers)}${formatCount(alg.count)}`;
    case `slice`:
      return `${alg.slice}${formatRange(alg.layers)}${formatCount(alg.count)}`;
    case `whole`:
      return `${alg.axis}${formatCount(alg.count)}`;
    case `seq`: {
      const body = alg.algs.map(algToString).join(` `);
      return alg.count === 1 ? body : `(${body})${formatCount(alg.count)}`;
    }
  }
}
