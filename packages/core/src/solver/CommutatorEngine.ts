/**
 * Block commutator engine
 *
 * Moves a rectangle of center stickers from a source face to a target face
 * with the balanced 8-move commutator
 *
 *   A F C F' A' F C' F'
 *
 * where A turns the slice layers of the target block, F turns the target
 * face and C turns the slice layers of the block's position after F. When
 * the layers of A and C are disjoint the result is a pure 3-cycle:
 * source block -> target block -> second block -> source block, with the
 * second block on the source face. Nothing else on the cube moves.
 */

import {
  type Alg,
  type SeqAlg,
  face as faceAlg,
  inverseAlg,
  layerRange,
  seq,
  slice as sliceAlg,
} from "../algs/alg.js";
import { CubeInternalError } from "../errors.js";
import {
  type Block,
  type Point,
  block,
  blockCells,
  blockSize,
  blocksEqual,
  formatBlock,
  rotateBlockCw,
} from "../geom/grid.js";
import { type Logger, NOOP_LOGGER } from "../log.js";
import type { Color } from "../model/colors.js";
import type { Cube } from "../model/Cube.js";
import { signedTurns } from "../num/rotation.js";
import type { Operator } from "../ops/Operator.js";
import { type FaceName, type SliceName, SLICES, isOnSliceRing, slicesConnecting } from "../topo/topology.js";
import { FaceTranslator } from "../translate/FaceTranslator.js";

// ============================================================================
// Types
// ============================================================================

/**
 * How a source rectangle must match before a block is moved
 * - CompleteBlock: every source cell has the color
 * - BigThanSource: more source cells have it than target cells do
 * - ExactMatch: the target holds none of the color and every source cell does
 */
export type SearchBlockMode = `CompleteBlock` | `BigThanSource` | `ExactMatch`;

/** Clockwise (1) or counter-clockwise (-1) turn of the target face */
export type TurnDirection = 1 | -1;

/**
 * Everything needed to play one commutator, computed without touching the
 * cube
 */
export interface CommutatorPlan {
  readonly targetFace: FaceName;
  readonly sourceFace: FaceName;
  readonly sliceName: SliceName;
  readonly targetBlock: Block;
  /** Target block after one turn of the target face */
  readonly rotatedTargetBlock: Block;
  /** Source cells that A carries onto the target block */
  readonly naturalSourceBlock: Block;
  /** Source cells that C carries onto the rotated target block */
  readonly secondBlock: Block;
  readonly direction: TurnDirection;
  readonly algorithm: SeqAlg;
}

export interface CommutatorResult extends CommutatorPlan {
  /** Where the moved block was before the setup turn */
  readonly sourceBlock: Block;
  /** Source-face turn that aligned the block, or null */
  readonly setup: Alg | null;
  /** Source cells now holding the old target content, in final coordinates */
  readonly finalSecondBlock: Block;
}

export interface ExecuteCommutatorParams {
  sourceFace: FaceName;
  targetFace: FaceName;
  targetBlock: Block;
  /** Block to move; defaults to the natural source block */
  sourceBlock?: Block;
  /** Undo the setup turn afterwards (cage mode) */
  preserveState?: boolean;
  /** Compute the plan without playing anything */
  dryRun?: boolean;
}

export interface BigBlockSearchOptions {
  /** Cells to include; defaults to cells of the searched color */
  predicate?: (p: Point) => boolean;
  /** Keep only blocks that can be moved from this face */
  source?: FaceName;
}

/** Moved block size -> number of commutators */
export type BlockStatistics = ReadonlyMap<number, number>;

export interface CommutatorEngineOptions {
  logger?: Logger;
}

// ============================================================================
// Engine
// ============================================================================

export class CommutatorEngine {
  readonly operator: Operator;
  readonly translator: FaceTranslator;

  private readonly _logger: Logger;
  private readonly _statistics = new Map<number, number>();

  constructor(operator: Operator, options: CommutatorEngineOptions = {}) {
    this.operator = operator;
    this.translator = new FaceTranslator(operator.cube.geometry);
    this._logger = options.logger ?? NOOP_LOGGER;
  }

  get cube(): Cube {
    return this.operator.cube;
  }

  private get _n(): number {
    return this.cube.n;
  }

  // ==========================================================================
  // Geometry of a commutator
  // ==========================================================================

  /**
   * Slice used to move content between two faces: the first of M, E, S
   * whose ring holds both
   */
  sliceFor(targetFace: FaceName, sourceFace: FaceName): SliceName {
    const slices = slicesConnecting(targetFace, sourceFace);
    if (targetFace === sourceFace || slices.length === 0) {
      throw new CubeInternalError(`No slice moves content from ${sourceFace} to ${targetFace}`);
    }
    return slices[0];
  }

  /**
   * 1-based slice layers covered by a block
   */
  blockLayers(sliceName: SliceName, face: FaceName, b: Block): { from: number; to: number } {
    const a = this.cube.geometry.sliceIndexOf(sliceName, face, b.start);
    const c = this.cube.geometry.sliceIndexOf(sliceName, face, b.end);
    return { from: Math.min(a, c), to: Math.max(a, c) };
  }

  /**
   * Direction of the target turn that keeps the rotated block clear of the
   * block's own layers, or null when neither does
   */
  commutatorDirection(sliceName: SliceName, targetFace: FaceName, b: Block): TurnDirection | null {
    const own = this.blockLayers(sliceName, targetFace, b);
    for (const direction of [1, -1] as const) {
      const rotated = this.blockLayers(sliceName, targetFace, rotateBlockCw(b, this._n, direction));
      if (rotated.to < own.from || rotated.from > own.to) {
        return direction;
      }
    }
    return null;
  }

  /**
   * True when the block can be moved with a commutator through `sliceName`
   */
  isValidBlock(sliceName: SliceName, targetFace: FaceName, b: Block): boolean {
    return this.commutatorDirection(sliceName, targetFace, b) !== null;
  }

  /**
   * Source cells that a turn of `sliceName` carries onto a target block
   */
  sourceBlockOf(targetFace: FaceName, sourceFace: FaceName, sliceName: SliceName, b: Block): Block {
    const t = this.translator;
    return block(
      t.sliceAlgorithmFor(targetFace, sourceFace, b.start, sliceName).sourceCoord,
      t.sliceAlgorithmFor(targetFace, sourceFace, b.end, sliceName).sourceCoord
    );
  }

  /**
   * Build the commutator for a target block
   *
   * @throws CubeInternalError when both turn directions overlap the block's
   *   layers
   */
  plan(sourceFace: FaceName, targetFace: FaceName, targetBlock: Block): CommutatorPlan {
    const sliceName = this.sliceFor(targetFace, sourceFace);
    const direction = this.commutatorDirection(sliceName, targetFace, targetBlock);
    if (direction === null) {
      throw new CubeInternalError(
        `Block ${formatBlock(targetBlock)} on ${targetFace} overlaps its own rotation in both directions`
      );
    }
    const rotatedTargetBlock = rotateBlockCw(targetBlock, this._n, direction);
    const count = this.translator.sliceAlgorithmFor(targetFace, sourceFace, targetBlock.start, sliceName).count;

    const layersA = this.blockLayers(sliceName, targetFace, targetBlock);
    const layersC = this.blockLayers(sliceName, targetFace, rotatedTargetBlock);
    const a = sliceAlg(sliceName, layerRange(layersA.from, layersA.to), count);
    const c = sliceAlg(sliceName, layerRange(layersC.from, layersC.to), count);
    const f = faceAlg(targetFace, direction);

    return {
      targetFace,
      sourceFace,
      sliceName,
      targetBlock,
      rotatedTargetBlock,
      naturalSourceBlock: this.sourceBlockOf(targetFace, sourceFace, sliceName, targetBlock),
      secondBlock: this.sourceBlockOf(targetFace, sourceFace, sliceName, rotatedTargetBlock),
      direction,
      algorithm: seq(a, f, c, inverseAlg(f), inverseAlg(a), f, inverseAlg(c), inverseAlg(f)),
    };
  }

  // ==========================================================================
  // Search
  // ==========================================================================

  private _countColor(face: FaceName, b: Block, color: Color): number {
    let count = 0;
    for (const p of blockCells(b)) {
      if (this.cube.centerColor(face, p) === color) count++;
    }
    return count;
  }

  /**
   * Find a source rectangle that fills `targetBlock` under `mode`
   *
   * @returns clockwise turns of the source face that bring the found
   *   rectangle onto the natural source block, or null when there is
   *   nothing to do or no rectangle qualifies
   */
  searchBlock(
    targetFace: FaceName,
    sourceFace: FaceName,
    color: Color,
    mode: SearchBlockMode,
    targetBlock: Block
  ): number | null {
    const size = blockSize(targetBlock);
    const present = this._countColor(targetFace, targetBlock, color);
    if (present === size) {
      return null;
    }
    const required = requiredMatches(mode, present, size);
    if (required === null) {
      return null;
    }

    const sliceName = this.sliceFor(targetFace, sourceFace);
    const natural = this.sourceBlockOf(targetFace, sourceFace, sliceName, targetBlock);
    for (let k = 0; k < 4; k++) {
      if (this._countColor(sourceFace, rotateBlockCw(natural, this._n, k), color) >= required) {
        return (4 - k) % 4;
      }
    }
    return null;
  }

  /**
   * Rectangles of cells on `face`, largest first
   *
   * From every matching cell (row-major) a 1x1 block is taken, then the
   * block grown along rows and then along columns. Equal sizes keep
   * discovery order.
   */
  searchBigBlocks(face: FaceName, color: Color, options: BigBlockSearchOptions = {}): Block[] {
    const matches = options.predicate ?? ((p: Point) => this.cube.centerColor(face, p) === color);
    const slices = options.source
      ? [this.sliceFor(face, options.source)]
      : SLICES.filter((s) => isOnSliceRing(s, face));
    const valid = (b: Block) => slices.some((s) => this.isValidBlock(s, face, b));

    const n = this._n;
    const found: Block[] = [];
    for (let row = 0; row < n; row++) {
      for (let col = 0; col < n; col++) {
        if (!matches({ row, col })) continue;
        const single = block({ row, col });
        if (valid(single)) found.push(single);

        let endRow = row;
        while (endRow + 1 < n && matches({ row: endRow + 1, col })) endRow++;
        let endCol = col;
        const columnMatches = (c: number) => {
          for (let r = row; r <= endRow; r++) {
            if (!matches({ row: r, col: c })) return false;
          }
          return true;
        };
        while (endCol + 1 < n && columnMatches(endCol + 1)) endCol++;

        const grown = block({ row, col }, { row: endRow, col: endCol });
        if (!blocksEqual(grown, single) && valid(grown)) found.push(grown);
      }
    }
    return found.sort((a, b) => blockSize(b) - blockSize(a));
  }

  // ==========================================================================
  // Execution
  // ==========================================================================

  /**
   * Play (or plan) the commutator that moves `sourceBlock` onto `targetBlock`
   *
   * @throws CubeInternalError when the source block cannot be aligned with
   *   the natural source block by any turn of the source face
   */
  executeCommutator(params: ExecuteCommutatorParams): CommutatorResult {
    const { sourceFace, targetFace, targetBlock } = params;
    const normalized = block(targetBlock.start, targetBlock.end);
    const plan = this.plan(sourceFace, targetFace, normalized);
    const sourceBlock = params.sourceBlock ? block(params.sourceBlock.start, params.sourceBlock.end) : plan.naturalSourceBlock;

    let setupTurns = -1;
    for (let k = 0; k < 4; k++) {
      if (blocksEqual(rotateBlockCw(sourceBlock, this._n, k), plan.naturalSourceBlock)) {
        setupTurns = k;
        break;
      }
    }
    if (setupTurns < 0) {
      throw new CubeInternalError(
        `Source block ${formatBlock(sourceBlock)} cannot be aligned with ${formatBlock(plan.naturalSourceBlock)} on ${sourceFace}`
      );
    }
    const setup = setupTurns === 0 ? null : faceAlg(sourceFace, signedTurns(setupTurns));
    const preserve = params.preserveState ?? false;
    const finalSecondBlock =
      preserve && setupTurns !== 0 ? rotateBlockCw(plan.secondBlock, this._n, -setupTurns) : plan.secondBlock;
    const result: CommutatorResult = { ...plan, sourceBlock, setup, finalSecondBlock };

    if (params.dryRun) {
      return result;
    }

    this._logger.debug(2, () =>
      `commutator ${sourceFace}${formatBlock(sourceBlock)} -> ${targetFace}${formatBlock(normalized)} setup=${setupTurns}`
    );
    if (setup) this.operator.play(setup);
    this.operator.play(plan.algorithm);
    if (setup && preserve) this.operator.play(inverseAlg(setup));

    const size = blockSize(normalized);
    this._statistics.set(size, (this._statistics.get(size) ?? 0) + 1);
    return result;
  }

  // ==========================================================================
  // Statistics
  // ==========================================================================

  getBlockStatistics(): BlockStatistics {
    return new Map([...this._statistics.entries()].sort((a, b) => a[0] - b[0]));
  }

  resetBlockStatistics(): void {
    this._statistics.clear();
  }
}

/**
 * Source cells that must match under a mode, or null when the mode rejects
 * the target outright
 */
function requiredMatches(mode: SearchBlockMode, present: number, size: number): number | null {
  switch (mode) {
    case `CompleteBlock`:
      return size;
    case `BigThanSource`:
      return present + 1;
    case `ExactMatch`:
      return present > 0 ? null : size;
  }
}
