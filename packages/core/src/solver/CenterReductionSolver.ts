/**
 * Center reduction
 *
 * Fills the center grid of each face with its tracked color, one face at a
 * time. Sources are tried in order: the four neighbours of the working face,
 * then the opposite face once no neighbour can contribute. Faces solved
 * earlier are never touched again: a commutator only changes its target
 * and source faces, and a solved face holds none of the wanted color, so it
 * never serves as a source.
 */

import { type SolverConfig, type SolverConfigInput, parseSolverConfig } from "../config.js";
import { CubeInternalError } from "../errors.js";
import { type Block, block, blockSize, rotateBlockCw } from "../geom/grid.js";
import { type Logger, NOOP_LOGGER, childLogger } from "../log.js";
import { type Color, isBoyScheme } from "../model/colors.js";
import type { Cube } from "../model/Cube.js";
import { assertCubeSanity } from "../model/sanity.js";
import type { Operator } from "../ops/Operator.js";
import { type FaceName, adjacentFaces, mapFaces, opposite } from "../topo/topology.js";
import type { FaceTracker } from "../tracker/trackers.js";
import type { TrackerHolder } from "../tracker/TrackerHolder.js";
import { type BlockStatistics, CommutatorEngine, type SearchBlockMode } from "./CommutatorEngine.js";
import { executeSliceSwap, findSliceSwap } from "./sliceSwap.js";

export type SolveStatus = `already-solved` | `solved`;

export interface SolveResult {
  readonly status: SolveStatus;
  /** Layer turns played by this call */
  readonly movesPlayed: number;
}

export interface CenterReductionSolverOptions {
  config?: SolverConfigInput;
  logger?: Logger;
}

export class CenterReductionSolver {
  readonly operator: Operator;
  readonly config: SolverConfig;
  readonly engine: CommutatorEngine;

  private readonly _logger: Logger;

  constructor(operator: Operator, options: CenterReductionSolverOptions = {}) {
    this.config = parseSolverConfig(options.config);
    if (this.config.oddCubeFaceSwap) {
      throw new CubeInternalError(`Odd cube whole-face swap is not supported`);
    }
    this.operator = operator;
    this._logger = childLogger(options.logger ?? NOOP_LOGGER, `centers`);
    this.engine = new CommutatorEngine(operator, { logger: this._logger });
  }

  get cube(): Cube {
    return this.operator.cube;
  }

  // ==========================================================================
  // Status
  // ==========================================================================

  /**
   * True when every center grid is monochrome and the face colors form a
   * BOY layout
   */
  static isCubeSolved(cube: Cube): boolean {
    if (cube.n === 0) {
      return true;
    }
    if (!cube.isCentersSolved()) {
      return false;
    }
    return isBoyScheme(mapFaces((f) => cube.centerColor(f, { row: 0, col: 0 })));
  }

  solved(): boolean {
    return CenterReductionSolver.isCubeSolved(this.cube);
  }

  getBlockStatistics(): BlockStatistics {
    return this.engine.getBlockStatistics();
  }

  resetBlockStatistics(): void {
    this.engine.resetBlockStatistics();
  }

  // ==========================================================================
  // Solving
  // ==========================================================================

  /**
   * Reduce all centers
   *
   * @throws CubeInternalError when a face cannot be completed
   */
  solve(holder: TrackerHolder): SolveResult {
    if (this.solved()) {
      return { status: `already-solved`, movesPlayed: 0 };
    }
    const start = this.operator.countPlayedMoves;
    for (const tracker of holder.trackers) {
      this.solveSingleFace(holder, tracker);
    }
    if (!this.solved()) {
      throw new CubeInternalError(`Centers not reduced after all faces: ${holder.describe()}`);
    }
    const movesPlayed = this.operator.countPlayedMoves - start;
    this._logger.debug(1, () => `solved in ${movesPlayed} turns`);
    return { status: `solved`, movesPlayed };
  }

  /**
   * Fill the face of one tracker with its color
   *
   * @returns true when any move was played
   */
  solveSingleFace(holder: TrackerHolder, tracker: FaceTracker): boolean {
    const color = tracker.color;
    let face = holder.faceOf(tracker);
    if (this._isFaceSolved(face, color)) {
      return false;
    }
    this._logger.debug(1, () => `face ${face} <- ${color}`);

    if (this.config.bringFaceToFront && face !== `F`) {
      this.operator.play(this.engine.translator.wholeCubeRotationBetween(face, `F`));
      face = holder.faceOf(tracker);
    }

    while (!this._isFaceSolved(face, color)) {
      let progress = false;
      for (const source of adjacentFaces(face)) {
        if (this._doCenterFromFace(holder, face, source, color)) {
          progress = true;
        }
        if (this._isFaceSolved(face, color)) {
          return true;
        }
      }
      if (!progress) {
        progress = this._doCenterFromFace(holder, face, opposite(face), color);
      }
      if (!progress) {
        throw new CubeInternalError(`No source can add ${color} to ${face}: ${holder.describe()}`);
      }
    }
    return true;
  }

  private _isFaceSolved(face: FaceName, color: Color): boolean {
    return this.cube.countCenterColor(face, color) === this.cube.n * this.cube.n;
  }

  /**
   * Bring as much of `color` from `source` to `target` as possible
   */
  private _doCenterFromFace(holder: TrackerHolder, target: FaceName, source: FaceName, color: Color): boolean {
    if (this.cube.countCenterColor(source, color) === 0) {
      return false;
    }
    let work = false;

    if (this.config.completeSliceSwap && !this.config.preserveCage) {
      if (this._doCompleteSlices(holder, target, source, color)) {
        work = true;
      }
    }

    if (this.config.blockSearch) {
      const blocks = this.engine.searchBigBlocks(target, color, {
        source,
        predicate: (p) => this.cube.centerColor(target, p) !== color,
      });
      this._logger.debug(3, () => `${blocks.length} unsolved blocks on ${target} for ${source}`);
      for (const b of blocks) {
        if (this._blockCommutator(holder, target, source, color, b, `ExactMatch`)) {
          work = true;
        }
      }
    } else {
      for (const { point } of [...this.cube.centerCells(target)]) {
        if (this.cube.centerColor(target, point) === color) continue;
        const single = block(point);
        if (!this.engine.isValidBlock(this.engine.sliceFor(target, source), target, single)) continue;
        if (this._blockCommutator(holder, target, source, color, single, `CompleteBlock`)) {
          work = true;
        }
      }
    }
    return work;
  }

  private _doCompleteSlices(holder: TrackerHolder, target: FaceName, source: FaceName, color: Color): boolean {
    let work = false;
    for (;;) {
      const plan = findSliceSwap(this.cube, this.engine.translator, {
        targetFace: target,
        sourceFace: source,
        sliceName: this.engine.sliceFor(target, source),
        color,
        onlyTargetZero: this.config.completeSliceSwapOnlyTargetZero,
      });
      if (!plan) {
        return work;
      }
      this._logger.debug(2, () => `swap line ${plan.layer} ${source} -> ${target} (+${plan.gain})`);
      holder.withPreservedPhysicalFaces(() => executeSliceSwap(this.operator, plan, false));
      this._checkSanity(holder);
      work = true;
    }
  }

  private _blockCommutator(
    holder: TrackerHolder,
    target: FaceName,
    source: FaceName,
    color: Color,
    targetBlock: Block,
    mode: SearchBlockMode
  ): boolean {
    const setup = this.engine.searchBlock(target, source, color, mode, targetBlock);
    if (setup === null) {
      return false;
    }
    const natural = this.engine.plan(source, target, targetBlock).naturalSourceBlock;
    const sourceBlock = rotateBlockCw(natural, this.cube.n, -setup);
    this._logger.debug(3, () => `block of ${blockSize(targetBlock)} from ${source}`);

    holder.withPreservedPhysicalFaces(() =>
      this.engine.executeCommutator({
        sourceFace: source,
        targetFace: target,
        targetBlock,
        sourceBlock,
        preserveState: this.config.preserveCage,
      })
    );
    this._checkSanity(holder);
    return true;
  }

  private _checkSanity(holder: TrackerHolder): void {
    if (this.config.sanityCheck === `off`) {
      return;
    }
    if (!holder.isBoy()) {
      throw new CubeInternalError(`Tracker colors left the BOY layout: ${holder.describe()}`);
    }
    if (this.config.sanityCheck === `full`) {
      assertCubeSanity(this.cube);
    }
  }
}
