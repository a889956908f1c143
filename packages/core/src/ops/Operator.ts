/**
 * Move player
 *
 * Plays algorithms on a cube one layer turn at a time, keeps a history for
 * undo, and notifies listeners after each played algorithm. An optional
 * abort signal is checked before every single turn; a turn is never left
 * half applied. Undo playback ignores the signal, so restoring state always
 * completes.
 */

import type { Alg, SimpleAlg } from "../algs/alg.js";
import { algToString, flattenAlg, inverseAlg, seq } from "../algs/alg.js";
import { simpleAlgTurn } from "../algs/turns.js";
import { type OperatorConfig, type OperatorConfigInput, parseOperatorConfig } from "../config.js";
import { OperationAbortedError } from "../errors.js";
import { type Logger, NOOP_LOGGER } from "../log.js";
import type { Cube } from "../model/Cube.js";
import { assertCubeSanity } from "../model/sanity.js";

export interface PlayOptions {
  /** Add the algorithm to the undo history (default: true) */
  record?: boolean;
}

/**
 * Called once after every played algorithm
 */
export type OperatorListener = (alg: Alg) => void;

export interface OperatorOptions {
  logger?: Logger;
  signal?: AbortSignal;
  config?: OperatorConfigInput;
}

export class Operator {
  readonly cube: Cube;
  readonly config: OperatorConfig;

  private readonly _logger: Logger;
  private readonly _signal: AbortSignal | undefined;
  private readonly _history: Alg[] = [];
  private readonly _listeners = new Set<OperatorListener>();
  private _playedMoves = 0;
  private _restoreDepth = 0;

  constructor(cube: Cube, options: OperatorOptions = {}) {
    this.cube = cube;
    this.config = parseOperatorConfig(options.config);
    this._logger = options.logger ?? NOOP_LOGGER;
    this._signal = options.signal;
  }

  /**
   * Algorithms played with recording on, oldest first
   */
  get history(): readonly Alg[] {
    return this._history;
  }

  /**
   * Layer turns played so far, including undo turns
   */
  get countPlayedMoves(): number {
    return this._playedMoves;
  }

  /**
   * Register a listener; returns a function that removes it
   */
  addListener(listener: OperatorListener): () => void {
    this._listeners.add(listener);
    return () => {
      this._listeners.delete(listener);
    };
  }

  /**
   * Play an algorithm
   *
   * @throws OperationAbortedError when the signal fires between two turns;
   *   the turns already played stay applied and are recorded
   */
  play(alg: Alg, options: PlayOptions = {}): void {
    this._play(alg, (options.record ?? true) || this._restoreDepth > 0, true);
  }

  private _play(alg: Alg, record: boolean, abortable: boolean): void {
    this._logger.debug(3, () => `play ${algToString(alg)}`);

    const played: SimpleAlg[] = [];
    for (const move of flattenAlg(alg)) {
      if (abortable && this._signal?.aborted) {
        if (record && played.length > 0) {
          this._history.push(seq(...played));
        }
        throw new OperationAbortedError();
      }
      const turn = simpleAlgTurn(move, this.cube.size);
      if (turn.turns !== 0 && turn.layers.length > 0) {
        this.cube.turn(turn);
        this._playedMoves++;
      }
      played.push(move);
    }

    if (record) {
      this._history.push(alg);
    }
    if (this.config.checkSanity) {
      assertCubeSanity(this.cube);
    }
    for (const listener of this._listeners) {
      listener(alg);
    }
  }

  /**
   * Undo the most recent recorded algorithm
   *
   * @returns the undone algorithm, or null when the history is empty
   */
  undo(): Alg | null {
    const last = this._history.at(-1);
    if (last === undefined) {
      return null;
    }
    this._play(inverseAlg(last), false, false);
    this._history.pop();
    return last;
  }

  /**
   * Undo down to a history length
   */
  undoTo(length: number): void {
    while (this._history.length > length) {
      this.undo();
    }
  }

  undoAll(): void {
    this.undoTo(0);
  }

  /**
   * Run `fn` and then undo everything it played, also when it throws
   */
  withRestoreState<T>(fn: () => T): T {
    const mark = this._history.length;
    this._restoreDepth++;
    try {
      return fn();
    } finally {
      this._restoreDepth--;
      this.undoTo(mark);
    }
  }
}
