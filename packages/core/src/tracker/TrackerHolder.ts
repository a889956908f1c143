/**
 * Tracker holder
 *
 * Owns the six face trackers of one cube and answers face-to-color
 * queries. Odd cubes use the fixed middle centers; even cubes have none, so
 * two trackers mark a sticker and the rest follow from opposites and from
 * the chirality of the BOY scheme.
 */

import { CubeInternalError } from "../errors.js";
import { type Color, COLORS, type FaceColors, isBoyScheme, isColorPermutation, oppositeColor } from "../model/colors.js";
import type { Cube, Part } from "../model/Cube.js";
import type { Sticker } from "../model/sticker.js";
import type { HolderId } from "../topo/handles.js";
import { type FaceName, FACES, mapFaces, opposite } from "../topo/topology.js";
import {
  type FaceTracker,
  type MarkedTracker,
  describeTracker,
  markedTracker,
  simpleTracker,
} from "./trackers.js";

/**
 * Handle returned by preservePhysicalFaces; `end` puts every marked
 * tracker back on the face it was on when the guard began
 */
export interface PhysicalFacesGuard {
  end(): void;
}

export class TrackerHolder {
  readonly id: HolderId;
  readonly cube: Cube;
  readonly trackers: readonly FaceTracker[];

  private _cache: { counter: number; colors: FaceColors } | null = null;
  private _frozen: FaceColors | null = null;
  private _released = false;

  /**
   * Requires a cube of size 3 or more. A 2x2 has no centers; check it with
   * `CenterReductionSolver.isCubeSolved` instead of solving.
   *
   * @throws CubeInternalError for a cube without centers
   */
  constructor(cube: Cube) {
    if (cube.n < 1) {
      throw new CubeInternalError(`A ${cube.size}x${cube.size} cube has no centers to track`);
    }
    this.cube = cube;
    this.id = cube.allocateHolderId();
    this.trackers = cube.isOdd ? this._createOddTrackers() : this._createEvenTrackers();

    const colors = this.getFaceColors();
    if (!isColorPermutation(colors)) {
      this.cleanup();
      throw new CubeInternalError(`Trackers do not form a color permutation: ${this.describe()}`);
    }
  }

  get released(): boolean {
    return this._released;
  }

  // ==========================================================================
  // Construction
  // ==========================================================================

  private _createOddTrackers(): FaceTracker[] {
    return FACES.map((face) => {
      const color = this.cube.middleColor(face);
      if (color === null) {
        throw new CubeInternalError(`Odd cube without a middle center on ${face}`);
      }
      return simpleTracker(color, `middle`, (f) => this.cube.middleColor(f) === color);
    });
  }

  private _createEvenTrackers(): FaceTracker[] {
    const first = this._mostFrequent(FACES, COLORS);
    const t1 = this._mark(first.face, first.color);
    const t2 = this._oppositeOf(t1);

    const usedFaces = [first.face, opposite(first.face)];
    const usedColors = [first.color, oppositeColor(first.color)];
    const second = this._mostFrequent(
      FACES.filter((f) => !usedFaces.includes(f)),
      COLORS.filter((c) => !usedColors.includes(c))
    );
    const t3 = this._mark(second.face, second.color);
    const t4 = this._oppositeOf(t3);

    const fixed: FaceTracker[] = [t1, t2, t3, t4];
    const c5 = COLORS.find((c) => !fixed.some((t) => t.color === c));
    if (c5 === undefined) {
      throw new CubeInternalError(`No color left for the last face pair`);
    }
    const c6 = oppositeColor(c5);

    // The last pair is decided by chirality: only one of its two faces
    // gives a BOY layout together with the four fixed trackers.
    const chiralFace = (): FaceName => {
      const known = new Map<FaceName, Color>(fixed.map((t) => [this.faceOf(t), t.color]));
      const free = FACES.filter((f) => !known.has(f));
      if (free.length !== 2) {
        throw new CubeInternalError(`Fixed trackers overlap: ${fixed.map(describeTracker).join(` `)}`);
      }
      const [a, b] = free;
      const candidate = mapFaces((f) => known.get(f) ?? (f === a ? c5 : c6));
      return isBoyScheme(candidate) ? a : b;
    };
    const t5 = simpleTracker(c5, `chirality`, (f) => f === chiralFace());
    const t6 = simpleTracker(c6, `opposite ${c5}`, (f) => f === opposite(chiralFace()));
    return [...fixed, t5, t6];
  }

  /**
   * Face and color with the highest center count; the first strictly
   * greater count wins
   */
  private _mostFrequent(faces: readonly FaceName[], colors: readonly Color[]): { face: FaceName; color: Color } {
    let best: { face: FaceName; color: Color; count: number } | null = null;
    for (const face of faces) {
      const counts = this.cube.centerColorCounts(face);
      for (const color of colors) {
        const count = counts.get(color) ?? 0;
        if (best === null || count > best.count) {
          best = { face, color, count };
        }
      }
    }
    if (best === null) {
      throw new CubeInternalError(`No face/color candidates left`);
    }
    return best;
  }

  private _mark(face: FaceName, color: Color): MarkedTracker {
    const tracker = markedTracker(color, this.id);
    this._placeMark(tracker, face);
    return tracker;
  }

  private _oppositeOf(tracker: FaceTracker): FaceTracker {
    return simpleTracker(oppositeColor(tracker.color), `opposite ${tracker.color}`, (f) => f === opposite(this.faceOf(tracker)));
  }

  /**
   * Tag a center of `face`, preferring a sticker of the tracker's color
   */
  private _placeMark(tracker: MarkedTracker, face: FaceName): void {
    let target: Sticker | null = null;
    for (const { sticker } of this.cube.centerCells(face)) {
      target ??= sticker;
      if (sticker.color === tracker.color) {
        target = sticker;
        break;
      }
    }
    if (target === null) {
      throw new CubeInternalError(`Face ${face} has no center to mark`);
    }
    target.addTrackerMark({ holderId: tracker.holderId, color: tracker.color });
  }

  private _removeMark(tracker: MarkedTracker): void {
    for (const sticker of this.cube.allStickers()) {
      sticker.removeTrackerMark(tracker.holderId, tracker.color);
    }
  }

  // ==========================================================================
  // Queries
  // ==========================================================================

  /**
   * Face the tracker currently stands for
   */
  faceOf(tracker: FaceTracker): FaceName {
    switch (tracker.kind) {
      case `simple`: {
        const faces = FACES.filter((f) => tracker.predicate(f));
        if (faces.length !== 1) {
          throw new CubeInternalError(`Tracker ${describeTracker(tracker)} matches ${faces.length} faces`);
        }
        return faces[0];
      }
      case `marked`: {
        if (this._released) {
          throw new CubeInternalError(`Tracker holder ${this.id} was released`);
        }
        for (const face of FACES) {
          for (const { sticker } of this.cube.centerCells(face)) {
            if (sticker.hasTrackerMark(tracker.holderId, tracker.color)) {
              return face;
            }
          }
        }
        throw new CubeInternalError(`Mark of ${describeTracker(tracker)} is missing`);
      }
    }
  }

  /**
   * Color each face stands for; recomputed only after the cube changed
   */
  getFaceColors(): FaceColors {
    if (this._frozen) {
      return this._frozen;
    }
    const counter = this.cube.modifyCounter;
    if (this._cache && this._cache.counter === counter) {
      return this._cache.colors;
    }
    const byFace = new Map<FaceName, Color>();
    for (const tracker of this.trackers) {
      const face = this.faceOf(tracker);
      if (byFace.has(face)) {
        throw new CubeInternalError(`Two trackers claim face ${face}: ${this.describe()}`);
      }
      byFace.set(face, tracker.color);
    }
    const colors = mapFaces((f) => {
      const color = byFace.get(f);
      if (color === undefined) {
        throw new CubeInternalError(`No tracker for face ${f}`);
      }
      return color;
    });
    this._cache = { counter, colors };
    return colors;
  }

  colorOfFace(face: FaceName): Color {
    return this.getFaceColors()[face];
  }

  trackerOfColor(color: Color): FaceTracker {
    const tracker = this.trackers.find((t) => t.color === color);
    if (!tracker) {
      throw new CubeInternalError(`No tracker for color ${color}`);
    }
    return tracker;
  }

  faceOfColor(color: Color): FaceName {
    return this.faceOf(this.trackerOfColor(color));
  }

  isBoy(): boolean {
    return isBoyScheme(this.getFaceColors());
  }

  /**
   * True when every facelet of the part matches its face's tracked color
   */
  partMatchFaces(part: Part): boolean {
    const colors = this.getFaceColors();
    return this.cube.partSlots(part).every(({ face, slot }) => this.cube.colorAt(slot) === colors[face]);
  }

  describe(): string {
    return this.trackers
      .map((t) => {
        let face: string;
        try {
          face = this.faceOf(t);
        } catch (error) {
          if (!(error instanceof CubeInternalError)) throw error;
          face = `?`;
        }
        return `${face}=${describeTracker(t)}`;
      })
      .join(` `);
  }

  // ==========================================================================
  // Scoped state
  // ==========================================================================

  /**
   * Move a marked tracker's tag onto a center of `face`
   */
  restoreToPhysicalFace(tracker: FaceTracker, face: FaceName): void {
    if (tracker.kind === `simple`) {
      return;
    }
    this._removeMark(tracker);
    this._placeMark(tracker, face);
    this._cache = null;
  }

  /**
   * Begin a guard that remembers the face of every marked tracker
   *
   * Call `end` on every exit path, or use withPreservedPhysicalFaces.
   */
  preservePhysicalFaces(): PhysicalFacesGuard {
    const saved = this.trackers
      .filter((t): t is MarkedTracker => t.kind === `marked`)
      .map((tracker) => ({ tracker, face: this.faceOf(tracker) }));
    let ended = false;
    return {
      end: () => {
        if (ended) return;
        ended = true;
        for (const { tracker, face } of saved) {
          if (this.faceOf(tracker) !== face) {
            this.restoreToPhysicalFace(tracker, face);
          }
        }
      },
    };
  }

  withPreservedPhysicalFaces<T>(fn: () => T): T {
    const guard = this.preservePhysicalFaces();
    try {
      return fn();
    } finally {
      guard.end();
    }
  }

  /**
   * Answer getFaceColors from a snapshot while `fn` runs
   */
  withFrozenFaceColors<T>(fn: () => T): T {
    const previous = this._frozen;
    this._frozen = this.getFaceColors();
    try {
      return fn();
    } finally {
      this._frozen = previous;
    }
  }

  /**
   * Remove every tag this holder placed
   */
  cleanup(): void {
    for (const tracker of this.trackers) {
      if (tracker.kind === `marked`) {
        this._removeMark(tracker);
      }
    }
    this._released = true;
    this._cache = null;
  }
}
