/**
 * Stickers and their typed tag side channel
 *
 * Stickers are objects that move between slots on every turn, so anything
 * stored on them travels along. Tags are keyed by a closed set of kinds.
 */

import type { HolderId } from "../topo/handles.js";
import type { Color } from "./colors.js";

/**
 * Tag left by a marked face tracker
 */
export interface TrackerMark {
  readonly holderId: HolderId;
  readonly color: Color;
}

export interface TagPayloads {
  tracker: readonly TrackerMark[];
  debug: string;
}

export type TagKind = keyof TagPayloads;

export class Sticker {
  readonly color: Color;
  private _tags: { [K in TagKind]?: TagPayloads[K] } = {};

  constructor(color: Color) {
    this.color = color;
  }

  getTag<K extends TagKind>(kind: K): TagPayloads[K] | undefined {
    return this._tags[kind];
  }

  setTag<K extends TagKind>(kind: K, value: TagPayloads[K]): void {
    this._tags[kind] = value;
  }

  clearTag(kind: TagKind): void {
    delete this._tags[kind];
  }

  hasTag(kind: TagKind): boolean {
    return this._tags[kind] !== undefined;
  }

  // ==========================================================================
  // Tracker marks
  // ==========================================================================

  hasTrackerMark(holderId: HolderId, color: Color): boolean {
    return (this._tags.tracker ?? []).some((m) => m.holderId === holderId && m.color === color);
  }

  addTrackerMark(mark: TrackerMark): void {
    if (!this.hasTrackerMark(mark.holderId, mark.color)) {
      this._tags.tracker = [...(this._tags.tracker ?? []), mark];
    }
  }

  removeTrackerMark(holderId: HolderId, color: Color): void {
    const marks = (this._tags.tracker ?? []).filter((m) => m.holderId !== holderId || m.color !== color);
    if (marks.length > 0) {
      this._tags.tracker = marks;
    } else {
      delete this._tags.tracker;
    }
  }
}
