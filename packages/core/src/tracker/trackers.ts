/**
 * Face trackers
 *
 * A tracker answers "which face currently stands for color C". It is a
 * closed union with two kinds:
 * - simple: a predicate over faces, re-evaluated on every query
 * - marked: a tag on one center sticker; the face is wherever that sticker is
 */

import type { Color } from "../model/colors.js";
import type { HolderId } from "../topo/handles.js";
import type { FaceName } from "../topo/topology.js";

export type TrackerKind = `simple` | `marked`;

export interface SimpleTracker {
  readonly kind: `simple`;
  readonly color: Color;
  /** Short description of the rule, for diagnostics */
  readonly rule: string;
  readonly predicate: (face: FaceName) => boolean;
}

export interface MarkedTracker {
  readonly kind: `marked`;
  readonly color: Color;
  readonly holderId: HolderId;
}

export type FaceTracker = SimpleTracker | MarkedTracker;

export function simpleTracker(color: Color, rule: string, predicate: (face: FaceName) => boolean): SimpleTracker {
  return { kind: `simple`, color, rule, predicate };
}

export function markedTracker(color: Color, holderId: HolderId): MarkedTracker {
  return { kind: `marked`, color, holderId };
}

export function describeTracker(tracker: FaceTracker): string {
  switch (tracker.kind) {
    case `simple`:
      return `${tracker.color}(${tracker.rule})`;
    case `marked`:
      return `${tracker.color}(marked#${tracker.holderId})`;
  }
}
