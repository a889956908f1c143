/**
 * NxN cube arena
 *
 * The cube owns flat tables: sticker slots (one per facelet), edges and
 * corners. Records reference each other by handle only. Turning a layer
 * permutes the sticker objects between slots; slots, edges and corners are
 * fixed at construction and never change.
 */

import { CubeInternalError } from "../errors.js";
import { type Axis, type Vec3, dot3, equals3, key3 } from "../num/vec3.js";
import { normalizeTurns, rotateQuarter } from "../num/rotation.js";
import { CubeGeometry } from "../geom/CubeGeometry.js";
import type { Point } from "../geom/grid.js";
import {
  type CornerId,
  type EdgeId,
  type HolderId,
  type SlotId,
  asCornerId,
  asEdgeId,
  asHolderId,
  asSlotId,
} from "../topo/handles.js";
import {
  type FaceName,
  FACES,
  faceFrame,
  faceNormal,
  faceOfNormal,
  isAdjacent,
} from "../topo/topology.js";
import { BOY_SCHEME, type Color, COLORS, type FaceColors } from "./colors.js";
import { Sticker } from "./sticker.js";

// ============================================================================
// Records
// ============================================================================

export type SlotKind = `center` | `edge` | `corner`;

/**
 * A fixed facelet location
 */
export interface SlotInfo {
  readonly id: SlotId;
  readonly face: FaceName;
  /** Row on the full N x N grid */
  readonly row: number;
  /** Column on the full N x N grid */
  readonly col: number;
  /** Position of the cubie the facelet belongs to */
  readonly position: Vec3;
  readonly kind: SlotKind;
}

export interface EdgeRecord {
  readonly id: EdgeId;
  readonly faces: readonly [FaceName, FaceName];
}

export interface CornerRecord {
  readonly id: CornerId;
  readonly faces: readonly [FaceName, FaceName, FaceName];
  readonly slots: readonly [SlotId, SlotId, SlotId];
}

/**
 * A multi-face piece: one edge wing or one corner
 */
export type Part = { kind: `wing`; edge: EdgeId; ltr: number } | { kind: `corner`; corner: CornerId };

/**
 * A layer turn in geometric terms
 */
export interface LayerTurn {
  readonly axis: Axis;
  /** Cubie coordinates along the axis, 0..N-1 */
  readonly layers: readonly number[];
  /** Quarter turns, +90° right-handed about the positive axis */
  readonly turns: number;
}

export interface CubeOptions {
  /** Colors of the solved state; defaults to BOY */
  scheme?: FaceColors;
}

// ============================================================================
// Cube
// ============================================================================

export class Cube {
  readonly size: number;
  readonly geometry: CubeGeometry;

  private readonly _slots: SlotInfo[] = [];
  private readonly _slotByKey = new Map<string, SlotId>();
  private readonly _edges: EdgeRecord[] = [];
  private readonly _corners: CornerRecord[] = [];
  private readonly _permutations = new Map<string, Int32Array>();
  private _stickers: Sticker[] = [];
  private _modifyCounter = 0;
  private _nextHolderId = 0;

  constructor(size: number, options: CubeOptions = {}) {
    this.geometry = new CubeGeometry(size);
    this.size = size;
    const scheme = options.scheme ?? BOY_SCHEME;

    for (const face of FACES) {
      for (let row = 0; row < size; row++) {
        for (let col = 0; col < size; col++) {
          const id = asSlotId(this._slots.length);
          const position = this.geometry.stickerPosition(face, row, col);
          this._slots.push({ id, face, row, col, position, kind: slotKind(size, row, col) });
          this._slotByKey.set(slotKey(position, face), id);
          this._stickers.push(new Sticker(scheme[face]));
        }
      }
    }

    for (let i = 0; i < FACES.length; i++) {
      for (let j = i + 1; j < FACES.length; j++) {
        if (isAdjacent(FACES[i], FACES[j])) {
          this._edges.push({ id: asEdgeId(this._edges.length), faces: [FACES[i], FACES[j]] });
        }
      }
    }

    const m = size - 1;
    for (const sx of [1, -1]) {
      for (const sy of [1, -1]) {
        for (const sz of [1, -1]) {
          const faces: [FaceName, FaceName, FaceName] = [
            faceOfNormal([sx, 0, 0]),
            faceOfNormal([0, sy, 0]),
            faceOfNormal([0, 0, sz]),
          ];
          const position: Vec3 = [sx * m, sy * m, sz * m];
          this._corners.push({
            id: asCornerId(this._corners.length),
            faces,
            slots: [this.slotAt(position, faces[0]), this.slotAt(position, faces[1]), this.slotAt(position, faces[2])],
          });
        }
      }
    }
  }

  /**
   * Center grid size, N - 2
   */
  get n(): number {
    return this.geometry.n;
  }

  get isOdd(): boolean {
    return this.size % 2 === 1;
  }

  /**
   * Incremented once per mutating turn
   */
  get modifyCounter(): number {
    return this._modifyCounter;
  }

  /**
   * Identifier for a new tracker holder on this cube
   */
  allocateHolderId(): HolderId {
    return asHolderId(this._nextHolderId++);
  }

  // ==========================================================================
  // Slots and stickers
  // ==========================================================================

  get slotCount(): number {
    return this._slots.length;
  }

  slot(id: SlotId): SlotInfo {
    const info = this._slots[id];
    if (!info) {
      throw new CubeInternalError(`Unknown slot ${id}`);
    }
    return info;
  }

  slots(): readonly SlotInfo[] {
    return this._slots;
  }

  slotOf(face: FaceName, row: number, col: number): SlotId {
    if (row < 0 || col < 0 || row >= this.size || col >= this.size) {
      throw new CubeInternalError(`Cell (${row},${col}) outside ${face}`);
    }
    return asSlotId(FACES.indexOf(face) * this.size * this.size + row * this.size + col);
  }

  /**
   * Slot of the facelet on `face` belonging to the cubie at `position`
   */
  slotAt(position: Vec3, face: FaceName): SlotId {
    const id = this._slotByKey.get(slotKey(position, face));
    if (id === undefined) {
      throw new CubeInternalError(`No ${face} facelet at (${position.join(`, `)})`);
    }
    return id;
  }

  stickerAt(slot: SlotId): Sticker {
    return this._stickers[slot];
  }

  colorAt(slot: SlotId): Color {
    return this._stickers[slot].color;
  }

  centerSlot(face: FaceName, p: Point): SlotId {
    if (!this.geometry.isCenterPoint(p)) {
      throw new CubeInternalError(`Point (${p.row},${p.col}) outside the ${this.n}x${this.n} center of ${face}`);
    }
    return this.slotOf(face, p.row + 1, p.col + 1);
  }

  center(face: FaceName, p: Point): Sticker {
    return this._stickers[this.centerSlot(face, p)];
  }

  centerColor(face: FaceName, p: Point): Color {
    return this.center(face, p).color;
  }

  /**
   * Center cells of a face in row-major order
   */
  *centerCells(face: FaceName): Generator<{ point: Point; sticker: Sticker }> {
    for (let row = 0; row < this.n; row++) {
      for (let col = 0; col < this.n; col++) {
        const point = { row, col };
        yield { point, sticker: this.center(face, point) };
      }
    }
  }

  /**
   * Every sticker, for tag sweeps
   */
  allStickers(): readonly Sticker[] {
    return this._stickers;
  }

  // ==========================================================================
  // Edges and corners
  // ==========================================================================

  edges(): readonly EdgeRecord[] {
    return this._edges;
  }

  corners(): readonly CornerRecord[] {
    return this._corners;
  }

  edge(id: EdgeId): EdgeRecord {
    const record = this._edges[id];
    if (!record) {
      throw new CubeInternalError(`Unknown edge ${id}`);
    }
    return record;
  }

  corner(id: CornerId): CornerRecord {
    const record = this._corners[id];
    if (!record) {
      throw new CubeInternalError(`Unknown corner ${id}`);
    }
    return record;
  }

  edgeBetween(a: FaceName, b: FaceName): EdgeId {
    const record = this._edges.find((e) => e.faces.includes(a) && e.faces.includes(b));
    if (!record || a === b) {
      throw new CubeInternalError(`Faces ${a} and ${b} share no edge`);
    }
    return record.id;
  }

  /**
   * Number of wings on every edge
   */
  get wingCount(): number {
    return this.n;
  }

  /**
   * Slot of wing `ltr` of an edge as seen from `face`
   *
   * LTR runs left to right along horizontal edges and bottom to top along
   * vertical ones.
   */
  wingSlot(edgeId: EdgeId, face: FaceName, ltr: number): SlotId {
    const other = this._otherFace(edgeId, face);
    if (!Number.isInteger(ltr) || ltr < 0 || ltr >= this.n) {
      throw new CubeInternalError(`Wing index ${ltr} out of range`);
    }
    const { right, up } = faceFrame(face);
    const toward = faceNormal(other);
    const last = this.size - 1;
    if (equals3(toward, up)) return this.slotOf(face, last, ltr + 1);
    if (dot3(toward, up) < 0) return this.slotOf(face, 0, ltr + 1);
    if (equals3(toward, right)) return this.slotOf(face, ltr + 1, last);
    return this.slotOf(face, ltr + 1, 0);
  }

  /**
   * LTR index on the other face of the same physical wing
   */
  ltrOnOtherFace(edgeId: EdgeId, face: FaceName, ltr: number): number {
    const other = this._otherFace(edgeId, face);
    const info = this.slot(this.wingSlot(edgeId, face, ltr));
    const twin = this.slot(this.slotAt(info.position, other));
    const toward = faceNormal(face);
    return this._isHorizontal(other, toward) ? twin.col - 1 : twin.row - 1;
  }

  /**
   * True when both faces count LTR indices of the edge from the same end
   */
  sameDirection(edgeId: EdgeId): boolean {
    if (this.n === 0) {
      return true;
    }
    const [a] = this.edge(edgeId).faces;
    return this.ltrOnOtherFace(edgeId, a, 0) === 0;
  }

  /**
   * Face-and-slot pairs of every facelet of a part
   */
  partSlots(part: Part): { face: FaceName; slot: SlotId }[] {
    if (part.kind === `corner`) {
      const record = this.corner(part.corner);
      return record.faces.map((face, i) => ({ face, slot: record.slots[i] }));
    }
    const [a, b] = this.edge(part.edge).faces;
    const slotA = this.wingSlot(part.edge, a, part.ltr);
    return [
      { face: a, slot: slotA },
      { face: b, slot: this.slotAt(this.slot(slotA).position, b) },
    ];
  }

  private _otherFace(edgeId: EdgeId, face: FaceName): FaceName {
    const [a, b] = this.edge(edgeId).faces;
    if (face === a) return b;
    if (face === b) return a;
    throw new CubeInternalError(`Face ${face} is not on edge ${edgeId}`);
  }

  private _isHorizontal(face: FaceName, toward: Vec3): boolean {
    return dot3(toward, faceFrame(face).up) !== 0;
  }

  // ==========================================================================
  // Turning
  // ==========================================================================

  /**
   * Turn layers about an axis; stickers and their tags move to new slots
   */
  turn(move: LayerTurn): void {
    const turns = normalizeTurns(move.turns);
    if (turns === 0 || move.layers.length === 0) {
      return;
    }
    const permutation = this._permutation(move.axis, move.layers, turns);
    const next = new Array<Sticker>(this._stickers.length);
    for (let src = 0; src < permutation.length; src++) {
      next[permutation[src]] = this._stickers[src];
    }
    this._stickers = next;
    this._modifyCounter++;
  }

  /**
   * Slot permutation of a layer turn: entry `src` is the destination slot
   */
  private _permutation(axis: Axis, layers: readonly number[], turns: number): Int32Array {
    for (const layer of layers) {
      if (!Number.isInteger(layer) || layer < 0 || layer >= this.size) {
        throw new CubeInternalError(`Layer ${layer} outside 0..${this.size - 1}`);
      }
    }
    const sorted = [...new Set(layers)].sort((a, b) => a - b);
    const key = `${axis}:${turns}:${sorted.join(`,`)}`;
    const cached = this._permutations.get(key);
    if (cached) {
      return cached;
    }

    const selected = new Set(sorted);
    const m = this.size - 1;
    const permutation = new Int32Array(this._slots.length);
    for (const info of this._slots) {
      const layer = (info.position[axis] + m) / 2;
      if (!selected.has(layer)) {
        permutation[info.id] = info.id;
        continue;
      }
      const position = rotateQuarter(info.position, axis, turns);
      const normal = rotateQuarter(faceNormal(info.face), axis, turns);
      permutation[info.id] = this.slotAt(position, faceOfNormal(normal));
    }
    this._permutations.set(key, permutation);
    return permutation;
  }

  // ==========================================================================
  // Queries
  // ==========================================================================

  countCenterColor(face: FaceName, color: Color): number {
    let count = 0;
    for (const { sticker } of this.centerCells(face)) {
      if (sticker.color === color) count++;
    }
    return count;
  }

  /**
   * Count of each color among a face's center cells
   */
  centerColorCounts(face: FaceName): Map<Color, number> {
    const counts = new Map<Color, number>(COLORS.map((c) => [c, 0]));
    for (const { sticker } of this.centerCells(face)) {
      counts.set(sticker.color, (counts.get(sticker.color) ?? 0) + 1);
    }
    return counts;
  }

  /**
   * Fixed middle center color of an odd cube, null on even cubes
   */
  middleColor(face: FaceName): Color | null {
    if (!this.isOdd) {
      return null;
    }
    const mid = (this.n - 1) / 2;
    return this.centerColor(face, { row: mid, col: mid });
  }

  isCenterMonochrome(face: FaceName): boolean {
    let first: Color | null = null;
    for (const { sticker } of this.centerCells(face)) {
      first ??= sticker.color;
      if (sticker.color !== first) return false;
    }
    return true;
  }

  isCentersSolved(): boolean {
    return FACES.every((f) => this.isCenterMonochrome(f));
  }

  /**
   * Color of every slot, indexed by SlotId
   */
  snapshot(): Color[] {
    return this._stickers.map((s) => s.color);
  }
}

function slotKey(position: Vec3, face: FaceName): string {
  return `${key3(position)}|${face}`;
}

function slotKind(size: number, row: number, col: number): SlotKind {
  const rowEdge = row === 0 || row === size - 1;
  const colEdge = col === 0 || col === size - 1;
  if (rowEdge && colEdge) return `corner`;
  if (rowEdge || colEdge) return `edge`;
  return `center`;
}
