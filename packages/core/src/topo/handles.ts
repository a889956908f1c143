/**
 * Branded handle types for the cube arena
 *
 * Numeric handles that provide type safety through TypeScript's structural
 * typing. The values are indices into the tables owned by a Cube.
 */

/**
 * Handle to an edge in the cube (12 per cube)
 */
export type EdgeId = number & { __brand: `EdgeId` };

/**
 * Handle to a corner in the cube (8 per cube)
 */
export type CornerId = number & { __brand: `CornerId` };

/**
 * Index of a sticker slot: 6 * N * N slots, one per visible facelet
 */
export type SlotId = number & { __brand: `SlotId` };

/**
 * Identifier of a tracker holder, allocated per cube
 */
export type HolderId = number & { __brand: `HolderId` };

export function asEdgeId(index: number): EdgeId {
  return index as EdgeId;
}

export function asCornerId(index: number): CornerId {
  return index as CornerId;
}

export function asSlotId(index: number): SlotId {
  return index as SlotId;
}

export function asHolderId(index: number): HolderId {
  return index as HolderId;
}
