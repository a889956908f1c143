/**
 * Center-grid points and rectangular blocks
 *
 * A face's center grid is n x n with n = N - 2. Row 0 is the bottom row and
 * column 0 the left column, as seen from outside the face.
 */

export interface Point {
  readonly row: number;
  readonly col: number;
}

/**
 * Inclusive rectangle of center cells, normalized so start <= end
 */
export interface Block {
  readonly start: Point;
  readonly end: Point;
}

export function point(row: number, col: number): Point {
  return { row, col };
}

export function pointsEqual(a: Point, b: Point): boolean {
  return a.row === b.row && a.col === b.col;
}

/**
 * Rectangle spanning two corners in any order
 */
export function block(a: Point, b: Point = a): Block {
  return {
    start: { row: Math.min(a.row, b.row), col: Math.min(a.col, b.col) },
    end: { row: Math.max(a.row, b.row), col: Math.max(a.col, b.col) },
  };
}

export function blockRows(b: Block): number {
  return b.end.row - b.start.row + 1;
}

export function blockCols(b: Block): number {
  return b.end.col - b.start.col + 1;
}

export function blockSize(b: Block): number {
  return blockRows(b) * blockCols(b);
}

export function blocksEqual(a: Block, b: Block): boolean {
  return pointsEqual(a.start, b.start) && pointsEqual(a.end, b.end);
}

export function blockContains(b: Block, p: Point): boolean {
  return p.row >= b.start.row && p.row <= b.end.row && p.col >= b.start.col && p.col <= b.end.col;
}

/**
 * Cells of a block in row-major order
 */
export function* blockCells(b: Block): Generator<Point> {
  for (let row = b.start.row; row <= b.end.row; row++) {
    for (let col = b.start.col; col <= b.end.col; col++) {
      yield { row, col };
    }
  }
}

export function formatPoint(p: Point): string {
  return `(${p.row},${p.col})`;
}

export function formatBlock(b: Block): string {
  return `[${formatPoint(b.start)}..${formatPoint(b.end)}]`;
}

// ============================================================================
// Rotations on an n x n grid
// ============================================================================

/**
 * Where a cell goes when its face turns clockwise `turns` times
 */
export function rotatePointCw(p: Point, n: number, turns = 1): Point {
  let { row, col } = p;
  for (let i = ((turns % 4) + 4) % 4; i > 0; i--) {
    [row, col] = [n - 1 - col, row];
  }
  return { row, col };
}

export function rotateBlockCw(b: Block, n: number, turns = 1): Block {
  return block(rotatePointCw(b.start, n, turns), rotatePointCw(b.end, n, turns));
}
