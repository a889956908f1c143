/**
 * Error types
 *
 * Fatal errors signal a broken invariant or a programming mistake and are
 * never caught inside the core. Expected negative outcomes (no block found,
 * nothing to do) are plain return values, not errors.
 */

/**
 * A broken invariant: unknown identifiers, same-face translation, a
 * commutator that cannot be aligned, a tracker assignment that is not a
 * color permutation.
 */
export class CubeInternalError extends Error {
  constructor(message: string) {
    super(message);
    this.name = `CubeInternalError`;
  }
}

/**
 * Raised by the operator when its abort signal fires between two moves
 */
export class OperationAbortedError extends Error {
  constructor(message = `Operation aborted`) {
    super(message);
    this.name = `OperationAbortedError`;
  }
}

/**
 * Raised by the algorithm parser
 */
export class AlgParseError extends Error {
  readonly position: number;

  constructor(message: string, position: number) {
    super(`${message} at position ${position}`);
    this.name = `AlgParseError`;
    this.position = position;
  }
}

