/**
 * Verification outcomes for the proof engine.
 *
 * The three failure kinds are disjoint: a malformed request (`SHAPE_ERROR`),
 * undecodable input (`DECODE_ERROR`), and a failed cryptographic check
 * (`ROOT_MISMATCH`). Only the last one means a log served a bad proof.
 */

export type VerificationStatus = 'VERIFIED' | 'SHAPE_ERROR' | 'ROOT_MISMATCH' | 'DECODE_ERROR';

/** Which claimed root a mismatch refers to. */
export type RootTarget = 'root' | 'root1' | 'root2';

export interface Verified {
  status: 'VERIFIED';
}

export interface ShapeError {
  status: 'SHAPE_ERROR';
  error: string;
}

export interface RootMismatch {
  status: 'ROOT_MISMATCH';
  target: RootTarget;
  /** Hex of the root the caller (or log) claimed. */
  expectedRoot: string;
  /** Hex of the root recomputed from the proof. */
  calculatedRoot: string;
  error: string;
}

export interface DecodeError {
  status: 'DECODE_ERROR';
  /** Input field that failed to decode, e.g. `rootHash` or `hashes[3]`. */
  field: string;
  error: string;
}

export type VerificationFailure = ShapeError | RootMismatch | DecodeError;
export type VerificationResult = Verified | VerificationFailure;

export const VERIFIED: Verified = Object.freeze({ status: 'VERIFIED' });

export function shapeError(error: string): ShapeError {
  return { status: 'SHAPE_ERROR', error };
}

export function decodeError(field: string, error: string): DecodeError {
  return { status: 'DECODE_ERROR', field, error };
}

export function rootMismatch(target: RootTarget, expectedRoot: string, calculatedRoot: string): RootMismatch {
  return {
    status: 'ROOT_MISMATCH',
    target,
    expectedRoot,
    calculatedRoot,
    error: `calculated ${target} ${calculatedRoot} does not match expected ${target} ${expectedRoot}`,
  };
}

/**
 * Error thrown by {@link assertVerified}; carries the failed result.
 */
export class ProofVerificationError extends Error {
  readonly result: VerificationFailure;

  constructor(result: VerificationFailure) {
    super(describeFailure(result));
    this.name = 'ProofVerificationError';
    this.result = result;
  }
}

/**
 * Human-readable one-line description of a failure.
 */
export function describeFailure(result: VerificationFailure): string {
  switch (result.status) {
    case 'SHAPE_ERROR':
      return `invalid proof shape: ${result.error}`;
    case 'DECODE_ERROR':
      return `cannot decode ${result.field}: ${result.error}`;
    case 'ROOT_MISMATCH':
      return `root mismatch: ${result.error}`;
  }
}

/**
 * Throw a {@link ProofVerificationError} unless the result is `VERIFIED`.
 */
export function assertVerified(result: VerificationResult): asserts result is Verified {
  if (result.status !== 'VERIFIED') {
    throw new ProofVerificationError(result);
  }
}
