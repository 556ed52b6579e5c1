/**
 * Tree-shape arithmetic. Every proof layout is a function of `(index, size)`
 * alone, so no tree object is ever built.
 */

/** Tree coordinate as accepted at the API surface. */
export type TreeCoordinate = number | bigint;

/**
 * Normalise a coordinate to `bigint`, or `null` if it is not a non-negative
 * integer that can be represented exactly.
 */
export function toUint(value: TreeCoordinate): bigint | null {
  if (typeof value === 'bigint') {
    return value >= 0n ? value : null;
  }
  if (!Number.isSafeInteger(value) || value < 0) {
    return null;
  }
  return BigInt(value);
}

/** Number of bits needed to represent `n`; 0 for 0. */
export function bitLength(n: bigint): number {
  return n === 0n ? 0 : n.toString(2).length;
}

/** Population count. */
export function onesCount(n: bigint): number {
  let count = 0;
  for (let v = n; v > 0n; v >>= 1n) {
    if (v & 1n) count++;
  }
  return count;
}

/** Position of the lowest set bit. Undefined for 0, which callers exclude. */
export function trailingZeros(n: bigint): number {
  let zeros = 0;
  for (let v = n; v > 0n && (v & 1n) === 0n; v >>= 1n) {
    zeros++;
  }
  return zeros;
}

export interface InclusionDecomposition {
  /** Proof hashes below the point where the paths to `index` and `size - 1` diverge. */
  inner: number;
  /** Left siblings on the tree's ragged right border above that point. */
  border: number;
}

/**
 * Split an inclusion proof for leaf `index` in a tree of `size` leaves into
 * its inner and border parts.
 */
export function decompInclProof(index: bigint, size: bigint): InclusionDecomposition {
  const inner = bitLength(index ^ (size - 1n));
  const border = onesCount(index >> BigInt(inner));
  return { inner, border };
}
