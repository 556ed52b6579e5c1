import { DefaultHasher } from '../src/index.js';
import type { Digest } from '../src/index.js';

// Reference RFC 6962 tree: MTH, PATH and SUBPROOF exactly as written in
// section 2.1, built recursively from the leaves.

const hasher = DefaultHasher;

export function makeLeaves(n: number): Uint8Array[] {
  return Array.from({ length: n }, (_, i) => Buffer.from(`leaf-${i}`, 'utf-8'));
}

function splitPoint(n: number): number {
  let k = 1;
  while (k * 2 < n) k *= 2;
  return k;
}

export function mth(leaves: Uint8Array[]): Digest {
  if (leaves.length === 0) return hasher.emptyRoot();
  if (leaves.length === 1) return hasher.hashLeaf(leaves[0]!);
  const k = splitPoint(leaves.length);
  return hasher.hashChildren(mth(leaves.slice(0, k)), mth(leaves.slice(k)));
}

export function inclusionPath(m: number, leaves: Uint8Array[]): Digest[] {
  if (leaves.length <= 1) return [];
  const k = splitPoint(leaves.length);
  if (m < k) {
    return [...inclusionPath(m, leaves.slice(0, k)), mth(leaves.slice(k))];
  }
  return [...inclusionPath(m - k, leaves.slice(k)), mth(leaves.slice(0, k))];
}

function subproof(m: number, leaves: Uint8Array[], complete: boolean): Digest[] {
  const n = leaves.length;
  if (m === n) {
    return complete ? [] : [mth(leaves)];
  }
  const k = splitPoint(n);
  if (m <= k) {
    return [...subproof(m, leaves.slice(0, k), complete), mth(leaves.slice(k))];
  }
  return [...subproof(m - k, leaves.slice(k), false), mth(leaves.slice(0, k))];
}

export function consistencyProof(m: number, leaves: Uint8Array[]): Digest[] {
  return subproof(m, leaves, true);
}

/** Copy of `digest` with one bit flipped. */
export function flipBit(digest: Digest, bit = 0): Digest {
  const out = Uint8Array.from(digest);
  const byte = Math.floor(bit / 8);
  out[byte] = (out[byte] ?? 0) ^ (1 << (bit % 8));
  return out;
}

export function hex(digest: Digest): string {
  return Buffer.from(digest).toString('hex');
}
