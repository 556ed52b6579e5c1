import type { Digest, Hasher } from './hasher.js';
import { decompInclProof, toUint, trailingZeros } from './bits.js';
import type { TreeCoordinate } from './bits.js';
import { digestsEqual, toHex } from './encoding.js';
import { VERIFIED, rootMismatch, shapeError } from './result.js';
import type { RootTarget, ShapeError, VerificationResult } from './result.js';

export type RootFromProofResult = { status: 'COMPUTED'; root: Digest } | ShapeError;

/**
 * Walk a seed up its authentication path. Bit `i` of `index` says whether the
 * current subtree is a left (0) or right (1) child at level `i`.
 */
export function chainInner(hasher: Hasher, seed: Digest, proof: readonly Digest[], index: bigint): Digest {
  let acc = seed;
  proof.forEach((h, i) => {
    if (((index >> BigInt(i)) & 1n) === 0n) {
      acc = hasher.hashChildren(acc, h);
    } else {
      acc = hasher.hashChildren(h, acc);
    }
  });
  return acc;
}

/**
 * Like {@link chainInner}, but only combines the levels where the seed is a
 * right child and skips the rest.
 */
export function chainInnerRight(hasher: Hasher, seed: Digest, proof: readonly Digest[], index: bigint): Digest {
  let acc = seed;
  proof.forEach((h, i) => {
    if (((index >> BigInt(i)) & 1n) === 1n) {
      acc = hasher.hashChildren(h, acc);
    }
  });
  return acc;
}

/** Chain left siblings along the right border of the tree. */
export function chainBorderRight(hasher: Hasher, seed: Digest, proof: readonly Digest[]): Digest {
  let acc = seed;
  for (const h of proof) {
    acc = hasher.hashChildren(h, acc);
  }
  return acc;
}

function checkDigest(hasher: Hasher, name: string, digest: Digest): ShapeError | null {
  if (digest.length !== hasher.digestSize()) {
    return shapeError(`${name} has unexpected size ${digest.length}, want ${hasher.digestSize()}`);
  }
  return null;
}

function checkProofDigests(hasher: Hasher, proof: readonly Digest[]): ShapeError | null {
  for (const [i, h] of proof.entries()) {
    const err = checkDigest(hasher, `proof[${i}]`, h);
    if (err) return err;
  }
  return null;
}

function matchRoot(target: RootTarget, calculated: Digest, expected: Digest): VerificationResult {
  if (!digestsEqual(calculated, expected)) {
    return rootMismatch(target, toHex(expected), toHex(calculated));
  }
  return VERIFIED;
}

/**
 * Recompute the root of a tree of `size` leaves from the leaf hash at `index`
 * and its inclusion proof (RFC 6962 section 2.1.1). All shape checks run
 * before the first hash is computed.
 */
export function rootFromInclusionProof(
  hasher: Hasher,
  index: TreeCoordinate,
  size: TreeCoordinate,
  leafHash: Digest,
  proof: readonly Digest[],
): RootFromProofResult {
  const idx = toUint(index);
  const sz = toUint(size);
  if (idx === null || sz === null) {
    return shapeError(`index and size must be non-negative integers, got ${index} and ${size}`);
  }
  if (idx >= sz) {
    return shapeError(`index is beyond size: ${idx} >= ${sz}`);
  }

  const leafErr = checkDigest(hasher, 'leaf hash', leafHash);
  if (leafErr) return leafErr;

  const { inner, border } = decompInclProof(idx, sz);
  if (proof.length !== inner + border) {
    return shapeError(`wrong proof size ${proof.length}, want ${inner + border}`);
  }
  const proofErr = checkProofDigests(hasher, proof);
  if (proofErr) return proofErr;

  const res = chainInner(hasher, leafHash, proof.slice(0, inner), idx);
  return { status: 'COMPUTED', root: chainBorderRight(hasher, res, proof.slice(inner)) };
}

/**
 * Verify that `leafHash` sits at `index` in the tree of `size` leaves whose
 * root is `root`.
 */
export function verifyInclusion(
  hasher: Hasher,
  index: TreeCoordinate,
  size: TreeCoordinate,
  leafHash: Digest,
  proof: readonly Digest[],
  root: Digest,
): VerificationResult {
  const rootErr = checkDigest(hasher, 'root', root);
  if (rootErr) return rootErr;

  const computed = rootFromInclusionProof(hasher, index, size, leafHash, proof);
  if (computed.status !== 'COMPUTED') {
    return computed;
  }
  return matchRoot('root', computed.root, root);
}

/**
 * Verify that the tree of `size2` leaves with root `root2` is an append-only
 * extension of the tree of `size1` leaves with root `root1`.
 *
 * The proof is replayed twice from the same seed: once over the hashes that
 * were already final at `size1` (must give `root1`), once over the full
 * authentication path of leaf `size1 - 1` (must give `root2`).
 */
export function verifyConsistency(
  hasher: Hasher,
  size1: TreeCoordinate,
  size2: TreeCoordinate,
  proof: readonly Digest[],
  root1: Digest,
  root2: Digest,
): VerificationResult {
  const s1 = toUint(size1);
  const s2 = toUint(size2);
  if (s1 === null || s2 === null) {
    return shapeError(`sizes must be non-negative integers, got ${size1} and ${size2}`);
  }

  const rootErr = checkDigest(hasher, 'root1', root1) ?? checkDigest(hasher, 'root2', root2);
  if (rootErr) return rootErr;

  if (s2 < s1) {
    return shapeError(`size2 (${s2}) < size1 (${s1})`);
  }
  if (s1 === s2) {
    if (proof.length > 0) {
      return shapeError('size1=size2, but proof is not empty');
    }
    return matchRoot('root2', root1, root2);
  }
  if (s1 === 0n) {
    if (proof.length > 0) {
      return shapeError(`expected empty proof, but got ${proof.length} components`);
    }
    return VERIFIED;
  }
  const [head] = proof;
  if (head === undefined) {
    return shapeError('empty proof');
  }

  const decomp = decompInclProof(s1 - 1n, s2);
  const shift = trailingZeros(s1);
  const inner = decomp.inner - shift;
  const border = decomp.border;

  // When size1 is a power of two its root is itself a node on the path.
  const seedIsRoot1 = s1 === 1n << BigInt(shift);
  const start = seedIsRoot1 ? 0 : 1;

  if (proof.length !== start + inner + border) {
    return shapeError(`wrong proof size ${proof.length}, want ${start + inner + border}`);
  }
  const proofErr = checkProofDigests(hasher, proof);
  if (proofErr) return proofErr;

  const seed = seedIsRoot1 ? root1 : head;
  const rest = proof.slice(start);
  const innerHashes = rest.slice(0, inner);
  const borderHashes = rest.slice(inner);
  const mask = (s1 - 1n) >> BigInt(shift);

  let hash1 = chainInnerRight(hasher, seed, innerHashes, mask);
  hash1 = chainBorderRight(hasher, hash1, borderHashes);
  const first = matchRoot('root1', hash1, root1);
  if (first.status !== 'VERIFIED') {
    return first;
  }

  let hash2 = chainInner(hasher, seed, innerHashes, mask);
  hash2 = chainBorderRight(hasher, hash2, borderHashes);
  return matchRoot('root2', hash2, root2);
}
