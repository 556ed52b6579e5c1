import { z } from 'zod';
import type { Digest, Hasher } from './hasher.js';
import { decodeHex } from './encoding.js';
import { verifyConsistency, verifyInclusion } from './proof.js';
import { decodeError } from './result.js';
import type { DecodeError, VerificationResult } from './result.js';

const treeCoordinateSchema = z.union([z.number().int().nonnegative(), z.bigint().nonnegative()]);

/**
 * Inclusion proof as served by a log, hashes hex-encoded.
 */
export const InclusionProofBundleSchema = z.object({
  logIndex: treeCoordinateSchema,
  treeSize: treeCoordinateSchema,
  hashes: z.array(z.string()),
  rootHash: z.string(),
});
export type InclusionProofBundle = z.infer<typeof InclusionProofBundleSchema>;

/**
 * Consistency proof between two checkpoints, hashes hex-encoded.
 */
export const ConsistencyProofBundleSchema = z.object({
  firstSize: treeCoordinateSchema,
  lastSize: treeCoordinateSchema,
  hashes: z.array(z.string()),
  rootHash1: z.string(),
  rootHash2: z.string(),
});
export type ConsistencyProofBundle = z.infer<typeof ConsistencyProofBundleSchema>;

type Decoded<T> = { ok: true; value: T } | { ok: false; failure: DecodeError };

function decodeField(field: string, hex: string): Decoded<Digest> {
  const res = decodeHex(hex);
  if (!res.ok) {
    return { ok: false, failure: decodeError(field, res.error) };
  }
  return { ok: true, value: res.bytes };
}

function decodeHashes(hashes: readonly string[]): Decoded<Digest[]> {
  const out: Digest[] = [];
  for (const [i, hex] of hashes.entries()) {
    const res = decodeField(`hashes[${i}]`, hex);
    if (!res.ok) return res;
    out.push(res.value);
  }
  return { ok: true, value: out };
}

/**
 * Decode an inclusion bundle and verify it against an independently
 * computed leaf hash (bytes, or hex).
 *
 * Any undecodable field yields `DECODE_ERROR` before proof arithmetic runs.
 */
export function verifyInclusionBundle(
  hasher: Hasher,
  bundle: InclusionProofBundle,
  leafHash: Digest | string,
): VerificationResult {
  const root = decodeField('rootHash', bundle.rootHash);
  if (!root.ok) return root.failure;

  const leaf = typeof leafHash === 'string' ? decodeField('leafHash', leafHash) : { ok: true as const, value: leafHash };
  if (!leaf.ok) return leaf.failure;

  const proof = decodeHashes(bundle.hashes);
  if (!proof.ok) return proof.failure;

  return verifyInclusion(hasher, bundle.logIndex, bundle.treeSize, leaf.value, proof.value, root.value);
}

/**
 * Decode a consistency bundle and verify it.
 */
export function verifyConsistencyBundle(hasher: Hasher, bundle: ConsistencyProofBundle): VerificationResult {
  const root1 = decodeField('rootHash1', bundle.rootHash1);
  if (!root1.ok) return root1.failure;

  const root2 = decodeField('rootHash2', bundle.rootHash2);
  if (!root2.ok) return root2.failure;

  const proof = decodeHashes(bundle.hashes);
  if (!proof.ok) return proof.failure;

  return verifyConsistency(hasher, bundle.firstSize, bundle.lastSize, proof.value, root1.value, root2.value);
}
