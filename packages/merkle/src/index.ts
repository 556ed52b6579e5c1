// Hashing
export { Rfc6962Hasher, DefaultHasher, RFC6962_LEAF_HASH_PREFIX, RFC6962_NODE_HASH_PREFIX } from './hasher.js';
export type { Hasher, Digest } from './hasher.js';

export { computeLeafHash } from './leaf.js';
export type { LeafHashResult } from './leaf.js';

// Tree-shape arithmetic
export { bitLength, onesCount, trailingZeros, decompInclProof, toUint } from './bits.js';
export type { TreeCoordinate, InclusionDecomposition } from './bits.js';

// Proofs
export {
  chainInner,
  chainInnerRight,
  chainBorderRight,
  rootFromInclusionProof,
  verifyInclusion,
  verifyConsistency,
} from './proof.js';
export type { RootFromProofResult } from './proof.js';

export {
  InclusionProofBundleSchema,
  ConsistencyProofBundleSchema,
  verifyInclusionBundle,
  verifyConsistencyBundle,
} from './bundle.js';
export type { InclusionProofBundle, ConsistencyProofBundle } from './bundle.js';

// Encoding
export { decodeHex, decodeBase64, toHex, digestsEqual } from './encoding.js';
export type { DecodeResult } from './encoding.js';

// Results
export {
  VERIFIED,
  ProofVerificationError,
  assertVerified,
  describeFailure,
  shapeError,
  decodeError,
  rootMismatch,
} from './result.js';
export type {
  VerificationStatus,
  VerificationResult,
  VerificationFailure,
  Verified,
  ShapeError,
  RootMismatch,
  DecodeError,
  RootTarget,
} from './result.js';
