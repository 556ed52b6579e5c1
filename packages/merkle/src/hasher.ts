import { createHash, getHashes } from 'node:crypto';

/** A fixed-length digest produced by a {@link Hasher}. */
export type Digest = Uint8Array;

// Domain separation prefixes from RFC 6962 section 2.1
export const RFC6962_LEAF_HASH_PREFIX = 0x00;
export const RFC6962_NODE_HASH_PREFIX = 0x01;

/**
 * Leaf/node hash capability for an RFC 6962 Merkle tree.
 *
 * Implementations hold no mutable state; one instance can be shared by any
 * number of concurrent verifications.
 */
export interface Hasher {
  hashLeaf(leaf: Uint8Array): Digest;
  /** Hash of `0x01 || left || right`. The children are never swapped. */
  hashChildren(left: Digest, right: Digest): Digest;
  /** Root of a tree with zero leaves: the digest of empty input. */
  emptyRoot(): Digest;
  digestSize(): number;
}

/**
 * RFC 6962 hasher over any hash algorithm known to `node:crypto`.
 */
export class Rfc6962Hasher implements Hasher {
  readonly algorithm: string;
  private readonly size: number;

  constructor(algorithm = 'sha256') {
    if (!getHashes().includes(algorithm)) {
      throw new Error(`Unsupported hash algorithm: ${algorithm}`);
    }
    this.algorithm = algorithm;
    this.size = createHash(algorithm).digest().length;
  }

  hashLeaf(leaf: Uint8Array): Digest {
    return createHash(this.algorithm)
      .update(Uint8Array.of(RFC6962_LEAF_HASH_PREFIX))
      .update(leaf)
      .digest();
  }

  hashChildren(left: Digest, right: Digest): Digest {
    return createHash(this.algorithm)
      .update(Uint8Array.of(RFC6962_NODE_HASH_PREFIX))
      .update(left)
      .update(right)
      .digest();
  }

  emptyRoot(): Digest {
    return createHash(this.algorithm).digest();
  }

  digestSize(): number {
    return this.size;
  }
}

/** SHA-256 hasher used by Rekor and Certificate Transparency logs. */
export const DefaultHasher: Hasher = new Rfc6962Hasher('sha256');
