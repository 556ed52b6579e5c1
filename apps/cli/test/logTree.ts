import { DefaultHasher, toHex, type Digest } from '@tlog-auditor/merkle';

/**
 * In-memory RFC 6962 tree for feeding a fake log. Roots and proofs are
 * computed recursively from section 2.1 of the RFC.
 */
export class TestLogTree {
  readonly leaves: Uint8Array[];

  constructor(size: number) {
    this.leaves = Array.from({ length: size }, (_, i) => Buffer.from(`entry-${i}`, 'utf-8'));
  }

  get size(): number {
    return this.leaves.length;
  }

  /** Hex root of the first `size` leaves. */
  rootHex(size: number = this.size): string {
    return toHex(subtreeRoot(this.leaves.slice(0, size)));
  }

  /** Hex audit path of leaf `index` in the full tree. */
  inclusionHex(index: number): string[] {
    return auditPath(index, this.leaves).map(toHex);
  }

  /** Hex consistency proof from the first `size` leaves to the full tree. */
  consistencyHex(size: number): string[] {
    return subproof(size, this.leaves, true).map(toHex);
  }
}

function largestPowerOfTwoBelow(n: number): number {
  let k = 1;
  while (k * 2 < n) k *= 2;
  return k;
}

function subtreeRoot(leaves: Uint8Array[]): Digest {
  const [only] = leaves;
  if (only === undefined) return DefaultHasher.emptyRoot();
  if (leaves.length === 1) return DefaultHasher.hashLeaf(only);
  const k = largestPowerOfTwoBelow(leaves.length);
  return DefaultHasher.hashChildren(subtreeRoot(leaves.slice(0, k)), subtreeRoot(leaves.slice(k)));
}

function auditPath(index: number, leaves: Uint8Array[]): Digest[] {
  if (leaves.length <= 1) return [];
  const k = largestPowerOfTwoBelow(leaves.length);
  if (index < k) {
    return [...auditPath(index, leaves.slice(0, k)), subtreeRoot(leaves.slice(k))];
  }
  return [...auditPath(index - k, leaves.slice(k)), subtreeRoot(leaves.slice(0, k))];
}

function subproof(size: number, leaves: Uint8Array[], complete: boolean): Digest[] {
  if (size === leaves.length) {
    return complete ? [] : [subtreeRoot(leaves)];
  }
  const k = largestPowerOfTwoBelow(leaves.length);
  if (size <= k) {
    return [...subproof(size, leaves.slice(0, k), complete), subtreeRoot(leaves.slice(k))];
  }
  return [...subproof(size - k, leaves.slice(k), false), subtreeRoot(leaves.slice(0, k))];
}

/** Hex digest with the lowest bit of the first byte flipped. */
export function flipFirstBit(hex: string): string {
  const bytes = Buffer.from(hex, 'hex');
  bytes[0] = (bytes[0] ?? 0) ^ 1;
  return bytes.toString('hex');
}
