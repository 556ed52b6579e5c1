import { DefaultHasher } from './hasher.js';
import type { Digest, Hasher } from './hasher.js';
import { decodeBase64 } from './encoding.js';
import { decodeError } from './result.js';
import type { DecodeError } from './result.js';

export type LeafHashResult = { status: 'COMPUTED'; leafHash: Digest } | DecodeError;

/**
 * Compute the RFC 6962 leaf hash of a log entry body.
 *
 * A string body is the base64 form served by the log and is decoded first.
 * The result is the anchor for inclusion verification, so it is always
 * derived from the body itself and never taken from the server.
 */
export function computeLeafHash(body: string | Uint8Array, hasher: Hasher = DefaultHasher): LeafHashResult {
  if (typeof body !== 'string') {
    return { status: 'COMPUTED', leafHash: hasher.hashLeaf(body) };
  }
  const decoded = decodeBase64(body);
  if (!decoded.ok) {
    return decodeError('body', decoded.error);
  }
  return { status: 'COMPUTED', leafHash: hasher.hashLeaf(decoded.bytes) };
}
