import { decodeBase64 } from '@tlog-auditor/merkle';
import type { InclusionProofBundle } from '@tlog-auditor/merkle';
import { LogClientError } from './errors.js';
import { HashedRekordBodySchema, type HashedRekordBody, type LogEntry } from './schemas.js';

/**
 * Decode the base64 JSON body of a `hashedrekord` entry.
 */
export function decodeEntryBody(entry: Pick<LogEntry, 'body'>): HashedRekordBody {
  const decoded = decodeBase64(entry.body);
  if (!decoded.ok) {
    throw new LogClientError('INVALID_RESPONSE', `Entry body is not base64: ${decoded.error}`);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(Buffer.from(decoded.bytes).toString('utf-8'));
  } catch {
    throw new LogClientError('INVALID_RESPONSE', 'Entry body is not valid JSON');
  }

  const result = HashedRekordBodySchema.safeParse(parsed);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new LogClientError('INVALID_RESPONSE', `Unsupported entry body: ${issues}`);
  }
  return result.data;
}

/**
 * The entry's inclusion proof in the shape the proof engine verifies.
 * Carries no leaf hash; compute it from the entry body.
 */
export function inclusionBundleFromEntry(entry: Pick<LogEntry, 'verification'>): InclusionProofBundle {
  const proof = entry.verification.inclusionProof;
  return {
    logIndex: proof.logIndex,
    treeSize: proof.treeSize,
    hashes: proof.hashes,
    rootHash: proof.rootHash,
  };
}
