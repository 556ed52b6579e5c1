import type { KeyObject } from 'node:crypto';
import type pino from 'pino';
import {
  DefaultHasher,
  computeLeafHash,
  decodeBase64,
  describeFailure,
  toHex,
  verifyConsistencyBundle,
  verifyInclusionBundle,
  type Hasher,
  type VerificationFailure,
} from '@tlog-auditor/merkle';
import { decodeEntryBody, inclusionBundleFromEntry, type LogClient } from '@tlog-auditor/log-client';
import { extractPublicKey, verifyArtifactSignature } from '@tlog-auditor/signing';
import type { CheckpointRef } from './lib/checkpointStore.js';

/** The log operations the auditor depends on. */
export type LogSource = Pick<LogClient, 'getLogEntry' | 'getLatestCheckpoint' | 'getConsistencyProof'>;

export interface AuditorOptions {
  source: LogSource;
  logger: pino.Logger;
  hasher?: Hasher;
}

export type InclusionAudit =
  | {
      ok: true;
      logIndex: number;
      treeSize: number;
      rootHash: string;
      leafHash: string;
    }
  | {
      ok: false;
      stage: 'signature' | 'leaf' | 'proof';
      error: string;
      result?: VerificationFailure;
    };

export type ConsistencyAudit =
  | { ok: true; previous: CheckpointRef; latest: CheckpointRef }
  | { ok: false; stage: 'proof'; error: string; result: VerificationFailure; previous: CheckpointRef; latest: CheckpointRef };

/**
 * Verifies what a transparency log serves against independently recomputed
 * roots. Network and response-shape failures surface as thrown
 * `LogClientError`s; verification failures are returned, never thrown, and
 * never end the process.
 */
export class Auditor {
  private readonly source: LogSource;
  private readonly logger: pino.Logger;
  private readonly hasher: Hasher;

  constructor(options: AuditorOptions) {
    this.source = options.source;
    this.logger = options.logger;
    this.hasher = options.hasher ?? DefaultHasher;
  }

  async latestCheckpoint(): Promise<CheckpointRef> {
    const checkpoint = await this.source.getLatestCheckpoint();
    this.logger.debug({ treeId: checkpoint.treeID, treeSize: checkpoint.treeSize }, 'Fetched latest checkpoint');
    return { treeId: checkpoint.treeID, treeSize: checkpoint.treeSize, rootHash: checkpoint.rootHash };
  }

  /**
   * Check the artifact signature recorded in entry `logIndex`, then prove the
   * entry is included in the log.
   */
  async verifyEntryInclusion(logIndex: number, artifactPath: string): Promise<InclusionAudit> {
    const entry = await this.source.getLogEntry(logIndex);
    const body = decodeEntryBody(entry);

    const signature = decodeBase64(body.spec.signature.content);
    const certificate = decodeBase64(body.spec.signature.publicKey.content);
    if (!signature.ok || !certificate.ok) {
      return this.inclusionFailure(logIndex, 'signature', 'entry signature material is not base64');
    }

    let publicKey: KeyObject;
    try {
      publicKey = extractPublicKey(certificate.bytes);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      return this.inclusionFailure(logIndex, 'signature', `cannot read public key: ${message}`);
    }

    const sig = verifyArtifactSignature(signature.bytes, publicKey, artifactPath);
    if (!sig.valid) {
      return this.inclusionFailure(logIndex, 'signature', sig.error);
    }
    this.logger.debug({ logIndex, artifactPath }, 'Artifact signature verified');

    // The leaf hash comes from the body we fetched, not from the server.
    const leaf = computeLeafHash(entry.body, this.hasher);
    if (leaf.status !== 'COMPUTED') {
      return this.inclusionFailure(logIndex, 'leaf', describeFailure(leaf), leaf);
    }

    const bundle = inclusionBundleFromEntry(entry);
    const result = verifyInclusionBundle(this.hasher, bundle, leaf.leafHash);
    if (result.status !== 'VERIFIED') {
      return this.inclusionFailure(logIndex, 'proof', describeFailure(result), result);
    }

    const leafHash = toHex(leaf.leafHash);
    this.logger.info(
      { logIndex, proofIndex: bundle.logIndex, treeSize: bundle.treeSize, rootHash: bundle.rootHash, leafHash },
      'Inclusion verified',
    );
    return {
      ok: true,
      logIndex,
      treeSize: entry.verification.inclusionProof.treeSize,
      rootHash: entry.verification.inclusionProof.rootHash,
      leafHash,
    };
  }

  /**
   * Prove that the log's current tree is an append-only extension of
   * `previous`.
   */
  async verifyCheckpointConsistency(previous: CheckpointRef): Promise<ConsistencyAudit> {
    const latest = await this.latestCheckpoint();
    // An empty previous tree, or equal or shrinking sizes, need no proof from
    // the server; the engine decides them from the sizes and roots alone.
    let hashes: string[] = [];
    if (previous.treeSize > 0 && previous.treeSize < latest.treeSize) {
      const proof = await this.source.getConsistencyProof(previous.treeSize, latest.treeSize, previous.treeId);
      hashes = proof.hashes;
    }

    const result = verifyConsistencyBundle(this.hasher, {
      firstSize: previous.treeSize,
      lastSize: latest.treeSize,
      hashes,
      rootHash1: previous.rootHash,
      rootHash2: latest.rootHash,
    });

    if (result.status !== 'VERIFIED') {
      const error = describeFailure(result);
      this.logger.warn(
        { firstSize: previous.treeSize, lastSize: latest.treeSize, status: result.status, error },
        'Consistency verification failed',
      );
      return { ok: false, stage: 'proof', error, result, previous, latest };
    }

    this.logger.info(
      { firstSize: previous.treeSize, lastSize: latest.treeSize, rootHash: latest.rootHash },
      'Consistency verified',
    );
    return { ok: true, previous, latest };
  }

  private inclusionFailure(
    logIndex: number,
    stage: 'signature' | 'leaf' | 'proof',
    error: string,
    result?: VerificationFailure,
  ): InclusionAudit {
    this.logger.warn({ logIndex, stage, status: result?.status, error }, 'Inclusion verification failed');
    return { ok: false, stage, error, ...(result ? { result } : {}) };
  }
}
