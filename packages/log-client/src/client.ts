import type { z } from 'zod';
import { LogClientError } from './errors.js';
import {
  LogEntryResponseSchema,
  CheckpointSchema,
  ConsistencyProofResponseSchema,
  type LogEntry,
  type Checkpoint,
  type ConsistencyProofResponse,
} from './schemas.js';

/**
 * Log client configuration
 */
export interface LogClientOptions {
  /** REST API base URL, e.g. https://rekor.sigstore.dev/api/v1 */
  baseUrl: string;

  /** Request timeout in milliseconds (default: 10000) */
  timeoutMs?: number;

  /** User-Agent header */
  userAgent?: string;

  /** Override global fetch (for testing). */
  fetchFn?: typeof globalThis.fetch;
}

/**
 * Read-only client for a Rekor-compatible transparency log.
 *
 * Everything it returns is untrusted input for the proof engine; the client
 * only fetches and validates response shapes.
 */
export class LogClient {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly userAgent: string;
  private readonly fetchFn: typeof globalThis.fetch;

  constructor(options: LogClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.timeoutMs = options.timeoutMs ?? 10_000;
    this.userAgent = options.userAgent ?? 'tlog-auditor/0.1.0';
    this.fetchFn = options.fetchFn ?? globalThis.fetch;
  }

  /**
   * Fetch the entry at `logIndex`.
   */
  async getLogEntry(logIndex: number): Promise<LogEntry & { uuid: string }> {
    assertIndex('logIndex', logIndex);
    const entries = await this.getJson(`/log/entries?logIndex=${logIndex}`, LogEntryResponseSchema);

    const uuids = Object.keys(entries);
    const [uuid] = uuids;
    const entry = uuid === undefined ? undefined : entries[uuid];
    if (uuid === undefined || entry === undefined || uuids.length !== 1) {
      throw new LogClientError('INVALID_RESPONSE', `Expected exactly one entry for logIndex ${logIndex}, got ${uuids.length}`);
    }
    return { uuid, ...entry };
  }

  /**
   * Fetch the current checkpoint (tree size and root hash).
   */
  async getLatestCheckpoint(): Promise<Checkpoint> {
    return this.getJson('/log', CheckpointSchema);
  }

  /**
   * Fetch a consistency proof between two tree sizes.
   */
  async getConsistencyProof(firstSize: number, lastSize: number, treeId?: string): Promise<ConsistencyProofResponse> {
    assertIndex('firstSize', firstSize);
    assertIndex('lastSize', lastSize);
    const params = new URLSearchParams({ firstSize: String(firstSize), lastSize: String(lastSize) });
    if (treeId) {
      params.set('treeID', treeId);
    }
    return this.getJson(`/log/proof?${params.toString()}`, ConsistencyProofResponseSchema);
  }

  private async getJson<T>(path: string, schema: z.ZodType<T>): Promise<T> {
    const url = `${this.baseUrl}${path}`;
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.timeoutMs);

    let body: unknown;
    try {
      const response = await this.fetchFn(url, {
        signal: controller.signal,
        headers: { 'User-Agent': this.userAgent, Accept: 'application/json' },
      });

      if (!response.ok) {
        throw new LogClientError('HTTP', `GET ${url} returned HTTP ${response.status}`, response.status);
      }

      try {
        body = await response.json();
      } catch {
        throw new LogClientError('INVALID_RESPONSE', `GET ${url} did not return valid JSON`);
      }
    } catch (err) {
      if (err instanceof LogClientError) throw err;
      if (controller.signal.aborted) {
        throw new LogClientError('TIMEOUT', `GET ${url} timed out after ${this.timeoutMs}ms`);
      }
      throw new LogClientError('NETWORK', `GET ${url} failed: ${err instanceof Error ? err.message : String(err)}`);
    } finally {
      clearTimeout(timer);
    }

    const result = schema.safeParse(body);
    if (!result.success) {
      const issues = result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
      throw new LogClientError('INVALID_RESPONSE', `GET ${url} returned an unexpected shape: ${issues}`);
    }
    return result.data;
  }
}

function assertIndex(name: string, value: number): void {
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new LogClientError('INVALID_REQUEST', `${name} must be a non-negative integer, got ${value}`);
  }
}
