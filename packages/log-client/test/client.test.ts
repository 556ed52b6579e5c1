import { describe, it, expect, vi } from 'vitest';
import {
  LogClient,
  LogClientError,
  decodeEntryBody,
  inclusionBundleFromEntry,
} from '../src/index.js';
import type { LogEntry } from '../src/index.js';

// ── Shared test helpers ──────────────────────────────────────────────────

const BASE_URL = 'https://log.example.com/api/v1';

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

function mockFetch(response: Response) {
  return vi.fn(async (_input: string | URL | Request, _init?: RequestInit) => response);
}

const body = {
  apiVersion: '0.0.1',
  kind: 'hashedrekord',
  spec: {
    signature: {
      content: Buffer.from('test-signature').toString('base64'),
      publicKey: { content: Buffer.from('test-public-key').toString('base64') },
    },
    data: { hash: { algorithm: 'sha256', value: 'ab'.repeat(32) } },
  },
};

const entry: LogEntry = {
  body: Buffer.from(JSON.stringify(body)).toString('base64'),
  integratedTime: 1700000000,
  logID: 'c0d2'.repeat(16),
  logIndex: 1234,
  verification: {
    inclusionProof: {
      logIndex: 1200,
      treeSize: 5000,
      hashes: ['aa'.repeat(32), 'bb'.repeat(32)],
      rootHash: 'cc'.repeat(32),
      checkpoint: 'log.example.com - 42\n5000\n...\n',
    },
    signedEntryTimestamp: 'MEUCIQ==',
  },
};

// ── LogClient ────────────────────────────────────────────────────────────

describe('LogClient', () => {
  it('fetches a log entry by index', async () => {
    const fetchFn = mockFetch(jsonResponse({ 'uuid-1': entry }));
    const client = new LogClient({ baseUrl: `${BASE_URL}/`, fetchFn });

    const result = await client.getLogEntry(1234);

    expect(result.uuid).toBe('uuid-1');
    expect(result.logIndex).toBe(1234);
    expect(result.verification.inclusionProof.treeSize).toBe(5000);
    expect(fetchFn).toHaveBeenCalledTimes(1);
    expect(fetchFn.mock.calls[0]![0]).toBe(`${BASE_URL}/log/entries?logIndex=1234`);
  });

  it('sends the configured user agent', async () => {
    const fetchFn = mockFetch(jsonResponse({ 'uuid-1': entry }));
    const client = new LogClient({ baseUrl: BASE_URL, userAgent: 'test-agent/1.0', fetchFn });

    await client.getLogEntry(1);

    const init = fetchFn.mock.calls[0]![1];
    expect(init?.headers).toEqual({ 'User-Agent': 'test-agent/1.0', Accept: 'application/json' });
  });

  it('rejects invalid log indices before fetching', async () => {
    const fetchFn = mockFetch(jsonResponse({}));
    const client = new LogClient({ baseUrl: BASE_URL, fetchFn });

    await expect(client.getLogEntry(-1)).rejects.toMatchObject({ kind: 'INVALID_REQUEST' });
    await expect(client.getLogEntry(1.5)).rejects.toThrow('logIndex must be a non-negative integer, got 1.5');
    expect(fetchFn).not.toHaveBeenCalled();
  });

  it('rejects a response with no entries', async () => {
    const client = new LogClient({ baseUrl: BASE_URL, fetchFn: mockFetch(jsonResponse({})) });
    await expect(client.getLogEntry(7)).rejects.toThrow('Expected exactly one entry for logIndex 7, got 0');
  });

  it('rejects an entry of the wrong shape', async () => {
    const broken = { 'uuid-1': { ...entry, verification: {} } };
    const client = new LogClient({ baseUrl: BASE_URL, fetchFn: mockFetch(jsonResponse(broken)) });

    const err = await client.getLogEntry(1).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(LogClientError);
    expect(err).toMatchObject({ kind: 'INVALID_RESPONSE' });
  });

  it('maps HTTP errors', async () => {
    const client = new LogClient({ baseUrl: BASE_URL, fetchFn: mockFetch(jsonResponse({ code: 404 }, 404)) });

    await expect(client.getLatestCheckpoint()).rejects.toMatchObject({
      kind: 'HTTP',
      httpStatus: 404,
      message: `GET ${BASE_URL}/log returned HTTP 404`,
    });
  });

  it('maps invalid JSON', async () => {
    const client = new LogClient({ baseUrl: BASE_URL, fetchFn: mockFetch(new Response('<html>', { status: 200 })) });
    await expect(client.getLatestCheckpoint()).rejects.toMatchObject({ kind: 'INVALID_RESPONSE' });
  });

  it('maps network failures', async () => {
    const fetchFn = vi.fn(async (_input: string | URL | Request, _init?: RequestInit): Promise<Response> => {
      throw new TypeError('fetch failed');
    });
    const client = new LogClient({ baseUrl: BASE_URL, fetchFn });

    await expect(client.getLatestCheckpoint()).rejects.toMatchObject({
      kind: 'NETWORK',
      message: `GET ${BASE_URL}/log failed: fetch failed`,
    });
  });

  it('times out slow requests', async () => {
    const fetchFn = vi.fn(
      (_input: string | URL | Request, init?: RequestInit) =>
        new Promise<Response>((_resolve, reject) => {
          init?.signal?.addEventListener('abort', () => reject(new Error('aborted')));
        }),
    );
    const client = new LogClient({ baseUrl: BASE_URL, timeoutMs: 20, fetchFn });

    await expect(client.getLatestCheckpoint()).rejects.toMatchObject({
      kind: 'TIMEOUT',
      message: `GET ${BASE_URL}/log timed out after 20ms`,
    });
  });

  it('fetches the latest checkpoint', async () => {
    const checkpoint = { rootHash: 'dd'.repeat(32), treeSize: 5000, signedTreeHead: 'sth', treeID: '42' };
    const client = new LogClient({ baseUrl: BASE_URL, fetchFn: mockFetch(jsonResponse(checkpoint)) });

    await expect(client.getLatestCheckpoint()).resolves.toEqual(checkpoint);
  });

  it('fetches a consistency proof', async () => {
    const proof = { rootHash: 'dd'.repeat(32), hashes: ['ee'.repeat(32)] };
    const fetchFn = mockFetch(jsonResponse(proof));
    const client = new LogClient({ baseUrl: BASE_URL, fetchFn });

    await expect(client.getConsistencyProof(10, 20, '42')).resolves.toEqual(proof);
    expect(fetchFn.mock.calls[0]![0]).toBe(`${BASE_URL}/log/proof?firstSize=10&lastSize=20&treeID=42`);
  });
});

// ── Entry helpers ────────────────────────────────────────────────────────

describe('decodeEntryBody', () => {
  it('decodes a hashedrekord body', () => {
    const decoded = decodeEntryBody(entry);
    expect(decoded.kind).toBe('hashedrekord');
    expect(decoded.spec.signature.content).toBe(body.spec.signature.content);
    expect(decoded.spec.signature.publicKey.content).toBe(body.spec.signature.publicKey.content);
  });

  it('rejects bodies that are not base64', () => {
    expect(() => decodeEntryBody({ body: '%%%' })).toThrow('Entry body is not base64: malformed base64');
  });

  it('rejects bodies that are not JSON', () => {
    expect(() => decodeEntryBody({ body: Buffer.from('not json').toString('base64') })).toThrow(
      'Entry body is not valid JSON',
    );
  });

  it('rejects other entry kinds', () => {
    const other = Buffer.from(JSON.stringify({ ...body, kind: 'intoto' })).toString('base64');
    expect(() => decodeEntryBody({ body: other })).toThrow(LogClientError);
  });
});

describe('inclusionBundleFromEntry', () => {
  it('maps the inclusion proof without a leaf hash', () => {
    expect(inclusionBundleFromEntry(entry)).toEqual({
      logIndex: 1200,
      treeSize: 5000,
      hashes: ['aa'.repeat(32), 'bb'.repeat(32)],
      rootHash: 'cc'.repeat(32),
    });
  });
});
