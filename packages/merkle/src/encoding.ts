import { timingSafeEqual } from 'node:crypto';
import type { Digest } from './hasher.js';

export type DecodeResult = { ok: true; bytes: Uint8Array } | { ok: false; error: string };

const HEX_RE = /^[0-9a-fA-F]*$/;
const BASE64_RE = /^[A-Za-z0-9+/]*={0,2}$/;

/**
 * Strict hex decoding. `Buffer.from(s, 'hex')` silently stops at the first
 * bad character, so the input is checked first.
 */
export function decodeHex(hex: string): DecodeResult {
  if (hex.length % 2 !== 0) {
    return { ok: false, error: `odd-length hex string (${hex.length} chars)` };
  }
  if (!HEX_RE.test(hex)) {
    return { ok: false, error: 'non-hex characters' };
  }
  return { ok: true, bytes: Buffer.from(hex, 'hex') };
}

/**
 * Strict standard-alphabet base64 decoding (padding required).
 */
export function decodeBase64(b64: string): DecodeResult {
  if (b64.length % 4 !== 0 || !BASE64_RE.test(b64)) {
    return { ok: false, error: 'malformed base64' };
  }
  return { ok: true, bytes: Buffer.from(b64, 'base64') };
}

export function toHex(bytes: Uint8Array): string {
  return Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString('hex');
}

/**
 * Byte-for-byte digest equality in constant time for equal lengths.
 */
export function digestsEqual(a: Digest, b: Digest): boolean {
  if (a.length !== b.length) {
    return false;
  }
  return timingSafeEqual(a, b);
}
