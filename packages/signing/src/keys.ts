import { X509Certificate, createPublicKey, type KeyObject } from 'node:crypto';

const CERT_HEADER = '-----BEGIN CERTIFICATE-----';

/**
 * Get the public key from a PEM certificate or a PEM public key.
 *
 * Rekor stores the signer's Fulcio certificate for keyless signing and a
 * bare PKIX key otherwise.
 */
export function extractPublicKey(pem: string | Uint8Array): KeyObject {
  const text = typeof pem === 'string' ? pem : Buffer.from(pem).toString('utf-8');
  if (text.includes(CERT_HEADER)) {
    return new X509Certificate(text).publicKey;
  }
  return createPublicKey(text);
}
