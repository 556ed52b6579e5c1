import { existsSync, readFileSync, statSync } from 'node:fs';
import { verify, type KeyObject } from 'node:crypto';

export type ArtifactSignatureResult = { valid: true } | { valid: false; error: string };

/**
 * Verify a detached signature over the raw bytes of an artifact file.
 * EdDSA keys sign the message directly; everything else uses SHA-256.
 */
export function verifyArtifactSignature(
  signature: Uint8Array,
  publicKey: KeyObject,
  artifactPath: string,
): ArtifactSignatureResult {
  if (!existsSync(artifactPath) || !statSync(artifactPath).isFile()) {
    return { valid: false, error: `artifact not found: ${artifactPath}` };
  }

  const data = readFileSync(artifactPath);
  const keyType = publicKey.asymmetricKeyType;
  const algorithm = keyType === 'ed25519' || keyType === 'ed448' ? null : 'sha256';

  let ok: boolean;
  try {
    ok = verify(algorithm, data, publicKey, signature);
  } catch (err) {
    return { valid: false, error: `signature check failed: ${err instanceof Error ? err.message : String(err)}` };
  }

  if (!ok) {
    return { valid: false, error: 'signature is invalid' };
  }
  return { valid: true };
}
