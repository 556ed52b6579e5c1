export { extractPublicKey } from './keys.js';
export { verifyArtifactSignature } from './artifact.js';
export type { ArtifactSignatureResult } from './artifact.js';
