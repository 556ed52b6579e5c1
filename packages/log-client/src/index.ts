export { LogClient } from './client.js';
export type { LogClientOptions } from './client.js';

export { LogClientError } from './errors.js';
export type { LogClientErrorKind } from './errors.js';

export { decodeEntryBody, inclusionBundleFromEntry } from './entry.js';

export {
  InclusionProofSchema,
  LogEntrySchema,
  LogEntryResponseSchema,
  CheckpointSchema,
  ConsistencyProofResponseSchema,
  HashedRekordBodySchema,
} from './schemas.js';

export type {
  InclusionProof,
  LogEntry,
  Checkpoint,
  ConsistencyProofResponse,
  HashedRekordBody,
} from './schemas.js';
