import { z } from 'zod';

const uint = z.number().int().nonnegative();

/**
 * Inclusion proof attached to a log entry
 */
export const InclusionProofSchema = z.object({
  logIndex: uint,
  treeSize: uint,
  hashes: z.array(z.string()),
  rootHash: z.string(),
  checkpoint: z.string().optional(),
});
export type InclusionProof = z.infer<typeof InclusionProofSchema>;

/**
 * A single entry as returned by `GET /log/entries`
 */
export const LogEntrySchema = z.object({
  body: z.string(),
  integratedTime: z.number().int(),
  logID: z.string(),
  logIndex: uint,
  verification: z.object({
    inclusionProof: InclusionProofSchema,
    signedEntryTimestamp: z.string().optional(),
  }),
});
export type LogEntry = z.infer<typeof LogEntrySchema>;

/** Entries are keyed by their UUID. */
export const LogEntryResponseSchema = z.record(z.string(), LogEntrySchema);

/**
 * Latest signed tree state from `GET /log`
 */
export const CheckpointSchema = z.object({
  rootHash: z.string(),
  treeSize: uint,
  signedTreeHead: z.string(),
  treeID: z.string(),
});
export type Checkpoint = z.infer<typeof CheckpointSchema>;

/**
 * Response of `GET /log/proof`
 */
export const ConsistencyProofResponseSchema = z.object({
  rootHash: z.string(),
  hashes: z.array(z.string()),
});
export type ConsistencyProofResponse = z.infer<typeof ConsistencyProofResponseSchema>;

/**
 * Decoded body of a `hashedrekord` entry. Only the fields the auditor reads
 * are validated.
 */
export const HashedRekordBodySchema = z.object({
  apiVersion: z.string(),
  kind: z.literal('hashedrekord'),
  spec: z.object({
    signature: z.object({
      /** base64 signature over the artifact */
      content: z.string().min(1),
      publicKey: z.object({
        /** base64 PEM certificate or public key */
        content: z.string().min(1),
      }),
    }),
    data: z
      .object({
        hash: z.object({
          algorithm: z.string(),
          value: z.string(),
        }),
      })
      .optional(),
  }),
});
export type HashedRekordBody = z.infer<typeof HashedRekordBodySchema>;
