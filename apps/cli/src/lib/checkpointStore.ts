import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { dirname } from 'node:path';
import { z } from 'zod';

/**
 * A tree state the auditor has seen: size and root, optionally the tree ID.
 */
export const CheckpointRefSchema = z.object({
  treeId: z.string().min(1).optional(),
  treeSize: z.number().int().nonnegative(),
  rootHash: z.string().min(1),
});
export type CheckpointRef = z.infer<typeof CheckpointRefSchema>;

/**
 * A checkpoint given as command-line strings. The tree size must be written
 * in decimal digits.
 */
export const CheckpointArgsSchema = CheckpointRefSchema.extend({
  treeSize: z
    .string()
    .regex(/^\d+$/, 'tree size must be a non-negative integer')
    .transform(Number)
    .refine(Number.isSafeInteger, 'tree size is too large'),
});

/**
 * Serialized format for JSON storage
 */
export const SavedCheckpointSchema = CheckpointRefSchema.extend({
  savedAt: z.string().datetime(),
});
export type SavedCheckpoint = z.infer<typeof SavedCheckpointSchema>;

/**
 * Persist a checkpoint so a later run can check consistency against it.
 */
export function saveCheckpoint(filePath: string, checkpoint: CheckpointRef, now: Date = new Date()): SavedCheckpoint {
  const saved: SavedCheckpoint = {
    ...(checkpoint.treeId !== undefined ? { treeId: checkpoint.treeId } : {}),
    treeSize: checkpoint.treeSize,
    rootHash: checkpoint.rootHash,
    savedAt: now.toISOString(),
  };

  mkdirSync(dirname(filePath), { recursive: true });
  writeFileSync(filePath, JSON.stringify(saved, null, 2) + '\n', 'utf-8');
  return saved;
}

/**
 * Load a saved checkpoint, or null if none has been saved yet.
 *
 * @throws if the file exists but does not hold a checkpoint
 */
export function loadCheckpoint(filePath: string): SavedCheckpoint | null {
  if (!existsSync(filePath)) {
    return null;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(filePath, 'utf-8'));
  } catch {
    throw new Error(`Checkpoint file ${filePath} is not valid JSON`);
  }

  const result = SavedCheckpointSchema.safeParse(parsed);
  if (!result.success) {
    const errors = result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new Error(`Checkpoint file ${filePath} is invalid: ${errors}`);
  }
  return result.data;
}
