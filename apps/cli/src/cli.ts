#!/usr/bin/env node
import { Command } from 'commander';
import pc from 'picocolors';
import { z } from 'zod';
import { loadConfig, type AuditorConfig } from '@tlog-auditor/config';
import { LogClient, LogClientError } from '@tlog-auditor/log-client';
import { Auditor } from './auditor.js';
import { CheckpointArgsSchema, loadCheckpoint, saveCheckpoint, type CheckpointRef } from './lib/checkpointStore.js';
import { createLogger } from './lib/logger.js';

// Exit codes: 0 verified, 1 usage/config/network error, 2 verification failed
const EXIT_ERROR = 1;
const EXIT_UNVERIFIED = 2;

const logIndexSchema = z
  .string()
  .regex(/^\d+$/, 'log index must be a non-negative integer')
  .transform(Number)
  .refine(Number.isSafeInteger, 'log index is too large');

const program = new Command();

program
  .name('tlog-auditor')
  .description('Verify transparency log inclusion and consistency proofs')
  .version('0.1.0')
  .option('-d, --debug', 'Enable debug logging');

function setup(): { config: AuditorConfig; auditor: Auditor } {
  let config: AuditorConfig;
  try {
    config = loadConfig();
  } catch (err) {
    console.error(pc.red(err instanceof Error ? err.message : 'Unknown configuration error'));
    process.exit(EXIT_ERROR);
  }

  const debug = program.opts<{ debug?: boolean }>().debug === true;
  const logger = createLogger(debug ? 'debug' : config.logging.level, config.logging.format);
  const client = new LogClient({
    baseUrl: config.log.baseUrl,
    timeoutMs: config.log.timeoutMs,
    userAgent: config.log.userAgent,
  });
  logger.debug({ baseUrl: config.log.baseUrl }, 'Log client configured');

  return { config, auditor: new Auditor({ source: client, logger }) };
}

function fail(err: unknown): never {
  if (err instanceof LogClientError) {
    console.error(pc.red(`  Log server error (${err.kind}): ${err.message}`));
  } else {
    console.error(pc.red(`  Error: ${err instanceof Error ? err.message : String(err)}`));
  }
  process.exit(EXIT_ERROR);
}

// ── checkpoint ───────────────────────────────────────────────────────────
program
  .command('checkpoint')
  .description('Fetch the latest checkpoint from the log')
  .option('--save', 'Save it to the checkpoint state file')
  .action(async (options: { save?: boolean }) => {
    const { config, auditor } = setup();
    try {
      const checkpoint = await auditor.latestCheckpoint();
      console.log(JSON.stringify(checkpoint, null, 2));

      if (options.save) {
        saveCheckpoint(config.state.checkpointFile, checkpoint);
        console.error(`  ${pc.green('✓')} Saved to ${pc.cyan(config.state.checkpointFile)}`);
      }
    } catch (err) {
      fail(err);
    }
  });

// ── inclusion ────────────────────────────────────────────────────────────
program
  .command('inclusion')
  .description('Verify an artifact signature and its entry inclusion in the log')
  .argument('<logIndex>', 'Log index of the entry')
  .requiredOption('--artifact <path>', 'Artifact file the entry signs')
  .action(async (rawIndex: string, options: { artifact: string }) => {
    const parsed = logIndexSchema.safeParse(rawIndex);
    if (!parsed.success) {
      console.error(pc.red(`  Invalid log index '${rawIndex}': ${parsed.error.issues[0]?.message ?? 'invalid'}`));
      process.exit(EXIT_ERROR);
    }

    const { auditor } = setup();
    try {
      const result = await auditor.verifyEntryInclusion(parsed.data, options.artifact);
      if (!result.ok) {
        console.log(`  ${pc.red('FAIL')} [${result.stage}] ${result.error}`);
        if (result.result?.status === 'ROOT_MISMATCH') {
          console.log(`    expected:   ${pc.gray(result.result.expectedRoot)}`);
          console.log(`    calculated: ${pc.gray(result.result.calculatedRoot)}`);
        }
        process.exit(EXIT_UNVERIFIED);
      }

      console.log(`  ${pc.green('✓')} Signature is valid`);
      console.log(`  ${pc.green('✓')} Entry ${pc.cyan(String(result.logIndex))} is included in tree of size ${result.treeSize}`);
      console.log(`    root: ${pc.gray(result.rootHash)}`);
      console.log(`    leaf: ${pc.gray(result.leafHash)}`);
    } catch (err) {
      fail(err);
    }
  });

// ── consistency ──────────────────────────────────────────────────────────
program
  .command('consistency')
  .description('Verify the latest checkpoint is consistent with a previous one')
  .option('--tree-id <id>', 'Tree ID of the previous checkpoint')
  .option('--tree-size <n>', 'Tree size of the previous checkpoint')
  .option('--root-hash <hex>', 'Root hash of the previous checkpoint')
  .option('--from-state', 'Use the checkpoint saved in the state file')
  .option('--save', 'Save the latest checkpoint after it verifies')
  .action(
    async (options: { treeId?: string; treeSize?: string; rootHash?: string; fromState?: boolean; save?: boolean }) => {
      const { config, auditor } = setup();

      let previous: CheckpointRef;
      try {
        if (options.fromState) {
          const saved = loadCheckpoint(config.state.checkpointFile);
          if (!saved) {
            console.error(pc.red(`  No checkpoint saved at ${config.state.checkpointFile}`));
            process.exit(EXIT_ERROR);
          }
          previous = saved;
        } else {
          const parsed = CheckpointArgsSchema.safeParse({
            treeId: options.treeId,
            treeSize: options.treeSize,
            rootHash: options.rootHash,
          });
          if (!parsed.success) {
            console.error(pc.red('  Please specify --tree-size and --root-hash (and optionally --tree-id) for the previous checkpoint'));
            process.exit(EXIT_ERROR);
          }
          previous = parsed.data;
        }
      } catch (err) {
        fail(err);
      }

      try {
        const result = await auditor.verifyCheckpointConsistency(previous);
        if (!result.ok) {
          console.log(`  ${pc.red('FAIL')} ${result.error}`);
          console.log(`    previous: size ${result.previous.treeSize} root ${pc.gray(result.previous.rootHash)}`);
          console.log(`    latest:   size ${result.latest.treeSize} root ${pc.gray(result.latest.rootHash)}`);
          process.exit(EXIT_UNVERIFIED);
        }

        console.log(
          `  ${pc.green('✓')} Tree of size ${result.latest.treeSize} is consistent with size ${result.previous.treeSize}`,
        );
        if (options.save) {
          saveCheckpoint(config.state.checkpointFile, result.latest);
          console.log(`  ${pc.green('✓')} Saved to ${pc.cyan(config.state.checkpointFile)}`);
        }
      } catch (err) {
        fail(err);
      }
    },
  );

program.parseAsync().catch(fail);
