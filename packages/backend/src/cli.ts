#!/usr/bin/env node
/**
 * Command-line entry point.
 *
 * Run with: npm run cli -- <command> [options]
 *   rebalance [--apply] [--limit n]
 *   simulate-intake --quantity n [--library-id id] [--policy clamp|reject] [--commit]
 *   load-seed <path> [--flush] [--seed-holdings none|all_to_first|random]
 */
import 'dotenv/config';
import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import { ZodError } from 'zod';
import { loadConfig } from './lib/config.js';
import { openDatabase } from './lib/database.js';
import { createLogger } from './lib/logger.js';
import { createServices } from './services/index.js';
import { SqliteLibraryStore } from './store/sqlite-library-store.js';
import { runLoadSeed, runRebalance, runSimulateIntake, type CommandContext } from './cli/commands.js';

async function withContext<T>(task: (ctx: CommandContext) => Promise<T>): Promise<T> {
  const config = loadConfig();
  const logger = createLogger(config);
  const store = new SqliteLibraryStore(openDatabase(config, logger));

  try {
    return await task({
      services: createServices(store, config, logger),
      print: (line) => console.log(line),
    });
  } finally {
    store.close();
  }
}

function describeError(error: unknown): string {
  if (error instanceof ZodError) {
    return error.issues.map((issue) => `${issue.path.join('.') || 'input'}: ${issue.message}`).join('\n');
  }
  return error instanceof Error ? error.message : String(error);
}

async function main() {
  await yargs(hideBin(process.argv))
    .scriptName('bookshift')
    .command(
      'rebalance',
      'Compute the redistribution plan (dry-run unless --apply)',
      (y) =>
        y
          .option('apply', { type: 'boolean', default: false, desc: 'Write the planned transfers' })
          .option('limit', { type: 'number', desc: 'Transfers listed before truncating' }),
      async (argv) => {
        await withContext((ctx) => runRebalance(ctx, { apply: argv.apply, limit: argv.limit }));
      }
    )
    .command(
      'simulate-intake',
      'Simulate receiving a batch of books into one library',
      (y) =>
        y
          .option('library-id', { type: 'number', desc: 'Target library (defaults to the lowest id)' })
          .option('quantity', { type: 'number', demandOption: true, desc: 'Books received' })
          .option('policy', { choices: ['clamp', 'reject'] as const, desc: 'What to do with books over capacity' })
          .option('commit', { type: 'boolean', default: false, desc: 'Write the intake to the store' }),
      async (argv) => {
        await withContext((ctx) =>
          runSimulateIntake(ctx, {
            libraryId: argv.libraryId,
            quantity: argv.quantity,
            policy: argv.policy,
            commit: argv.commit,
          })
        );
      }
    )
    .command(
      'load-seed <path>',
      'Load libraries from a JSON seed file',
      (y) =>
        y
          .positional('path', { type: 'string', demandOption: true, desc: 'Seed file' })
          .option('flush', { type: 'boolean', default: false, desc: 'Remove all libraries first' })
          .option('seed-holdings', {
            choices: ['none', 'all_to_first', 'random'] as const,
            default: 'none' as const,
            desc: 'Starting holdings scenario',
          }),
      async (argv) => {
        await withContext((ctx) =>
          runLoadSeed(ctx, { path: argv.path, flush: argv.flush, holdings: argv.seedHoldings })
        );
      }
    )
    .demandCommand(1)
    .strict()
    .fail(false)
    .help()
    .parseAsync();
}

main().catch((error: unknown) => {
  console.error(`Error: ${describeError(error)}`);
  process.exit(1);
});
