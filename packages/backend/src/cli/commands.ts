import { readFile } from 'node:fs/promises';
import type { IntakeOverflowPolicy } from '../lib/config.js';
import { ValidationError } from '../lib/errors.js';
import type { Services } from '../services/index.js';
import type { RebalanceResult } from '../services/rebalance.service.js';
import type { IntakeReceipt, IntakeSimulation } from '../services/intake.service.js';
import type { SeedSummary } from '../services/seed.service.js';
import { rebalanceQuerySchema } from '../schemas/rebalance.schema.js';
import { seedFileSchema, type SeedHoldings } from '../schemas/seed.schema.js';

export interface CommandContext {
  services: Services;
  /** Receives each line of human-readable output. */
  print: (line: string) => void;
}

// ============================================================================
// rebalance
// ============================================================================

export interface RebalanceArgs {
  apply: boolean;
  limit?: number;
}

export async function runRebalance(ctx: CommandContext, args: RebalanceArgs): Promise<RebalanceResult> {
  const { rebalance } = ctx.services;
  // Same bounds as the HTTP query
  const { limit } = rebalanceQuerySchema.parse({ limit: args.limit });
  const result = args.apply
    ? await rebalance.apply({ limit })
    : await rebalance.preview({ limit });

  ctx.print('Redistribution plan');
  ctx.print(`Libraries: ${result.plan.snapshot.length}, books: ${result.plan.totalBooks}`);
  ctx.print(`Proposed transfers: ${result.plan.transfers.length}`);
  ctx.print('');
  ctx.print(result.text);
  ctx.print('');
  ctx.print(
    args.apply
      ? 'Changes applied.'
      : 'DRY-RUN: no changes were written. Re-run with --apply to commit them.'
  );
  return result;
}

// ============================================================================
// simulate-intake
// ============================================================================

export interface SimulateIntakeArgs {
  libraryId?: number;
  quantity: number;
  commit: boolean;
  policy?: IntakeOverflowPolicy;
}

export interface SimulateIntakeResult {
  simulation: IntakeSimulation;
  receipt?: IntakeReceipt;
}

export async function runSimulateIntake(
  ctx: CommandContext,
  args: SimulateIntakeArgs
): Promise<SimulateIntakeResult> {
  const { intake } = ctx.services;
  const input = { libraryId: args.libraryId, quantity: args.quantity, policy: args.policy };

  const simulation = await intake.simulate(input);
  ctx.print(simulation.text);

  if (!args.commit) {
    return { simulation };
  }

  const receipt = await intake.receive(input);
  ctx.print('');
  ctx.print(
    `Received ${receipt.accepted} book(s) into library ${receipt.libraryId} ` +
      `(now ${receipt.bookCount}/${receipt.capacity}, overflow ${receipt.overflow}).`
  );
  return { simulation, receipt };
}

// ============================================================================
// load-seed
// ============================================================================

export interface LoadSeedArgs {
  path: string;
  flush: boolean;
  holdings: SeedHoldings;
}

export async function runLoadSeed(ctx: CommandContext, args: LoadSeedArgs): Promise<SeedSummary> {
  let raw: unknown;
  try {
    raw = JSON.parse(await readFile(args.path, 'utf-8'));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ValidationError(`Cannot read seed file ${args.path}: ${reason}`);
  }

  const seed = seedFileSchema.parse(raw);
  const summary = await ctx.services.seed.load(seed, {
    flush: args.flush,
    holdings: args.holdings,
  });

  ctx.print(`Libraries created: ${summary.created}, already present: ${summary.skipped}`);
  if (summary.holdings === 'none') {
    ctx.print('Holdings taken from the seed file (seed-holdings=none).');
  } else {
    ctx.print(`Holdings (${summary.holdings}): placed ${summary.placed}, overflow ${summary.overflow}`);
  }
  return summary;
}
