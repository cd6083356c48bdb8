import { execute, type ExecuteOptions } from '../engine/redistribution/executor.js';
import type { ExecutionReport, Plan } from '../engine/redistribution/types.js';
import { MemoryLibraryStore } from '../store/memory-library-store.js';

/**
 * Run a plan against an in-memory ledger seeded from its own snapshot.
 * Produces the same report an apply would, without touching any store.
 */
export async function dryRun(plan: Plan, options: Omit<ExecuteOptions, 'mode'> = {}): Promise<ExecutionReport> {
  const ledger = MemoryLibraryStore.fromStates(plan.snapshot);
  return execute(plan, ledger, { ...options, mode: 'dry-run' });
}
