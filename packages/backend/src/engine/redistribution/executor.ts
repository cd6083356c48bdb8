import { PlanExecutionError } from '../../lib/errors.js';
import type { Logger } from '../../lib/logger.js';
import type { LibraryRecord, LibraryStore } from '../../store/library-store.js';
import type {
  ExecutionEntry,
  ExecutionMode,
  ExecutionReport,
  Plan,
  SkipReason,
  Transfer,
  TransferOutcome,
} from './types.js';

export interface ExecuteOptions {
  /** Checked between transfers; a transfer already started always finishes. */
  signal?: AbortSignal;
  logger?: Logger;
  /** Recorded on the report. Defaults to `apply`. */
  mode?: ExecutionMode;
}

// ─── Validation ──────────────────────────────────────────────────────────────

export type TransferCheck =
  | { ok: true; source: LibraryRecord; destination: LibraryRecord }
  | { ok: false; outcome: Extract<TransferOutcome, { status: 'skipped' }> };

function skip(reason: SkipReason, detail: string): TransferCheck {
  return { ok: false, outcome: { status: 'skipped', reason, detail } };
}

/** Check a transfer against the live rows of its two libraries. */
export function validateTransfer(
  transfer: Transfer,
  source: LibraryRecord | null,
  destination: LibraryRecord | null
): TransferCheck {
  const { sourceId, destinationId, quantity } = transfer;

  if (sourceId === destinationId) {
    return skip('same-library', `library ${sourceId} cannot transfer to itself`);
  }
  if (!source) {
    return skip('source-missing', `source library ${sourceId} no longer exists`);
  }
  if (!destination) {
    return skip('destination-missing', `destination library ${destinationId} no longer exists`);
  }
  if (source.bookCount < quantity) {
    return skip('insufficient-books', `source library ${sourceId} holds ${source.bookCount} of ${quantity} books`);
  }
  const slack = destination.capacity - destination.bookCount;
  if (slack < quantity) {
    return skip('insufficient-capacity', `destination library ${destinationId} has room for ${slack} of ${quantity} books`);
  }
  return { ok: true, source, destination };
}

// ─── Report ──────────────────────────────────────────────────────────────────

function buildReport(
  mode: ExecutionMode,
  entries: readonly ExecutionEntry[],
  pending: readonly Transfer[],
  aborted: boolean
): ExecutionReport {
  let booksMoved = 0;
  let appliedCount = 0;
  let skippedCount = 0;

  for (const entry of entries) {
    if (entry.outcome.status === 'applied') {
      appliedCount++;
      booksMoved += entry.transfer.quantity;
    } else {
      skippedCount++;
    }
  }

  return Object.freeze({
    mode,
    entries: Object.freeze([...entries]),
    booksMoved,
    appliedCount,
    skippedCount,
    aborted,
    pending: Object.freeze([...pending]),
  });
}

// ─── Execution ───────────────────────────────────────────────────────────────

/**
 * Apply a plan's transfers to a store, in emitted order.
 *
 * Every transfer is its own transaction: source and destination are re-read,
 * re-validated, and both counts written before commit. A transfer that fails
 * validation is recorded as skipped and execution moves on. A store failure
 * rolls back the current transfer and throws PlanExecutionError with the
 * report of everything before it.
 */
export async function execute(
  plan: Plan,
  store: LibraryStore,
  options: ExecuteOptions = {}
): Promise<ExecutionReport> {
  const { signal, logger } = options;
  const mode = options.mode ?? 'apply';
  const entries: ExecutionEntry[] = [];
  const transfers = plan.transfers;

  for (let i = 0; i < transfers.length; i++) {
    if (signal?.aborted) {
      const pending = transfers.slice(i);
      logger?.warn(
        { completed: i, pending: pending.length },
        'Plan execution cancelled'
      );
      return buildReport(mode, entries, pending, true);
    }

    const transfer = transfers[i];
    let outcome: TransferOutcome;
    try {
      outcome = await store.transaction<TransferOutcome>(async (tx) => {
        const source = await tx.findLibrary(transfer.sourceId);
        const destination = await tx.findLibrary(transfer.destinationId);
        const check = validateTransfer(transfer, source, destination);
        if (!check.ok) {
          return check.outcome;
        }

        await tx.setBookCount(check.source.id, check.source.bookCount - transfer.quantity);
        await tx.setBookCount(check.destination.id, check.destination.bookCount + transfer.quantity);
        return { status: 'applied' } as const;
      });
    } catch (error) {
      const report = buildReport(mode, entries, transfers.slice(i), false);
      logger?.error(
        { err: error, transfer, completed: i },
        'Plan execution failed'
      );
      throw new PlanExecutionError(
        `Transfer ${transfer.sourceId} -> ${transfer.destinationId} failed after ${i} transfer(s)`,
        report,
        { cause: error }
      );
    }

    entries.push(Object.freeze({ transfer, outcome }));
    if (outcome.status === 'applied') {
      logger?.info({ mode, ...transfer }, 'Transfer applied');
    } else {
      logger?.warn({ mode, ...transfer, reason: outcome.reason, detail: outcome.detail }, 'Transfer skipped');
    }
  }

  return buildReport(mode, entries, [], false);
}

