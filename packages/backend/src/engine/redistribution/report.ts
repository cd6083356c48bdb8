import type { ExecutionReport, LibraryId, Plan, Transfer, TransferOutcome } from './types.js';

export interface RenderOptions {
  /** Display names by library id. Ids are shown when a name is missing. */
  labels?: ReadonlyMap<LibraryId, string>;
  /** Maximum transfer lines before the listing is truncated. */
  limit?: number;
}

function label(id: LibraryId, labels?: ReadonlyMap<LibraryId, string>): string {
  return labels?.get(id) ?? String(id);
}

export function formatTransfer(transfer: Transfer, labels?: ReadonlyMap<LibraryId, string>): string {
  return `${label(transfer.sourceId, labels)} -> ${label(transfer.destinationId, labels)}: ${transfer.quantity}`;
}

function formatOutcome(outcome: TransferOutcome): string {
  return outcome.status === 'applied' ? '[applied]' : `[skipped: ${outcome.detail}]`;
}

export function formatSummary(booksMoved: number, skipped: number): string {
  return `Total books moved: ${booksMoved}, skipped transfers: ${skipped}`;
}

function truncate(lines: string[], limit: number | undefined, noun: string): string[] {
  if (limit === undefined || lines.length <= limit) return lines;
  return [...lines.slice(0, limit), `... and ${lines.length - limit} more ${noun}`];
}

/**
 * Render a plan as text:
 *
 *   2 -> 1: 50
 *   Total books moved: 50, skipped transfers: 0
 */
export function formatPlan(plan: Plan, options: RenderOptions = {}): string {
  if (plan.transfers.length === 0) {
    const lines = ['No transfers needed: libraries are already balanced.'];
    return [...lines, ...formatResiduals(plan, options.labels)].join('\n');
  }

  const transferLines = plan.transfers.map((t) => formatTransfer(t, options.labels));
  return [
    ...truncate(transferLines, options.limit, 'transfers'),
    formatSummary(plan.booksMoved, 0),
    ...formatResiduals(plan, options.labels),
  ].join('\n');
}

function formatResiduals(plan: Plan, labels?: ReadonlyMap<LibraryId, string>): string[] {
  return plan.residuals.map((residual) =>
    residual.kind === 'surplus'
      ? `Residual surplus at ${label(residual.libraryId, labels)}: ${residual.amount}`
      : `Residual deficit at ${label(residual.libraryId, labels)}: ${residual.amount}`
  );
}

/**
 * Render an execution report. Same transfer lines as a plan, each followed
 * by its outcome, then the summary.
 */
export function formatExecutionReport(report: ExecutionReport, options: RenderOptions = {}): string {
  const lines = report.entries.map(
    (entry) => `${formatTransfer(entry.transfer, options.labels)} ${formatOutcome(entry.outcome)}`
  );
  const out = [
    ...truncate(lines, options.limit, 'transfers'),
    formatSummary(report.booksMoved, report.skippedCount),
  ];
  if (report.aborted) {
    out.push(`Cancelled with ${report.pending.length} transfer(s) not attempted`);
  }
  return out.join('\n');
}
