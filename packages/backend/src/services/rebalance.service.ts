import type { AppConfig } from '../lib/config.js';
import type { Logger } from '../lib/logger.js';
import { plan as buildPlan } from '../engine/redistribution/planner.js';
import { execute } from '../engine/redistribution/executor.js';
import { dryRun } from './dry-run.js';
import { formatExecutionReport, formatPlan } from '../engine/redistribution/report.js';
import type { ExecutionReport, LibraryId, Plan } from '../engine/redistribution/types.js';
import { readSnapshot, type LibraryStore } from '../store/library-store.js';

export interface RebalanceResult {
  plan: Plan;
  report: ExecutionReport;
  /** Rendered plan followed by the rendered report. */
  text: string;
}

export interface RebalanceOptions {
  limit?: number;
  signal?: AbortSignal;
}

/**
 * Snapshot the store, plan, then either dry-run against the snapshot or
 * apply against the live store. Both paths return the same result shape.
 */
export class RebalanceService {
  constructor(
    private readonly store: LibraryStore,
    private readonly config: Pick<AppConfig, 'reportLineLimit'>,
    private readonly logger: Logger
  ) {}

  async computePlan(): Promise<Plan> {
    const snapshot = await readSnapshot(this.store);
    const plan = buildPlan(snapshot);

    this.logger.info(
      {
        libraries: snapshot.size,
        totalBooks: plan.totalBooks,
        transfers: plan.transfers.length,
        booksMoved: plan.booksMoved,
        residuals: plan.residuals.length,
      },
      'Redistribution plan computed'
    );
    return plan;
  }

  async preview(options: RebalanceOptions = {}): Promise<RebalanceResult> {
    const plan = await this.computePlan();
    const report = await dryRun(plan, { logger: this.logger, signal: options.signal });
    return this.render(plan, report, options);
  }

  async apply(options: RebalanceOptions = {}): Promise<RebalanceResult> {
    const plan = await this.computePlan();
    const report = await execute(plan, this.store, {
      logger: this.logger,
      signal: options.signal,
    });

    this.logger.info(
      {
        applied: report.appliedCount,
        skipped: report.skippedCount,
        booksMoved: report.booksMoved,
        aborted: report.aborted,
      },
      'Redistribution plan applied'
    );
    return this.render(plan, report, options);
  }

  private async render(plan: Plan, report: ExecutionReport, options: RebalanceOptions): Promise<RebalanceResult> {
    const labels = await this.labels();
    const limit = options.limit ?? this.config.reportLineLimit;

    const sections = [formatPlan(plan, { labels, limit })];
    if (plan.transfers.length > 0) {
      sections.push(formatExecutionReport(report, { labels, limit }));
    }
    return { plan, report, text: sections.join('\n\n') };
  }

  private async labels(): Promise<Map<LibraryId, string>> {
    const records = await this.store.listLibraries();
    return new Map(records.map((record) => [record.id, record.name]));
  }
}
