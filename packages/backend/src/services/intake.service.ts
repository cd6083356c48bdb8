import type { AppConfig } from '../lib/config.js';
import { NotFoundError } from '../lib/errors.js';
import type { Logger } from '../lib/logger.js';
import { CapacityModel } from '../engine/redistribution/capacity-model.js';
import { simulateIntake, splitIntake } from '../engine/redistribution/intake-simulator.js';
import { plan as buildPlan } from '../engine/redistribution/planner.js';
import { dryRun } from './dry-run.js';
import { formatPlan } from '../engine/redistribution/report.js';
import type { ExecutionReport, LibraryId, LibraryState, Plan } from '../engine/redistribution/types.js';
import { toLibraryState, type LibraryRecord, type LibraryStore } from '../store/library-store.js';
import type { IntakeInput } from '../schemas/intake.schema.js';

export interface IntakeSimulation {
  libraryId: LibraryId;
  accepted: number;
  overflow: number;
  /** Library states after the simulated intake. */
  snapshot: readonly LibraryState[];
  /** Rebalancing plan for the post-intake snapshot. */
  plan: Plan;
  report: ExecutionReport;
  text: string;
}

export interface IntakeReceipt {
  libraryId: LibraryId;
  accepted: number;
  overflow: number;
  bookCount: number;
  capacity: number;
}

function pickLibrary(records: readonly LibraryRecord[], libraryId?: LibraryId): LibraryRecord {
  const library = libraryId === undefined
    ? records[0]
    : records.find((record) => record.id === libraryId);

  if (!library) {
    throw libraryId === undefined
      ? new NotFoundError('Library')
      : new NotFoundError('Library', libraryId);
  }
  return library;
}

export class IntakeService {
  constructor(
    private readonly store: LibraryStore,
    private readonly config: Pick<AppConfig, 'intakeOverflowPolicy' | 'reportLineLimit'>,
    private readonly logger: Logger
  ) {}

  /**
   * Simulate a bulk donation on the current snapshot and plan the rebalance
   * that would follow. The store is not written.
   */
  async simulate(input: IntakeInput): Promise<IntakeSimulation> {
    const records = await this.store.listLibraries();
    const target = pickLibrary(records, input.libraryId);
    const snapshot = CapacityModel.from(records.map(toLibraryState));

    const intake = simulateIntake(
      snapshot,
      target.id,
      input.quantity,
      input.policy ?? this.config.intakeOverflowPolicy
    );
    const plan = buildPlan(intake.snapshot);
    const report = await dryRun(plan);

    if (intake.overflow > 0) {
      this.logger.warn(
        { libraryId: target.id, quantity: input.quantity, overflow: intake.overflow },
        'Simulated intake exceeds library capacity'
      );
    }

    const labels = new Map(records.map((record) => [record.id, record.name]));
    const text = [
      `Intake into ${target.name}: accepted ${intake.accepted}, overflow ${intake.overflow}`,
      formatPlan(plan, { labels, limit: this.config.reportLineLimit }),
    ].join('\n\n');

    return {
      libraryId: target.id,
      accepted: intake.accepted,
      overflow: intake.overflow,
      snapshot: intake.snapshot.libraries(),
      plan,
      report,
      text,
    };
  }

  /** Add books to a library in the store, clamped or rejected by policy. */
  async receive(input: IntakeInput): Promise<IntakeReceipt> {
    const policy = input.policy ?? this.config.intakeOverflowPolicy;

    const receipt = await this.store.transaction(async (tx) => {
      const library = pickLibrary(await tx.listLibraries(), input.libraryId);
      const slack = library.capacity - library.bookCount;
      const { accepted, overflow } = splitIntake(library.id, slack, input.quantity, policy);

      const bookCount = library.bookCount + accepted;
      if (accepted > 0) {
        await tx.setBookCount(library.id, bookCount);
      }

      return {
        libraryId: library.id,
        accepted,
        overflow,
        bookCount,
        capacity: library.capacity,
      };
    });

    this.logger.info(receipt, 'Intake received');
    return receipt;
  }
}
