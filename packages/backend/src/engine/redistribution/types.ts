export type LibraryId = number;

/** One library as the planner sees it. */
export interface LibraryState {
  readonly id: LibraryId;
  readonly bookCount: number;
  readonly capacity: number;
}

export interface LibraryTarget {
  readonly libraryId: LibraryId;
  readonly bookCount: number;
  readonly capacity: number;
  readonly target: number;
}

export interface Transfer {
  readonly sourceId: LibraryId;
  readonly destinationId: LibraryId;
  readonly quantity: number;
}

/** Books a plan could not place because targets do not sum to the stock. */
export interface Residual {
  readonly libraryId: LibraryId;
  readonly kind: 'surplus' | 'deficit';
  readonly amount: number;
}

export interface Plan {
  /** Library states the plan was computed against, ascending id. */
  readonly snapshot: readonly LibraryState[];
  readonly targets: readonly LibraryTarget[];
  readonly transfers: readonly Transfer[];
  readonly residuals: readonly Residual[];
  readonly totalBooks: number;
  readonly booksMoved: number;
}

// ─── Execution ───────────────────────────────────────────────────────────────

export type SkipReason =
  | 'source-missing'
  | 'destination-missing'
  | 'same-library'
  | 'insufficient-books'
  | 'insufficient-capacity';

export type TransferOutcome =
  | { readonly status: 'applied' }
  | { readonly status: 'skipped'; readonly reason: SkipReason; readonly detail: string };

export interface ExecutionEntry {
  readonly transfer: Transfer;
  readonly outcome: TransferOutcome;
}

export type ExecutionMode = 'dry-run' | 'apply';

export interface ExecutionReport {
  readonly mode: ExecutionMode;
  readonly entries: readonly ExecutionEntry[];
  readonly booksMoved: number;
  readonly appliedCount: number;
  readonly skippedCount: number;
  /** True when a cancellation stopped the run before every transfer was attempted. */
  readonly aborted: boolean;
  /** Transfers left unapplied when the run stopped early, in plan order. */
  readonly pending: readonly Transfer[];
}

// ─── Intake ──────────────────────────────────────────────────────────────────

export interface IntakeResult<TSnapshot> {
  readonly snapshot: TSnapshot;
  readonly libraryId: LibraryId;
  readonly accepted: number;
  readonly overflow: number;
}
