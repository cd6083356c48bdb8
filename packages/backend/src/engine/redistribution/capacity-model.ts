import { InvalidCapacityError, NotFoundError } from '../../lib/errors.js';
import type { LibraryId, LibraryState, LibraryTarget } from './types.js';

// ─── Helpers ─────────────────────────────────────────────────────────────────

/**
 * `round(numerator / denominator)` with halves rounded up.
 * Both operands are non-negative and `denominator > 0`.
 */
export function roundHalfUp(numerator: bigint, denominator: bigint): bigint {
  const quotient = numerator / denominator;
  const remainder = numerator % denominator;
  return 2n * remainder >= denominator ? quotient + 1n : quotient;
}

function assertValidRecord(record: LibraryState): void {
  const { id, bookCount, capacity } = record;

  if (!Number.isSafeInteger(id) || id <= 0) {
    throw new InvalidCapacityError(`Library id must be a positive integer, got ${id}`);
  }
  if (!Number.isSafeInteger(capacity) || capacity <= 0) {
    throw new InvalidCapacityError(
      `Library ${id} has invalid capacity ${capacity}: capacity must be a positive integer`,
      id
    );
  }
  if (!Number.isSafeInteger(bookCount) || bookCount < 0) {
    throw new InvalidCapacityError(
      `Library ${id} has invalid book count ${bookCount}: count must be a non-negative integer`,
      id
    );
  }
  if (bookCount > capacity) {
    throw new InvalidCapacityError(
      `Library ${id} holds ${bookCount} books but its capacity is ${capacity}`,
      id
    );
  }
}

// ─── CapacityModel ───────────────────────────────────────────────────────────

/**
 * Validated, immutable snapshot of every library's load and capacity.
 *
 * Iteration is always in ascending library id, which is the order the
 * planner relies on for tie-breaking.
 */
export class CapacityModel {
  private readonly states: ReadonlyMap<LibraryId, LibraryState>;
  readonly totalBooks: number;
  readonly totalCapacity: number;

  private constructor(states: readonly LibraryState[]) {
    const sorted = [...states].sort((a, b) => a.id - b.id);
    const index = new Map<LibraryId, LibraryState>();
    let totalBooks = 0;
    let totalCapacity = 0;

    for (const state of sorted) {
      index.set(state.id, Object.freeze({ ...state }));
      totalBooks += state.bookCount;
      totalCapacity += state.capacity;
    }

    this.states = index;
    this.totalBooks = totalBooks;
    this.totalCapacity = totalCapacity;
  }

  /** Validate records and build a model. Throws InvalidCapacityError on the first bad record. */
  static from(records: Iterable<LibraryState>): CapacityModel {
    const seen = new Set<LibraryId>();
    const states: LibraryState[] = [];
    let totalCapacity = 0;

    for (const record of records) {
      assertValidRecord(record);
      if (seen.has(record.id)) {
        throw new InvalidCapacityError(`Library ${record.id} appears more than once`, record.id);
      }
      totalCapacity += record.capacity;
      if (!Number.isSafeInteger(totalCapacity)) {
        throw new InvalidCapacityError(
          `Total capacity exceeds ${Number.MAX_SAFE_INTEGER} at library ${record.id}`,
          record.id
        );
      }
      seen.add(record.id);
      states.push({ id: record.id, bookCount: record.bookCount, capacity: record.capacity });
    }

    return new CapacityModel(states);
  }

  get size(): number {
    return this.states.size;
  }

  has(id: LibraryId): boolean {
    return this.states.has(id);
  }

  get(id: LibraryId): LibraryState {
    const state = this.states.get(id);
    if (!state) {
      throw new NotFoundError('Library', id);
    }
    return state;
  }

  /** All states, ascending id. */
  libraries(): LibraryState[] {
    return [...this.states.values()];
  }

  slack(id: LibraryId): number {
    const { capacity, bookCount } = this.get(id);
    return capacity - bookCount;
  }

  /** Proportional-fill target, clamped to `[0, capacity]`. */
  target(id: LibraryId): number {
    const { capacity } = this.get(id);
    if (this.totalCapacity === 0) return 0;
    // The product can pass 2^53; both factors and the result stay safe integers.
    const raw = Number(
      roundHalfUp(BigInt(this.totalBooks) * BigInt(capacity), BigInt(this.totalCapacity))
    );
    return Math.min(Math.max(raw, 0), capacity);
  }

  /** `target − bookCount`; negative values are a surplus. */
  deficit(id: LibraryId): number {
    return this.target(id) - this.get(id).bookCount;
  }

  targets(): LibraryTarget[] {
    return this.libraries().map((state) => ({
      libraryId: state.id,
      bookCount: state.bookCount,
      capacity: state.capacity,
      target: this.target(state.id),
    }));
  }

  /** A new model with one library's count replaced. The result is validated again. */
  withBookCount(id: LibraryId, bookCount: number): CapacityModel {
    const current = this.get(id);
    return CapacityModel.from(
      this.libraries().map((state) => (state.id === id ? { ...current, bookCount } : state))
    );
  }
}
