import { CapacityModel } from '../engine/redistribution/capacity-model.js';
import type { LibraryId, LibraryState } from '../engine/redistribution/types.js';
import { ValidationError } from '../lib/errors.js';

export interface LibraryRecord {
  id: LibraryId;
  name: string;
  capacity: number;
  bookCount: number;
}

export interface NewLibrary {
  id?: LibraryId;
  name: string;
  capacity: number;
  bookCount?: number;
}

export interface LibraryPatch {
  name?: string;
  capacity?: number;
  bookCount?: number;
}

/**
 * Persistence boundary for library records.
 *
 * `transaction` runs `work` against a transactional view: every read and write
 * made through `tx` commits together or not at all, and no other transaction
 * on the same store interleaves with it. Inside `work`, go through `tx`:
 * calling the outer store waits for the transaction and never returns.
 */
export interface LibraryStore {
  /** All libraries, ascending id. */
  listLibraries(): Promise<LibraryRecord[]>;
  findLibrary(id: LibraryId): Promise<LibraryRecord | null>;
  createLibrary(input: NewLibrary): Promise<LibraryRecord>;
  updateLibrary(id: LibraryId, patch: LibraryPatch): Promise<LibraryRecord>;
  setBookCount(id: LibraryId, bookCount: number): Promise<void>;
  deleteLibrary(id: LibraryId): Promise<void>;
  clear(): Promise<void>;
  transaction<T>(work: (tx: LibraryStore) => Promise<T>): Promise<T>;
}

export function toLibraryState(record: LibraryRecord): LibraryState {
  return { id: record.id, bookCount: record.bookCount, capacity: record.capacity };
}

/** Read every library and project it into a validated CapacityModel. */
export async function readSnapshot(store: LibraryStore): Promise<CapacityModel> {
  const records = await store.listLibraries();
  return CapacityModel.from(records.map(toLibraryState));
}

/** Same id rule the capacity model applies. */
export function assertLibraryId(id: LibraryId): void {
  if (!Number.isSafeInteger(id) || id <= 0) {
    throw new ValidationError('Library id must be a positive integer', { id });
  }
}

/** Field checks shared by every store implementation. */
export function assertLibraryFields(fields: { capacity: number; bookCount: number }): void {
  const { capacity, bookCount } = fields;
  if (!Number.isInteger(capacity) || capacity <= 0) {
    throw new ValidationError('Capacity must be a positive integer', { capacity });
  }
  if (!Number.isInteger(bookCount) || bookCount < 0) {
    throw new ValidationError('Book count must be a non-negative integer', { bookCount });
  }
  if (bookCount > capacity) {
    throw new ValidationError(`Book count ${bookCount} exceeds capacity ${capacity}`, {
      capacity,
      bookCount,
    });
  }
}
