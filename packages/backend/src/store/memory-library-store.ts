import type { LibraryId, LibraryState } from '../engine/redistribution/types.js';
import { ConflictError, NotFoundError } from '../lib/errors.js';
import {
  assertLibraryFields,
  assertLibraryId,
  type LibraryPatch,
  type LibraryRecord,
  type LibraryStore,
  type NewLibrary,
} from './library-store.js';
import { SerialLock } from './serial-lock.js';

// ─── Table ───────────────────────────────────────────────────────────────────

class LibraryTable {
  constructor(private readonly rows: Map<LibraryId, LibraryRecord> = new Map()) {}

  clone(): LibraryTable {
    const rows = new Map<LibraryId, LibraryRecord>();
    for (const [id, row] of this.rows) rows.set(id, { ...row });
    return new LibraryTable(rows);
  }

  list(): LibraryRecord[] {
    return [...this.rows.values()].sort((a, b) => a.id - b.id).map((row) => ({ ...row }));
  }

  find(id: LibraryId): LibraryRecord | null {
    const row = this.rows.get(id);
    return row ? { ...row } : null;
  }

  create(input: NewLibrary): LibraryRecord {
    const bookCount = input.bookCount ?? 0;
    assertLibraryFields({ capacity: input.capacity, bookCount });

    let id = input.id;
    if (id === undefined) {
      id = Math.max(0, ...this.rows.keys()) + 1;
    } else {
      assertLibraryId(id);
    }
    if (this.rows.has(id)) {
      throw new ConflictError(`Library with id '${id}' already exists`);
    }
    this.assertUniqueName(input.name);

    const row: LibraryRecord = { id, name: input.name, capacity: input.capacity, bookCount };
    this.rows.set(id, row);
    return { ...row };
  }

  update(id: LibraryId, patch: LibraryPatch): LibraryRecord {
    const row = this.require(id);
    const next: LibraryRecord = {
      id,
      name: patch.name ?? row.name,
      capacity: patch.capacity ?? row.capacity,
      bookCount: patch.bookCount ?? row.bookCount,
    };
    assertLibraryFields(next);
    if (next.name !== row.name) this.assertUniqueName(next.name);

    this.rows.set(id, next);
    return { ...next };
  }

  setBookCount(id: LibraryId, bookCount: number): void {
    const row = this.require(id);
    assertLibraryFields({ capacity: row.capacity, bookCount });
    this.rows.set(id, { ...row, bookCount });
  }

  delete(id: LibraryId): void {
    this.require(id);
    this.rows.delete(id);
  }

  clear(): void {
    this.rows.clear();
  }

  private require(id: LibraryId): LibraryRecord {
    const row = this.rows.get(id);
    if (!row) throw new NotFoundError('Library', id);
    return row;
  }

  private assertUniqueName(name: string): void {
    for (const row of this.rows.values()) {
      if (row.name === name) {
        throw new ConflictError(`Library named '${name}' already exists`);
      }
    }
  }
}

// ─── Transactional view ──────────────────────────────────────────────────────

class MemoryTransaction implements LibraryStore {
  constructor(private readonly table: LibraryTable) {}

  async listLibraries(): Promise<LibraryRecord[]> {
    return this.table.list();
  }

  async findLibrary(id: LibraryId): Promise<LibraryRecord | null> {
    return this.table.find(id);
  }

  async createLibrary(input: NewLibrary): Promise<LibraryRecord> {
    return this.table.create(input);
  }

  async updateLibrary(id: LibraryId, patch: LibraryPatch): Promise<LibraryRecord> {
    return this.table.update(id, patch);
  }

  async setBookCount(id: LibraryId, bookCount: number): Promise<void> {
    this.table.setBookCount(id, bookCount);
  }

  async deleteLibrary(id: LibraryId): Promise<void> {
    this.table.delete(id);
  }

  async clear(): Promise<void> {
    this.table.clear();
  }

  // Already inside a transaction
  async transaction<T>(work: (tx: LibraryStore) => Promise<T>): Promise<T> {
    return work(this);
  }
}

// ─── MemoryLibraryStore ──────────────────────────────────────────────────────

/**
 * In-process LibraryStore. Used as the dry-run ledger (seeded from a plan's
 * snapshot) and as the store in tests.
 *
 * A transaction works on a copy of the table and swaps it in on success,
 * so a failed transaction leaves no trace.
 */
export class MemoryLibraryStore implements LibraryStore {
  private table = new LibraryTable();
  private readonly lock = new SerialLock();

  constructor(libraries: ReadonlyArray<NewLibrary> = []) {
    for (const library of libraries) {
      this.table.create(library);
    }
  }

  /** Ledger seeded from planner states. Names are derived from ids. */
  static fromStates(states: readonly LibraryState[]): MemoryLibraryStore {
    return new MemoryLibraryStore(
      states.map((s) => ({ id: s.id, name: `Library ${s.id}`, capacity: s.capacity, bookCount: s.bookCount }))
    );
  }

  listLibraries(): Promise<LibraryRecord[]> {
    return this.transaction((tx) => tx.listLibraries());
  }

  findLibrary(id: LibraryId): Promise<LibraryRecord | null> {
    return this.transaction((tx) => tx.findLibrary(id));
  }

  createLibrary(input: NewLibrary): Promise<LibraryRecord> {
    return this.transaction((tx) => tx.createLibrary(input));
  }

  updateLibrary(id: LibraryId, patch: LibraryPatch): Promise<LibraryRecord> {
    return this.transaction((tx) => tx.updateLibrary(id, patch));
  }

  setBookCount(id: LibraryId, bookCount: number): Promise<void> {
    return this.transaction((tx) => tx.setBookCount(id, bookCount));
  }

  deleteLibrary(id: LibraryId): Promise<void> {
    return this.transaction((tx) => tx.deleteLibrary(id));
  }

  clear(): Promise<void> {
    return this.transaction((tx) => tx.clear());
  }

  transaction<T>(work: (tx: LibraryStore) => Promise<T>): Promise<T> {
    return this.lock.run(async () => {
      const draft = this.table.clone();
      const result = await work(new MemoryTransaction(draft));
      this.table = draft;
      return result;
    });
  }
}
