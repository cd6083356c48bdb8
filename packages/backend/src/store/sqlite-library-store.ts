import Database from 'better-sqlite3';
import type { LibraryId } from '../engine/redistribution/types.js';
import type { SqliteDatabase } from '../lib/database.js';
import { ConflictError, NotFoundError, ValidationError } from '../lib/errors.js';
import {
  assertLibraryFields,
  assertLibraryId,
  type LibraryPatch,
  type LibraryRecord,
  type LibraryStore,
  type NewLibrary,
} from './library-store.js';
import { SerialLock } from './serial-lock.js';

interface LibraryRow {
  id: number;
  name: string;
  capacity: number;
  book_count: number;
}

function isLibraryRow(value: unknown): value is LibraryRow {
  if (typeof value !== 'object' || value === null) return false;
  return (
    'id' in value && typeof value.id === 'number' &&
    'name' in value && typeof value.name === 'string' &&
    'capacity' in value && typeof value.capacity === 'number' &&
    'book_count' in value && typeof value.book_count === 'number'
  );
}

function toRecord(row: LibraryRow): LibraryRecord {
  return { id: row.id, name: row.name, capacity: row.capacity, bookCount: row.book_count };
}

/** Translate constraint failures into the API's error types; rethrow anything else. */
function translateSqliteError(error: unknown): never {
  if (error instanceof Database.SqliteError) {
    if (error.code === 'SQLITE_CONSTRAINT_UNIQUE' || error.code === 'SQLITE_CONSTRAINT_PRIMARYKEY') {
      throw new ConflictError(`Library already exists: ${error.message}`);
    }
    if (error.code === 'SQLITE_CONSTRAINT_CHECK') {
      throw new ValidationError(`Library violates a capacity constraint: ${error.message}`);
    }
  }
  throw error;
}

// ─── Queries ─────────────────────────────────────────────────────────────────

/** Synchronous statements over one connection. No locking here. */
class LibraryQueries {
  constructor(private readonly db: SqliteDatabase) {}

  list(): LibraryRecord[] {
    return this.db
      .prepare('SELECT id, name, capacity, book_count FROM libraries ORDER BY id ASC')
      .all()
      .filter(isLibraryRow)
      .map(toRecord);
  }

  find(id: LibraryId): LibraryRecord | null {
    const row: unknown = this.db
      .prepare('SELECT id, name, capacity, book_count FROM libraries WHERE id = ?')
      .get(id);
    return isLibraryRow(row) ? toRecord(row) : null;
  }

  create(input: NewLibrary): LibraryRecord {
    const bookCount = input.bookCount ?? 0;
    if (input.id !== undefined) {
      assertLibraryId(input.id);
    }
    assertLibraryFields({ capacity: input.capacity, bookCount });

    try {
      const result = this.db
        .prepare('INSERT INTO libraries (id, name, capacity, book_count) VALUES (?, ?, ?, ?)')
        .run(input.id ?? null, input.name, input.capacity, bookCount);
      return this.require(Number(result.lastInsertRowid));
    } catch (error) {
      return translateSqliteError(error);
    }
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

    try {
      this.db
        .prepare(
          `UPDATE libraries
              SET name = ?, capacity = ?, book_count = ?, updated_at = datetime('now')
            WHERE id = ?`
        )
        .run(next.name, next.capacity, next.bookCount, id);
    } catch (error) {
      translateSqliteError(error);
    }
    return next;
  }

  setBookCount(id: LibraryId, bookCount: number): void {
    const row = this.require(id);
    assertLibraryFields({ capacity: row.capacity, bookCount });

    try {
      this.db
        .prepare(`UPDATE libraries SET book_count = ?, updated_at = datetime('now') WHERE id = ?`)
        .run(bookCount, id);
    } catch (error) {
      translateSqliteError(error);
    }
  }

  delete(id: LibraryId): void {
    const result = this.db.prepare('DELETE FROM libraries WHERE id = ?').run(id);
    if (result.changes === 0) {
      throw new NotFoundError('Library', id);
    }
  }

  clear(): void {
    this.db.prepare('DELETE FROM libraries').run();
  }

  private require(id: LibraryId): LibraryRecord {
    const record = this.find(id);
    if (!record) throw new NotFoundError('Library', id);
    return record;
  }
}

// ─── Transactional view ──────────────────────────────────────────────────────

class SqliteTransaction implements LibraryStore {
  constructor(private readonly queries: LibraryQueries) {}

  async listLibraries(): Promise<LibraryRecord[]> {
    return this.queries.list();
  }

  async findLibrary(id: LibraryId): Promise<LibraryRecord | null> {
    return this.queries.find(id);
  }

  async createLibrary(input: NewLibrary): Promise<LibraryRecord> {
    return this.queries.create(input);
  }

  async updateLibrary(id: LibraryId, patch: LibraryPatch): Promise<LibraryRecord> {
    return this.queries.update(id, patch);
  }

  async setBookCount(id: LibraryId, bookCount: number): Promise<void> {
    this.queries.setBookCount(id, bookCount);
  }

  async deleteLibrary(id: LibraryId): Promise<void> {
    this.queries.delete(id);
  }

  async clear(): Promise<void> {
    this.queries.clear();
  }

  async transaction<T>(work: (tx: LibraryStore) => Promise<T>): Promise<T> {
    return work(this);
  }
}

// ─── SqliteLibraryStore ──────────────────────────────────────────────────────

/**
 * LibraryStore over a better-sqlite3 connection.
 *
 * Each transaction is `BEGIN IMMEDIATE … COMMIT`, so the write lock is taken
 * before the first read and rows re-read inside the transaction cannot change
 * underneath it. Transactions on one store are serialized.
 */
export class SqliteLibraryStore implements LibraryStore {
  private readonly queries: LibraryQueries;
  private readonly lock = new SerialLock();

  constructor(private readonly db: SqliteDatabase) {
    this.queries = new LibraryQueries(db);
  }

  listLibraries(): Promise<LibraryRecord[]> {
    return this.lock.run(async () => this.queries.list());
  }

  findLibrary(id: LibraryId): Promise<LibraryRecord | null> {
    return this.lock.run(async () => this.queries.find(id));
  }

  createLibrary(input: NewLibrary): Promise<LibraryRecord> {
    return this.lock.run(async () => this.queries.create(input));
  }

  updateLibrary(id: LibraryId, patch: LibraryPatch): Promise<LibraryRecord> {
    return this.lock.run(async () => this.queries.update(id, patch));
  }

  setBookCount(id: LibraryId, bookCount: number): Promise<void> {
    return this.lock.run(async () => this.queries.setBookCount(id, bookCount));
  }

  deleteLibrary(id: LibraryId): Promise<void> {
    return this.lock.run(async () => this.queries.delete(id));
  }

  clear(): Promise<void> {
    return this.lock.run(async () => this.queries.clear());
  }

  transaction<T>(work: (tx: LibraryStore) => Promise<T>): Promise<T> {
    return this.lock.run(async () => {
      this.db.exec('BEGIN IMMEDIATE');
      try {
        const result = await work(new SqliteTransaction(this.queries));
        this.db.exec('COMMIT');
        return result;
      } catch (error) {
        if (this.db.inTransaction) {
          this.db.exec('ROLLBACK');
        }
        throw error;
      }
    });
  }

  close(): void {
    this.db.close();
  }
}
