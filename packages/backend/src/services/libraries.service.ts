import { NotFoundError } from '../lib/errors.js';
import { CapacityModel } from '../engine/redistribution/capacity-model.js';
import type { LibraryId } from '../engine/redistribution/types.js';
import { toLibraryState, type LibraryRecord, type LibraryStore } from '../store/library-store.js';
import type { CreateLibraryInput, UpdateLibraryInput } from '../schemas/libraries.schema.js';

export interface LibraryView extends LibraryRecord {
  slack: number;
  target: number;
}

export class LibrariesService {
  constructor(private readonly store: LibraryStore) {}

  /** Every library with its slack and current proportional-fill target. */
  async list(): Promise<LibraryView[]> {
    const records = await this.store.listLibraries();
    const snapshot = CapacityModel.from(records.map(toLibraryState));

    return records.map((record) => ({
      ...record,
      slack: snapshot.slack(record.id),
      target: snapshot.target(record.id),
    }));
  }

  async get(id: LibraryId): Promise<LibraryView> {
    const library = (await this.list()).find((view) => view.id === id);
    if (!library) {
      throw new NotFoundError('Library', id);
    }
    return library;
  }

  async create(data: CreateLibraryInput): Promise<LibraryRecord> {
    return this.store.createLibrary(data);
  }

  async update(id: LibraryId, data: UpdateLibraryInput): Promise<LibraryRecord> {
    return this.store.updateLibrary(id, data);
  }

  async delete(id: LibraryId): Promise<void> {
    await this.store.deleteLibrary(id);
  }
}
