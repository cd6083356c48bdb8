import type { Logger } from '../lib/logger.js';
import type { LibraryId } from '../engine/redistribution/types.js';
import type { LibraryStore } from '../store/library-store.js';
import type { SeedFile, SeedHoldings } from '../schemas/seed.schema.js';

export interface SeedOptions {
  /** Remove every library before loading. */
  flush?: boolean;
  holdings?: SeedHoldings;
  /** Uniform [0, 1) source for the random scenario. */
  random?: () => number;
}

export interface SeedSummary {
  created: number;
  /** Libraries whose id already existed; left untouched. */
  skipped: number;
  holdings: SeedHoldings;
  placed: number;
  overflow: number;
}

/**
 * Load libraries from a seed file and optionally generate starting holdings.
 *
 * - `none`: counts come from the file.
 * - `all_to_first`: every book goes to the lowest-id library, clamped to its capacity.
 * - `random`: each book goes to a random library that still has room.
 *
 * The last two replace the count of every library in the store. `totalBooks`
 * defaults to the sum of the file's counts. Books that fit nowhere are
 * reported as overflow.
 */
export class SeedService {
  constructor(
    private readonly store: LibraryStore,
    private readonly logger: Logger
  ) {}

  async load(seed: SeedFile, options: SeedOptions = {}): Promise<SeedSummary> {
    const holdings = options.holdings ?? 'none';
    const random = options.random ?? Math.random;
    const fileBooks = seed.libraries.reduce((sum, lib) => sum + (lib.bookCount ?? 0), 0);
    const totalBooks = seed.totalBooks ?? fileBooks;

    const summary = await this.store.transaction(async (tx) => {
      if (options.flush) {
        await tx.clear();
      }

      let created = 0;
      let skipped = 0;
      let loadedBooks = 0;
      for (const lib of seed.libraries) {
        if (await tx.findLibrary(lib.id)) {
          skipped++;
          continue;
        }
        loadedBooks += lib.bookCount ?? 0;
        await tx.createLibrary({
          id: lib.id,
          name: lib.name,
          capacity: lib.capacity,
          bookCount: holdings === 'none' ? lib.bookCount ?? 0 : 0,
        });
        created++;
      }

      if (holdings === 'none') {
        return { created, skipped, holdings, placed: loadedBooks, overflow: 0 };
      }

      const libraries = await tx.listLibraries();
      const counts = new Map<LibraryId, number>(libraries.map((lib) => [lib.id, 0]));
      const capacities = new Map<LibraryId, number>(libraries.map((lib) => [lib.id, lib.capacity]));
      let placed = 0;

      if (holdings === 'all_to_first' && libraries.length > 0) {
        const first = libraries[0];
        placed = Math.min(totalBooks, first.capacity);
        counts.set(first.id, placed);
      } else if (holdings === 'random') {
        for (let book = 0; book < totalBooks; book++) {
          const open = libraries.filter((lib) => (counts.get(lib.id) ?? 0) < (capacities.get(lib.id) ?? 0));
          if (open.length === 0) break;
          const pick = open[Math.min(open.length - 1, Math.floor(random() * open.length))];
          counts.set(pick.id, (counts.get(pick.id) ?? 0) + 1);
          placed++;
        }
      }

      for (const [id, count] of counts) {
        await tx.setBookCount(id, count);
      }

      return { created, skipped, holdings, placed, overflow: totalBooks - placed };
    });

    this.logger.info(summary, 'Seed loaded');
    if (summary.overflow > 0) {
      this.logger.warn({ overflow: summary.overflow }, 'Seed holdings exceed available capacity');
    }
    return summary;
  }
}
