import { CapacityModel } from './capacity-model.js';
import type { LibraryId, LibraryState, Plan, Residual, Transfer } from './types.js';

interface Party {
  libraryId: LibraryId;
  remaining: number;
}

/** Descending remaining amount, then ascending id. */
function byLargestFirst(a: Party, b: Party): number {
  return b.remaining - a.remaining || a.libraryId - b.libraryId;
}

/**
 * Greedy proportional-fill planner.
 *
 * Pairs the largest-surplus donor with the largest-deficit receiver and moves
 * `min(surplus, deficit)` books until one side runs out. A receiver's deficit
 * never exceeds its slack because targets are clamped to capacity, so every
 * prefix of the emitted transfers is capacity-safe.
 *
 * Accepts either a validated CapacityModel or raw records (validated here).
 */
export function plan(snapshot: CapacityModel | Iterable<LibraryState>): Plan {
  const model = snapshot instanceof CapacityModel ? snapshot : CapacityModel.from(snapshot);
  const targets = model.targets();

  const donors: Party[] = [];
  const receivers: Party[] = [];

  for (const entry of targets) {
    const delta = entry.target - entry.bookCount;
    if (delta < 0) {
      donors.push({ libraryId: entry.libraryId, remaining: -delta });
    } else if (delta > 0) {
      receivers.push({ libraryId: entry.libraryId, remaining: delta });
    }
  }

  donors.sort(byLargestFirst);
  receivers.sort(byLargestFirst);

  const transfers: Transfer[] = [];
  let d = 0;
  let r = 0;

  while (d < donors.length && r < receivers.length) {
    const donor = donors[d];
    const receiver = receivers[r];
    const quantity = Math.min(donor.remaining, receiver.remaining);

    if (quantity > 0) {
      transfers.push(
        Object.freeze({
          sourceId: donor.libraryId,
          destinationId: receiver.libraryId,
          quantity,
        })
      );
    }

    donor.remaining -= quantity;
    receiver.remaining -= quantity;
    if (donor.remaining === 0) d++;
    if (receiver.remaining === 0) r++;
  }

  const residuals: Residual[] = [
    ...donors
      .slice(d)
      .filter((p) => p.remaining > 0)
      .map((p) => ({ libraryId: p.libraryId, kind: 'surplus' as const, amount: p.remaining })),
    ...receivers
      .slice(r)
      .filter((p) => p.remaining > 0)
      .map((p) => ({ libraryId: p.libraryId, kind: 'deficit' as const, amount: p.remaining })),
  ];

  return Object.freeze({
    snapshot: Object.freeze(model.libraries()),
    targets: Object.freeze(targets.map((t) => Object.freeze(t))),
    transfers: Object.freeze(transfers),
    residuals: Object.freeze(residuals.map((res) => Object.freeze(res))),
    totalBooks: model.totalBooks,
    booksMoved: transfers.reduce((sum, t) => sum + t.quantity, 0),
  });
}
