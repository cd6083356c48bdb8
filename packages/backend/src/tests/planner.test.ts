import { describe, it, expect } from 'vitest';
import { CapacityModel } from '../engine/redistribution/capacity-model.js';
import { plan } from '../engine/redistribution/planner.js';
import type { LibraryState, Transfer } from '../engine/redistribution/types.js';
import { InvalidCapacityError } from '../lib/errors.js';
import { states } from './setup.js';

/** Apply transfers in order, failing on the first one that breaks a bound. */
function applyTransfers(snapshot: readonly LibraryState[], transfers: readonly Transfer[]): LibraryState[] {
  const counts = new Map(snapshot.map((s) => [s.id, s.bookCount]));
  const capacities = new Map(snapshot.map((s) => [s.id, s.capacity]));

  for (const t of transfers) {
    const source = (counts.get(t.sourceId) ?? 0) - t.quantity;
    const destination = (counts.get(t.destinationId) ?? 0) + t.quantity;
    if (source < 0 || destination > (capacities.get(t.destinationId) ?? 0)) {
      throw new Error(`transfer ${t.sourceId} -> ${t.destinationId} breaks a bound`);
    }
    counts.set(t.sourceId, source);
    counts.set(t.destinationId, destination);
  }

  return snapshot.map((s) => ({ ...s, bookCount: counts.get(s.id) ?? 0 }));
}

/** Small seeded generator so the property runs are repeatable. */
function lcg(seed: number): () => number {
  let state = seed;
  return () => {
    state = (state * 16807) % 2147483647;
    return (state - 1) / 2147483646;
  };
}

function randomSnapshot(random: () => number): LibraryState[] {
  const size = 1 + Math.floor(random() * 8);
  return Array.from({ length: size }, (_, i) => {
    const capacity = 1 + Math.floor(random() * 50);
    return { id: i + 1, capacity, bookCount: Math.floor(random() * (capacity + 1)) };
  });
}

describe('plan', () => {
  // ==========================================================================
  // Worked scenarios
  // ==========================================================================

  it('moves half the stock from a full library to an empty one', () => {
    const result = plan(states({ 1: [0, 100], 2: [100, 100] }));

    expect(result.transfers).toEqual([{ sourceId: 2, destinationId: 1, quantity: 50 }]);
    expect(result.residuals).toEqual([]);
    expect(result.booksMoved).toBe(50);
    expect(result.totalBooks).toBe(100);
  });

  it('reports the deficit left when rounded targets exceed the stock', () => {
    const result = plan(states({ 1: [10, 10], 2: [10, 10], 3: [0, 10] }));

    expect(result.targets.map((t) => t.target)).toEqual([7, 7, 7]);
    expect(result.transfers).toEqual([
      { sourceId: 1, destinationId: 3, quantity: 3 },
      { sourceId: 2, destinationId: 3, quantity: 3 },
    ]);
    expect(result.residuals).toEqual([{ libraryId: 3, kind: 'deficit', amount: 1 }]);
  });

  it('reports the surplus left when rounded targets fall short of the stock', () => {
    const result = plan(states({ 1: [1, 1], 2: [0, 1], 3: [0, 1], 4: [0, 1] }));

    expect(result.transfers).toEqual([]);
    expect(result.residuals).toEqual([{ libraryId: 1, kind: 'surplus', amount: 1 }]);
  });

  it('returns no transfers for a single library', () => {
    const result = plan(states({ 1: [5, 10] }));

    expect(result.transfers).toEqual([]);
    expect(result.residuals).toEqual([]);
    expect(result.booksMoved).toBe(0);
  });

  it('returns no transfers when there are no books', () => {
    const result = plan(states({ 1: [0, 5], 2: [0, 5] }));

    expect(result.transfers).toEqual([]);
    expect(result.residuals).toEqual([]);
  });

  it('returns an empty plan for no libraries', () => {
    const result = plan([]);

    expect(result.snapshot).toEqual([]);
    expect(result.transfers).toEqual([]);
    expect(result.totalBooks).toBe(0);
  });

  // ==========================================================================
  // Ordering
  // ==========================================================================

  it('breaks ties by ascending library id', () => {
    const result = plan(states({ 1: [10, 10], 2: [10, 10], 3: [0, 10], 4: [0, 10] }));

    expect(result.transfers).toEqual([
      { sourceId: 1, destinationId: 3, quantity: 5 },
      { sourceId: 2, destinationId: 4, quantity: 5 },
    ]);
  });

  it('pairs the largest surplus with the largest deficit first', () => {
    // 60 books over 120 seats: targets 10, 20, 10, 20
    const result = plan(states({ 1: [20, 20], 2: [40, 40], 3: [0, 20], 4: [0, 40] }));

    expect(result.transfers).toEqual([
      { sourceId: 2, destinationId: 4, quantity: 20 },
      { sourceId: 1, destinationId: 3, quantity: 10 },
    ]);
  });

  it('does not depend on input order', () => {
    const forward = states({ 1: [10, 10], 2: [3, 20], 3: [0, 15], 4: [12, 12] });
    const reversed = [...forward].reverse();

    expect(plan(reversed)).toEqual(plan(forward));
  });

  // ==========================================================================
  // Input handling
  // ==========================================================================

  it('accepts a CapacityModel', () => {
    const model = CapacityModel.from(states({ 1: [0, 100], 2: [100, 100] }));

    expect(plan(model).transfers).toHaveLength(1);
  });

  it('rejects an invalid snapshot before planning', () => {
    expect(() => plan(states({ 1: [5, 0] }))).toThrow(InvalidCapacityError);
  });

  it('returns a frozen plan', () => {
    const result = plan(states({ 1: [0, 100], 2: [100, 100] }));

    expect(Object.isFrozen(result)).toBe(true);
    expect(Object.isFrozen(result.transfers)).toBe(true);
    expect(Object.isFrozen(result.transfers[0])).toBe(true);
  });

  it('is idempotent once applied', () => {
    const first = plan(states({ 1: [0, 100], 2: [100, 100] }));
    const after = applyTransfers(first.snapshot, first.transfers);

    expect(plan(after).transfers).toEqual([]);
  });

  // ==========================================================================
  // Properties over generated snapshots
  // ==========================================================================

  describe('generated snapshots', () => {
    const random = lcg(42);
    const snapshots = Array.from({ length: 200 }, () => randomSnapshot(random));

    it('never emits a self transfer or a non-positive quantity', () => {
      for (const snapshot of snapshots) {
        for (const t of plan(snapshot).transfers) {
          expect(t.sourceId).not.toBe(t.destinationId);
          expect(t.quantity).toBeGreaterThan(0);
        }
      }
    });

    it('keeps every prefix within capacity and conserves the stock', () => {
      for (const snapshot of snapshots) {
        const result = plan(snapshot);
        const after = applyTransfers(snapshot, result.transfers);
        const total = after.reduce((sum, s) => sum + s.bookCount, 0);

        expect(total).toBe(result.totalBooks);
      }
    });

    it('lands every library on its target unless a residual names it', () => {
      for (const snapshot of snapshots) {
        const result = plan(snapshot);
        const after = applyTransfers(snapshot, result.transfers);
        const residualIds = new Set(result.residuals.map((r) => r.libraryId));

        for (const target of result.targets) {
          const state = after.find((s) => s.id === target.libraryId);
          if (!residualIds.has(target.libraryId)) {
            expect(state?.bookCount).toBe(target.target);
          }
        }
      }
    });

    it('leaves residuals on one side only', () => {
      for (const snapshot of snapshots) {
        const kinds = new Set(plan(snapshot).residuals.map((r) => r.kind));
        expect(kinds.size).toBeLessThanOrEqual(1);
      }
    });
  });
});
