import { describe, it, expect } from 'vitest';
import { CapacityModel, roundHalfUp } from '../engine/redistribution/capacity-model.js';
import { InvalidCapacityError, NotFoundError } from '../lib/errors.js';
import { states } from './setup.js';

describe('roundHalfUp', () => {
  it('rounds halves up', () => {
    expect(roundHalfUp(1n, 2n)).toBe(1n);
    expect(roundHalfUp(5n, 2n)).toBe(3n);
  });

  it('rounds below half down and above half up', () => {
    expect(roundHalfUp(5n, 4n)).toBe(1n);
    expect(roundHalfUp(7n, 4n)).toBe(2n);
    expect(roundHalfUp(0n, 3n)).toBe(0n);
  });
});

describe('CapacityModel', () => {
  describe('construction', () => {
    it('computes totals', () => {
      const model = CapacityModel.from(states({ 1: [0, 100], 2: [100, 100] }));

      expect(model.size).toBe(2);
      expect(model.totalBooks).toBe(100);
      expect(model.totalCapacity).toBe(200);
    });

    it('iterates in ascending id regardless of input order', () => {
      const model = CapacityModel.from([
        { id: 3, bookCount: 1, capacity: 5 },
        { id: 1, bookCount: 2, capacity: 5 },
        { id: 2, bookCount: 0, capacity: 5 },
      ]);

      expect(model.libraries().map((s) => s.id)).toEqual([1, 2, 3]);
    });

    it('accepts an empty snapshot', () => {
      const model = CapacityModel.from([]);

      expect(model.size).toBe(0);
      expect(model.totalBooks).toBe(0);
      expect(model.totalCapacity).toBe(0);
    });

    it('rejects a non-positive capacity', () => {
      expect(() => CapacityModel.from(states({ 1: [0, 0] }))).toThrow(InvalidCapacityError);
      expect(() => CapacityModel.from(states({ 1: [0, -5] }))).toThrow(InvalidCapacityError);
    });

    it('rejects a negative count', () => {
      expect(() => CapacityModel.from(states({ 1: [-1, 10] }))).toThrow(InvalidCapacityError);
    });

    it('rejects a count above capacity', () => {
      expect(() => CapacityModel.from(states({ 1: [11, 10] }))).toThrow(
        'Library 1 holds 11 books but its capacity is 10'
      );
    });

    it('rejects fractional values', () => {
      expect(() => CapacityModel.from([{ id: 1, bookCount: 1.5, capacity: 10 }])).toThrow(
        InvalidCapacityError
      );
    });

    it.each([0, -1])('rejects library id %s', (id) => {
      expect(() => CapacityModel.from([{ id, bookCount: 0, capacity: 10 }])).toThrow(
        `Library id must be a positive integer, got ${id}`
      );
    });

    it('rejects a total capacity beyond the safe integer range', () => {
      expect(() => CapacityModel.from(states({ 1: [0, Number.MAX_SAFE_INTEGER], 2: [0, 1] }))).toThrow(
        'Total capacity exceeds 9007199254740991 at library 2'
      );
    });

    it('rejects duplicate ids', () => {
      expect(() =>
        CapacityModel.from([
          { id: 1, bookCount: 0, capacity: 10 },
          { id: 1, bookCount: 5, capacity: 10 },
        ])
      ).toThrow('Library 1 appears more than once');
    });

    it('carries the offending library id', () => {
      try {
        CapacityModel.from(states({ 1: [0, 10], 7: [0, 0] }));
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(InvalidCapacityError);
        expect(error).toMatchObject({ libraryId: 7 });
      }
    });
  });

  describe('per-library figures', () => {
    const model = CapacityModel.from(states({ 1: [0, 100], 2: [100, 100] }));

    it('reports slack', () => {
      expect(model.slack(1)).toBe(100);
      expect(model.slack(2)).toBe(0);
    });

    it('targets a share proportional to capacity', () => {
      expect(model.target(1)).toBe(50);
      expect(model.target(2)).toBe(50);
    });

    it('reports deficit as target minus count', () => {
      expect(model.deficit(1)).toBe(50);
      expect(model.deficit(2)).toBe(-50);
    });

    it('weights targets by capacity', () => {
      const uneven = CapacityModel.from(states({ 1: [30, 30], 2: [0, 10] }));

      // 30 books over 40 seats: 30*30/40 = 22.5 -> 23, 30*10/40 = 7.5 -> 8
      expect(uneven.target(1)).toBe(23);
      expect(uneven.target(2)).toBe(8);
    });

    it('rounds exact halves up for every library', () => {
      const halves = CapacityModel.from(states({ 1: [1, 1], 2: [0, 1] }));

      expect(halves.target(1)).toBe(1);
      expect(halves.target(2)).toBe(1);
    });

    it('keeps targets exact when books times capacity passes 2^53', () => {
      const large = CapacityModel.from(states({ 1: [3_000_000_000_000_000, 3_000_000_000_000_000], 2: [0, 1] }));

      // 3e15 * 3e15 / (3e15 + 1) = 3e15 - 1 remainder 1
      expect(large.target(1)).toBe(2_999_999_999_999_999);
      expect(large.target(2)).toBe(1);
    });

    it('targets zero everywhere when there are no books', () => {
      const empty = CapacityModel.from(states({ 1: [0, 10], 2: [0, 20] }));

      expect(empty.targets().map((t) => t.target)).toEqual([0, 0]);
    });

    it('throws NotFoundError for an unknown id', () => {
      expect(() => model.get(99)).toThrow(NotFoundError);
      expect(() => model.slack(99)).toThrow("Library with id '99' not found");
    });
  });

  describe('withBookCount', () => {
    it('returns a new model and leaves the original unchanged', () => {
      const model = CapacityModel.from(states({ 1: [10, 100], 2: [0, 100] }));
      const updated = model.withBookCount(2, 40);

      expect(model.get(2).bookCount).toBe(0);
      expect(updated.get(2).bookCount).toBe(40);
      expect(updated.totalBooks).toBe(50);
    });

    it('validates the new count', () => {
      const model = CapacityModel.from(states({ 1: [10, 100] }));

      expect(() => model.withBookCount(1, 101)).toThrow(InvalidCapacityError);
    });
  });
});
