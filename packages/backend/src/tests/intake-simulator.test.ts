import { describe, it, expect } from 'vitest';
import { CapacityModel } from '../engine/redistribution/capacity-model.js';
import { simulateIntake, splitIntake } from '../engine/redistribution/intake-simulator.js';
import { plan } from '../engine/redistribution/planner.js';
import { CapacityExceededError, NotFoundError, ValidationError } from '../lib/errors.js';
import { states } from './setup.js';

describe('splitIntake', () => {
  it('accepts everything that fits', () => {
    expect(splitIntake(1, 5, 3)).toEqual({ accepted: 3, overflow: 0 });
  });

  it('clamps to the available slack', () => {
    expect(splitIntake(1, 10, 20)).toEqual({ accepted: 10, overflow: 10 });
  });

  it('reports full overflow for a full library', () => {
    expect(splitIntake(1, 0, 4)).toEqual({ accepted: 0, overflow: 4 });
  });

  it('throws under the reject policy when anything overflows', () => {
    expect(() => splitIntake(1, 10, 20, 'reject')).toThrow(
      'Library 1 cannot take the intake: 10 book(s) over capacity'
    );
  });

  it('accepts under the reject policy when everything fits', () => {
    expect(splitIntake(1, 10, 10, 'reject')).toEqual({ accepted: 10, overflow: 0 });
  });

  it.each([0, -3, 1.5])('rejects quantity %s', (quantity) => {
    expect(() => splitIntake(1, 10, quantity)).toThrow(ValidationError);
  });
});

describe('simulateIntake', () => {
  it('fills to capacity and reports the overflow', () => {
    const before = CapacityModel.from(states({ 1: [90, 100] }));

    const result = simulateIntake(before, 1, 20);

    expect(result.accepted).toBe(10);
    expect(result.overflow).toBe(10);
    expect(result.snapshot.get(1).bookCount).toBe(100);
    expect(before.get(1).bookCount).toBe(90);
  });

  it('throws CapacityExceededError under reject and leaves the snapshot alone', () => {
    const before = CapacityModel.from(states({ 1: [90, 100] }));

    try {
      simulateIntake(before, 1, 20, 'reject');
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(CapacityExceededError);
      expect(error).toMatchObject({ libraryId: 1, overflow: 10 });
    }
    expect(before.get(1).bookCount).toBe(90);
  });

  it('throws NotFoundError for an unknown library', () => {
    const before = CapacityModel.from(states({ 1: [0, 10] }));

    expect(() => simulateIntake(before, 2, 5)).toThrow(NotFoundError);
  });

  it('feeds a plan that spreads the intake', () => {
    const before = CapacityModel.from(states({ 1: [0, 100], 2: [0, 100] }));

    const { snapshot } = simulateIntake(before, 1, 100);

    expect(plan(snapshot).transfers).toEqual([{ sourceId: 1, destinationId: 2, quantity: 50 }]);
  });
});
