import type { IntakeOverflowPolicy } from '../../lib/config.js';
import { CapacityExceededError, ValidationError } from '../../lib/errors.js';
import { CapacityModel } from './capacity-model.js';
import type { IntakeResult, LibraryId } from './types.js';

export interface IntakeSplit {
  accepted: number;
  overflow: number;
}

/**
 * Split an intake into what fits and what does not.
 * Under `reject`, any overflow throws CapacityExceededError instead.
 */
export function splitIntake(
  libraryId: LibraryId,
  slack: number,
  quantity: number,
  policy: IntakeOverflowPolicy = 'clamp'
): IntakeSplit {
  if (!Number.isInteger(quantity) || quantity <= 0) {
    throw new ValidationError('Intake quantity must be a positive integer', { quantity });
  }

  const accepted = Math.min(quantity, slack);
  const overflow = quantity - accepted;
  if (overflow > 0 && policy === 'reject') {
    throw new CapacityExceededError(libraryId, overflow);
  }
  return { accepted, overflow };
}

/**
 * Simulate a bulk donation into one library. Returns a new snapshot; the
 * input is left as it was.
 */
export function simulateIntake(
  snapshot: CapacityModel,
  libraryId: LibraryId,
  quantity: number,
  policy: IntakeOverflowPolicy = 'clamp'
): IntakeResult<CapacityModel> {
  const library = snapshot.get(libraryId);
  const { accepted, overflow } = splitIntake(libraryId, snapshot.slack(libraryId), quantity, policy);

  return {
    snapshot: snapshot.withBookCount(libraryId, library.bookCount + accepted),
    libraryId,
    accepted,
    overflow,
  };
}
