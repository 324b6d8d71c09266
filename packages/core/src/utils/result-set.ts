import { ExecutionError } from '../errors';

import type { ResultSet, ResultSlotErr } from '../types';

export function failedSlots(resultSet: ResultSet): ResultSlotErr[] {
  return resultSet.slots.filter((slot): slot is ResultSlotErr => slot.status === 'ERR');
}

export function isSuccess(resultSet: ResultSet): boolean {
  return resultSet.slots.every((slot) => slot.status === 'OK');
}

/**
 * Result of the statement at `index`. Throws when the slot is missing or failed.
 */
export function takeSlot(resultSet: ResultSet, index: number, script = ''): unknown {
  const slot = resultSet.slots[index];

  if (!slot) {
    throw new ExecutionError(`No result for statement ${index}`, script, resultSet);
  }

  if (slot.status === 'ERR') {
    throw new ExecutionError(`Statement ${index} failed: ${slot.detail}`, script, resultSet);
  }

  return slot.result;
}

// Engines mark every statement of a failed transaction; the cause is the slot without this text
const CASCADED_FAILURE = /not executed due to a failed transaction/i;

/**
 * The detail of the statement that caused a failed result set.
 */
export function describeFailure(resultSet: ResultSet): string | undefined {
  const failed = failedSlots(resultSet);
  return (failed.find((slot) => !CASCADED_FAILURE.test(slot.detail)) ?? failed[0])?.detail;
}
