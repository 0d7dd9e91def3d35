/**
 * Loop watchdog helper functions
 */

import { ValidationError } from '$types/errors';
import { isFiniteNumber } from '@utils/number';

/**
 * Validate watchdog input parameters
 * @throws {ValidationError} If inputs are invalid
 */
export function validateWatchdogInputs(
  nowSec: number,
  lastWatchdogPet: number,
  context: string
): void {
  if (!isFiniteNumber(nowSec) || nowSec < 0) {
    throw new ValidationError(context + ': nowSec must be a non-negative finite number, got ' + nowSec);
  }
  if (!isFiniteNumber(lastWatchdogPet) || lastWatchdogPet < 0) {
    throw new ValidationError(context + ': lastWatchdogPet must be a non-negative finite number, got ' + lastWatchdogPet);
  }
}

/**
 * Validate timeout value
 * @throws {ValidationError} If timeout is invalid
 */
export function validateTimeout(timeoutSec: number, context: string): void {
  if (!isFiniteNumber(timeoutSec) || timeoutSec <= 0) {
    throw new ValidationError(context + ': timeoutSec must be a positive finite number, got ' + timeoutSec);
  }
}

/**
 * Index of the stale window a given staleness falls in
 *
 * Window 0 is healthy; window k covers [k * timeout, (k + 1) * timeout).
 *
 * @param staleSec - Seconds since last pet
 * @param timeoutSec - Watchdog timeout
 * @returns Window index (0 while fresh, clock skew counts as fresh)
 */
export function staleWindow(staleSec: number, timeoutSec: number): number {
  if (staleSec <= 0) return 0;
  return Math.floor(staleSec / timeoutSec);
}
