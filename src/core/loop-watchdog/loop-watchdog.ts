/**
 * Loop watchdog
 *
 * Detects an unresponsive control loop by tracking heartbeat timestamps.
 * The loop pets the watchdog after every completed iteration; every health
 * check evaluates it.
 *
 * A stale watchdog reports once per stale window, not once per check: with
 * a 5 s timeout and no pets, reports fall at 5 s and 10 s however often the
 * health check runs in between. Petting re-arms it.
 */

import { staleWindow, validateTimeout, validateWatchdogInputs } from './helpers';
import type { WatchdogEvaluation, WatchdogState } from './types';

export type { WatchdogEvaluation, WatchdogState } from './types';

/**
 * Create a freshly armed watchdog
 * @param nowSec - Arming time in seconds
 * @returns Watchdog state petted at nowSec
 */
export function createWatchdogState(nowSec: number): WatchdogState {
  validateWatchdogInputs(nowSec, 0, 'createWatchdogState');
  return { lastWatchdogPet: nowSec, lastFiredWindow: 0 };
}

/**
 * Pet the watchdog (update heartbeat)
 *
 * Returns a new state object (immutable update pattern) and clears the
 * fired-window guard.
 *
 * @param state - Current watchdog state
 * @param nowSec - Current timestamp in seconds
 * @returns New state with updated timestamp
 * @throws {ValidationError} If inputs are invalid
 */
export function petWatchdog(state: WatchdogState, nowSec: number): WatchdogState {
  validateWatchdogInputs(nowSec, state.lastWatchdogPet, 'petWatchdog');

  return {
    lastWatchdogPet: nowSec,
    lastFiredWindow: 0
  };
}

/**
 * Evaluate the watchdog at a health check
 *
 * Fires when the current stale window is past the one that last fired.
 *
 * @param state - Current watchdog state
 * @param nowSec - Current timestamp in seconds
 * @param timeoutSec - Length of one stale window in seconds
 * @returns Updated state and whether a timeout should be reported now
 * @throws {ValidationError} If inputs are invalid
 */
export function evaluateWatchdog(
  state: WatchdogState,
  nowSec: number,
  timeoutSec: number
): WatchdogEvaluation {
  validateWatchdogInputs(nowSec, state.lastWatchdogPet, 'evaluateWatchdog');
  validateTimeout(timeoutSec, 'evaluateWatchdog');

  const staleSec = nowSec - state.lastWatchdogPet;
  const window = staleWindow(staleSec, timeoutSec);

  if (window >= 1 && window > state.lastFiredWindow) {
    return {
      state: { lastWatchdogPet: state.lastWatchdogPet, lastFiredWindow: window },
      fired: true,
      staleSec: staleSec
    };
  }

  return { state: state, fired: false, staleSec: staleSec };
}
