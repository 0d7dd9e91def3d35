/**
 * System state machine
 *
 *   init ──> running ──> fault ──> recovery ──> running
 *                                     │
 *                                     └──> fault (recovery did not take)
 *
 * Every non-terminal state may also move to shutdown. Shutdown is terminal.
 * A self-transition is never an edge; callers that want idempotence check the
 * current state first.
 */

import { StateTransitionError } from '$types/errors';
import { err, ok } from '$types/result';

import type { SystemState } from '$types/common';
import type { Result } from '$types/result';

/**
 * Allowed successors of each state
 */
export const TRANSITIONS: Readonly<Record<SystemState, readonly SystemState[]>> = {
  init: ['running', 'shutdown'],
  running: ['fault', 'shutdown'],
  fault: ['recovery', 'shutdown'],
  recovery: ['running', 'fault', 'shutdown'],
  shutdown: []
};

const STATE_LABELS: Readonly<Record<SystemState, string>> = {
  init: 'INIT',
  running: 'RUNNING',
  fault: 'FAULT',
  recovery: 'RECOVERY',
  shutdown: 'SHUTDOWN'
};

/**
 * Check whether a transition is an edge of the graph
 * @param from - Current state
 * @param to - Requested state
 * @returns True if allowed
 */
export function canTransition(from: SystemState, to: SystemState): boolean {
  return TRANSITIONS[from].indexOf(to) !== -1;
}

/**
 * Validate a transition
 * @param from - Current state
 * @param to - Requested state
 * @returns The new state, or a StateTransitionError naming both ends
 */
export function transition(from: SystemState, to: SystemState): Result<SystemState, StateTransitionError> {
  if (!canTransition(from, to)) {
    return err(new StateTransitionError(from, to));
  }
  return ok(to);
}

/**
 * Check whether a state has no outgoing edges
 */
export function isTerminal(state: SystemState): boolean {
  return TRANSITIONS[state].length === 0;
}

/**
 * Display label for a state (upper case, as shown to operators)
 */
export function stateLabel(state: SystemState): string {
  return STATE_LABELS[state];
}
