/**
 * Simulated actuator
 */

import type { LogEvent } from '@core/log-store';

export const ACTUATOR_MIN = 0;
export const ACTUATOR_MAX = 100;

export interface ActuatorResult {
  /** Echoed command, null when rejected */
  value: number | null;
  event: LogEvent | null;
}

/**
 * Command the actuator
 *
 * Commands in [0, 100] are echoed. Anything else is rejected with a
 * warning; the actuator never fails on its own, only through injection.
 *
 * @param command - Output level
 * @returns Applied value, or the rejection event
 */
export function commandActuator(command: number): ActuatorResult {
  if (!Number.isFinite(command) || command < ACTUATOR_MIN || command > ACTUATOR_MAX) {
    return {
      value: null,
      event: { severity: 'warning', errorKind: 'invalid_state', message: 'Invalid actuator command', func: 'commandActuator' }
    };
  }
  return { value: command, event: null };
}
