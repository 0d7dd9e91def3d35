/**
 * Simulated sensor
 *
 * Produces a reading every loop and fails occasionally. Isolated failures
 * are tolerated; a streak longer than SENSOR_FAILURE_STREAK is reported as
 * an error on every further failed read until a good read breaks it.
 */

import { drawInRange } from '@utils/number';

import type { RandomSource } from '$types/common';
import type { SensorConfig, SensorReadResult, SensorState } from './types';

export type { SensorConfig, SensorReadResult, SensorState };

/**
 * Initialize sensor state
 * @returns State with no failure streak
 */
export function createSensorState(): SensorState {
  return { consecutiveFailures: 0 };
}

/**
 * Read the sensor
 *
 * Draws the reading first, then the failure roll.
 *
 * @param state - Current sensor state
 * @param random - Uniform source in [0, 1)
 * @param config - Failure rate and tolerated streak
 * @returns Updated state, the reading, and an error event when the streak is exceeded
 */
export function readSensor(state: SensorState, random: RandomSource, config: SensorConfig): SensorReadResult {
  const reading = drawInRange(random, 0, 100);
  const failed = drawInRange(random, 0, 100) < config.SENSOR_FAILURE_PCT;

  if (!failed) {
    return { state: { consecutiveFailures: 0 }, value: reading, event: null };
  }

  const consecutiveFailures = state.consecutiveFailures + 1;
  if (consecutiveFailures > config.SENSOR_FAILURE_STREAK) {
    return {
      state: { consecutiveFailures: consecutiveFailures },
      value: null,
      event: { severity: 'error', errorKind: 'sensor_failure', message: 'Sensor failure detected', func: 'readSensor' }
    };
  }

  return { state: { consecutiveFailures: consecutiveFailures }, value: reading, event: null };
}
