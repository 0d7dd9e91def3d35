/**
 * Sensor types
 */

import type { LogEvent } from '@core/log-store';

/**
 * Per-instance sensor state
 */
export interface SensorState {
  /** Failed draws in a row; a good draw resets it */
  consecutiveFailures: number;
}

export interface SensorConfig {
  /** Chance of a failed draw, in percent */
  SENSOR_FAILURE_PCT: number;
  /** Failures in a row tolerated before the sensor is reported failed */
  SENSOR_FAILURE_STREAK: number;
}

export interface SensorReadResult {
  state: SensorState;
  /** Reading in [0, 100), null once the sensor is reported failed */
  value: number | null;
  event: LogEvent | null;
}
