/**
 * Health tracker helper functions
 */

import { ConfigValidationError } from '$types/errors';
import { clamp, drawInRange, isFiniteNumber } from '@utils/number';

import type { RandomSource } from '$types/common';
import type { HealthConfig } from './types';

/**
 * Validate health configuration
 * @throws {ConfigValidationError} If configuration is invalid
 */
export function validateHealthConfig(config: HealthConfig): void {
  const gauges: (keyof HealthConfig)[] = [
    'CPU_GAUGE_MIN', 'CPU_GAUGE_SPAN', 'MEMORY_GAUGE_MIN', 'MEMORY_GAUGE_SPAN',
    'RECOVERY_CPU_MIN', 'RECOVERY_CPU_SPAN', 'RECOVERY_MEMORY_MIN', 'RECOVERY_MEMORY_SPAN'
  ];
  for (let i = 0; i < gauges.length; i++) {
    const value = config[gauges[i]];
    if (!isFiniteNumber(value) || value < 0) {
      throw new ConfigValidationError(gauges[i] + ' must be a non-negative finite number, got ' + value, [gauges[i]]);
    }
  }
  if (!isFiniteNumber(config.CPU_ALERT_PCT) || config.CPU_ALERT_PCT < 0 || config.CPU_ALERT_PCT > 100) {
    throw new ConfigValidationError('CPU_ALERT_PCT must be within [0, 100], got ' + config.CPU_ALERT_PCT, ['CPU_ALERT_PCT']);
  }
  if (!isFiniteNumber(config.MEMORY_ALERT_PCT) || config.MEMORY_ALERT_PCT < 0 || config.MEMORY_ALERT_PCT > 100) {
    throw new ConfigValidationError('MEMORY_ALERT_PCT must be within [0, 100], got ' + config.MEMORY_ALERT_PCT, ['MEMORY_ALERT_PCT']);
  }
  if (!isFiniteNumber(config.WATCHDOG_TIMEOUT_SEC) || config.WATCHDOG_TIMEOUT_SEC <= 0) {
    throw new ConfigValidationError('WATCHDOG_TIMEOUT_SEC must be positive, got ' + config.WATCHDOG_TIMEOUT_SEC, ['WATCHDOG_TIMEOUT_SEC']);
  }
}

/**
 * Draw a usage gauge and clamp it to a percentage
 *
 * Stand-in for real instrumentation.
 *
 * @param random - Uniform source in [0, 1)
 * @param base - Lowest value
 * @param span - Width of the range
 * @returns Percentage in [0, 100]
 */
export function sampleGauge(random: RandomSource, base: number, span: number): number {
  return clamp(drawInRange(random, base, span), 0, 100);
}
