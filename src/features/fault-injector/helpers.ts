/**
 * Fault injector helper functions
 */

import { FAULT_ERROR_KIND, INJECTABLE_FAULT_KINDS } from '$types/common';
import { ConfigValidationError } from '$types/errors';
import { isInteger } from '@utils/number';

import type { InjectableFaultKind, RandomSource, Severity } from '$types/common';
import type { LogEvent } from '@core/log-store';
import type { InjectorConfig } from './types';

const EMISSIONS: Readonly<Record<InjectableFaultKind, { severity: Severity; message: string }>> = {
  sensor_noise: { severity: 'warning', message: 'Sensor noise simulation active' },
  actuator_fail: { severity: 'error', message: 'Actuator failure simulation active' },
  comm_break: { severity: 'warning', message: 'Communication break simulation active' },
  power_spike: { severity: 'warning', message: 'Power fluctuation simulation active' },
  memory_leak: { severity: 'critical', message: 'Memory corruption simulation active' }
};

/**
 * Validate injector configuration
 * @throws {ConfigValidationError} If configuration is invalid
 */
export function validateInjectorConfig(config: InjectorConfig): void {
  if (!isInteger(config.FAULT_EMIT_EVERY) || config.FAULT_EMIT_EVERY < 1) {
    throw new ConfigValidationError('FAULT_EMIT_EVERY must be a positive integer, got ' + config.FAULT_EMIT_EVERY, ['FAULT_EMIT_EVERY']);
  }
}

/**
 * Degraded signal emitted while a fault kind is active
 * @param kind - Active fault kind
 * @returns Log event reported under the kind's correlated error kind
 */
export function emissionFor(kind: InjectableFaultKind): LogEvent {
  const emission = EMISSIONS[kind];
  return {
    severity: emission.severity,
    errorKind: FAULT_ERROR_KIND[kind],
    message: emission.message,
    func: 'simulateFault'
  };
}

/**
 * Pick a fault kind uniformly
 * @param random - Uniform source in [0, 1)
 * @returns One of the injectable kinds
 */
export function pickFaultKind(random: RandomSource): InjectableFaultKind {
  const count = INJECTABLE_FAULT_KINDS.length;
  const index = Math.min(Math.floor(random() * count), count - 1);
  return INJECTABLE_FAULT_KINDS[Math.max(index, 0)];
}
