/**
 * Simulated power supply monitor
 */

import { drawInRange } from '@utils/number';

import type { RandomSource } from '$types/common';
import type { PowerConfig, PowerReadResult } from './types';

export type { PowerConfig, PowerReadResult };

/**
 * Read the supply voltage
 *
 * Ripple is nominal -1.00 V to +0.99 V in 10 mV steps, so a nominal 24 V
 * supply stays inside the default [22, 26] window.
 *
 * @param random - Uniform source in [0, 1)
 * @param config - Nominal voltage and acceptable window
 * @returns Voltage, with a warning event when outside the window
 */
export function readSupplyVoltage(random: RandomSource, config: PowerConfig): PowerReadResult {
  const voltage = config.SUPPLY_NOMINAL_V + drawInRange(random, -100, 200) / 100;

  if (voltage < config.SUPPLY_MIN_V || voltage > config.SUPPLY_MAX_V) {
    return {
      voltage: voltage,
      event: { severity: 'warning', errorKind: 'power_fluctuation', message: 'Power fluctuation detected', func: 'readSupplyVoltage' }
    };
  }

  return { voltage: voltage, event: null };
}
