/**
 * Power supply types
 */

import type { LogEvent } from '@core/log-store';

export interface PowerConfig {
  /** Nominal supply voltage (V) */
  SUPPLY_NOMINAL_V: number;
  /** Lowest acceptable voltage (V) */
  SUPPLY_MIN_V: number;
  /** Highest acceptable voltage (V) */
  SUPPLY_MAX_V: number;
}

export interface PowerReadResult {
  voltage: number;
  event: LogEvent | null;
}
