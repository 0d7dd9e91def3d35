/**
 * Fault injector types
 */

import type { FaultKind } from '$types/common';
import type { LogEvent } from '@core/log-store';

/**
 * Injector state
 */
export interface InjectorState {
  /** Whether a fault is currently being simulated */
  active: boolean;
  /** Kind being simulated ('none' while inactive) */
  kind: FaultKind;
  /** Ticks since the current fault was activated */
  tickCount: number;
}

/**
 * Result of one injector tick
 */
export interface InjectorTickResult {
  state: InjectorState;
  /** Degraded signal to log this tick, if any */
  event: LogEvent | null;
}

/**
 * Injector configuration
 * Maps to MonitorConfig properties
 */
export interface InjectorConfig {
  /** Emit a degraded signal on every Nth tick while active */
  FAULT_EMIT_EVERY: number;
}
