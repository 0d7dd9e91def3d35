/**
 * Recovery coordinator types
 */

import type { SleepFn, SystemState } from '$types/common';
import type { FaultRecord } from '@core/fault-history';
import type { LogEvent } from '@core/log-store';

/**
 * Outcome of a recovery request
 */
export type RecoveryOutcome =
  | { recovered: false }
  | { recovered: true; resolvedCount: number };

/**
 * The parts of the monitor a recovery attempt drives
 *
 * Implemented by the monitor over its own state; tests supply a fake.
 */
export interface RecoveryContext {
  getState(): SystemState;
  log(event: LogEvent): void;
  /** Enter a state; the coordinator only requests legal edges */
  enterState(state: SystemState): void;
  deactivateInjector(): void;
  recordRecovery(): void;
  /** Mark every unresolved fault resolved and return those records */
  resolveFaults(): FaultRecord[];
  resetGauges(): void;
}

/**
 * Recovery configuration
 * Maps to MonitorConfig properties
 */
export interface RecoveryConfig {
  /** Simulated time spent recovering (milliseconds) */
  RECOVERY_LATENCY_MS: number;
}

export interface RecoveryDependencies {
  sleep: SleepFn;
}
