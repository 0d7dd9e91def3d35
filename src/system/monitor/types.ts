/**
 * Monitor type definitions
 */

import type {
  InjectableFaultKind,
  RandomSource,
  SleepFn,
  SystemState,
  TimeSource
} from '$types/common';
import type { MonitorConfig } from '$types/config';
import type { UnrecoverableStateError } from '$types/errors';
import type { Result } from '$types/result';
import type { FaultRecord } from '@core/fault-history';
import type { LogEntry, LogEvent } from '@core/log-store';
import type { DebugReport } from '@features/debug-report';
import type { RecoveryOutcome } from '@features/recovery';
import type { Logger, LogTarget } from '@logging';

// ═══════════════════════════════════════════════════════════════
// SNAPSHOTS
// ═══════════════════════════════════════════════════════════════

/**
 * Read-only view of health and availability
 */
export interface HealthSnapshot {
  state: SystemState;
  /** Seconds between the last two health checks */
  uptimeSec: number;
  /** Seconds since the monitor was created, as of the last check */
  sinceStartSec: number;
  faultCount: number;
  recoveryCount: number;
  cpuUsagePct: number;
  memoryUsagePct: number;
  lastHealthCheck: number;
}

/**
 * Summary of a completed shutdown
 */
export interface ShutdownReport {
  /** Entries written to the log target (0 when console-only or the write failed) */
  flushedEntries: number;
  /** Fault records still unresolved at shutdown */
  unresolvedFaults: number;
  /** Log entries lost to ring-buffer eviction during the session */
  evictedEntries: number;
  /** Injected faults not recorded because the history was full */
  droppedFaults: number;
  /** True when the monitor had already shut down and nothing was done */
  alreadyShutdown: boolean;
}

/**
 * Outcome of a fault injection request
 */
export interface InjectionOutcome {
  /** False when the monitor has shut down */
  accepted: boolean;
  /** The stored record, null when refused or the history is full */
  record: FaultRecord | null;
}

// ═══════════════════════════════════════════════════════════════
// MONITOR
// ═══════════════════════════════════════════════════════════════

/**
 * Monitor external dependencies
 */
export interface MonitorDependencies {
  timeSource: TimeSource;
  random: RandomSource;
  sleep: SleepFn;
  /** Operator console; every stored entry is forwarded here */
  logger: Logger;
  /** Append-only file; null runs console-only */
  logTarget: LogTarget | null;
  /** Called after every state change */
  onTransition?: (from: SystemState, to: SystemState) => void;
}

/**
 * The fault monitor aggregate
 */
export interface Monitor {
  getState(): SystemState;
  /** Open the log target and move init -> running */
  init(): void;
  /** Flush, close, check for unresolved faults and move to shutdown */
  shutdown(): Result<ShutdownReport, UnrecoverableStateError>;
  /** Store an entry; error and above counts a fault and fails a running system */
  log(event: LogEvent): LogEntry;
  injectFault(kind: InjectableFaultKind): InjectionOutcome;
  /** Advance the injector; returns the entry it logged, if any */
  tickInjector(): LogEntry | null;
  checkHealth(): HealthSnapshot;
  petWatchdog(): void;
  attemptRecovery(): Promise<RecoveryOutcome>;
  assertState(expected: SystemState): Result<void, UnrecoverableStateError>;
  getHealth(): HealthSnapshot;
  getLogs(): LogEntry[];
  getFaultHistory(): FaultRecord[];
  debugReport(): DebugReport;
}

export type { MonitorConfig };
