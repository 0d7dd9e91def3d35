/**
 * Health tracker type definitions
 */

import type { WatchdogState } from '@core/loop-watchdog';
import type { LogEvent } from '@core/log-store';

/**
 * Scalar health metrics plus the watchdog
 */
export interface HealthState {
  /** Time (seconds) the tracker was created */
  startedAt: number;
  /** Time (seconds) of the last health check */
  lastHealthCheck: number;
  /** Seconds between the last two health checks */
  uptimeSec: number;
  /** Seconds since startedAt, as of the last check */
  sinceStartSec: number;
  /** Appended entries with severity >= error */
  faultCount: number;
  /** Completed recovery attempts */
  recoveryCount: number;
  /** Always within [0, 100] */
  cpuUsagePct: number;
  /** Always within [0, 100] */
  memoryUsagePct: number;
  watchdog: WatchdogState;
}

/**
 * Gauge ranges and alert thresholds
 */
export interface HealthConfig {
  CPU_GAUGE_MIN: number;
  CPU_GAUGE_SPAN: number;
  MEMORY_GAUGE_MIN: number;
  MEMORY_GAUGE_SPAN: number;
  /** CPU above this raises system_overload */
  CPU_ALERT_PCT: number;
  /** Memory above this raises memory_corruption */
  MEMORY_ALERT_PCT: number;
  WATCHDOG_TIMEOUT_SEC: number;
  RECOVERY_CPU_MIN: number;
  RECOVERY_CPU_SPAN: number;
  RECOVERY_MEMORY_MIN: number;
  RECOVERY_MEMORY_SPAN: number;
}

/**
 * Outcome of a health check
 */
export interface HealthCheckResult {
  state: HealthState;
  /** Log requests raised by the check, in order */
  events: LogEvent[];
}
