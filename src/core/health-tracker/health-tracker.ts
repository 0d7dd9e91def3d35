/**
 * Health tracker
 *
 * Scalar health metrics (uptime, fault/recovery counters, CPU/memory gauges)
 * and the loop watchdog. All functions return new state objects.
 *
 * The gauge check is the only place health itself escalates severity: a CPU
 * or memory reading above its alert threshold raises an error-level event,
 * which moves a running system into fault once appended.
 */

import { createWatchdogState, evaluateWatchdog, petWatchdog } from '@core/loop-watchdog';

import type { RandomSource } from '$types/common';
import type { LogEvent } from '@core/log-store';
import { sampleGauge } from './helpers';
import type { HealthCheckResult, HealthConfig, HealthState } from './types';

export type { HealthCheckResult, HealthConfig, HealthState } from './types';

/**
 * Create zeroed health state
 * @param nowSec - Creation time in seconds; also arms the watchdog
 * @returns Fresh health state
 */
export function createHealthState(nowSec: number): HealthState {
  return {
    startedAt: nowSec,
    lastHealthCheck: nowSec,
    uptimeSec: 0,
    sinceStartSec: 0,
    faultCount: 0,
    recoveryCount: 0,
    cpuUsagePct: 0,
    memoryUsagePct: 0,
    watchdog: createWatchdogState(nowSec)
  };
}

/**
 * Run a health check
 *
 * 1. Recompute uptime (time since the previous check) and time since start
 * 2. Sample CPU and memory gauges
 * 3. Raise error events for gauges above their thresholds
 * 4. Evaluate the watchdog (critical event once per stale window)
 *
 * @param state - Current health state
 * @param nowSec - Current time in seconds
 * @param random - Uniform source in [0, 1)
 * @param config - Gauge ranges and thresholds
 * @returns Updated state and the events to log
 */
export function checkHealth(
  state: HealthState,
  nowSec: number,
  random: RandomSource,
  config: HealthConfig
): HealthCheckResult {
  const events: LogEvent[] = [];

  const cpu = sampleGauge(random, config.CPU_GAUGE_MIN, config.CPU_GAUGE_SPAN);
  const memory = sampleGauge(random, config.MEMORY_GAUGE_MIN, config.MEMORY_GAUGE_SPAN);

  if (cpu > config.CPU_ALERT_PCT) {
    events.push({ severity: 'error', errorKind: 'system_overload', message: 'CPU usage critical', func: 'checkHealth' });
  }
  if (memory > config.MEMORY_ALERT_PCT) {
    events.push({ severity: 'error', errorKind: 'memory_corruption', message: 'Memory usage critical', func: 'checkHealth' });
  }

  const watchdog = evaluateWatchdog(state.watchdog, nowSec, config.WATCHDOG_TIMEOUT_SEC);
  if (watchdog.fired) {
    events.push({ severity: 'critical', errorKind: 'watchdog_timeout', message: 'Watchdog timeout detected', func: 'checkHealth' });
  }

  return {
    state: {
      ...state,
      uptimeSec: nowSec - state.lastHealthCheck,
      sinceStartSec: nowSec - state.startedAt,
      lastHealthCheck: nowSec,
      cpuUsagePct: cpu,
      memoryUsagePct: memory,
      watchdog: watchdog.state
    },
    events: events
  };
}

/**
 * Record a heartbeat from the control loop
 * @param state - Current health state
 * @param nowSec - Current time in seconds
 * @returns State with the watchdog petted
 */
export function feedWatchdog(state: HealthState, nowSec: number): HealthState {
  return { ...state, watchdog: petWatchdog(state.watchdog, nowSec) };
}

/**
 * Count an error-or-worse log entry
 * @param state - Current health state
 * @returns State with faultCount incremented
 */
export function recordFault(state: HealthState): HealthState {
  return { ...state, faultCount: state.faultCount + 1 };
}

/**
 * Count a recovery attempt
 * @param state - Current health state
 * @returns State with recoveryCount incremented
 */
export function recordRecovery(state: HealthState): HealthState {
  return { ...state, recoveryCount: state.recoveryCount + 1 };
}

/**
 * Reset gauges into the healthy post-recovery range
 * @param state - Current health state
 * @param random - Uniform source in [0, 1)
 * @param config - Recovery gauge ranges
 * @returns State with fresh gauges
 */
export function resetGauges(state: HealthState, random: RandomSource, config: HealthConfig): HealthState {
  return {
    ...state,
    cpuUsagePct: sampleGauge(random, config.RECOVERY_CPU_MIN, config.RECOVERY_CPU_SPAN),
    memoryUsagePct: sampleGauge(random, config.RECOVERY_MEMORY_MIN, config.RECOVERY_MEMORY_SPAN)
  };
}
