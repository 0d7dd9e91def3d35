/**
 * Type definition for fault monitor configuration
 */

import type { Severity } from './common';

/**
 * User-configurable settings
 * Everything an operator might reasonably tune for capacity, timing, alerts and output
 */
export interface MonitorUserConfig {
  // ───────── BUFFERS ─────────
  readonly LOG_CAPACITY: number;
  readonly FAULT_HISTORY_CAPACITY: number;

  // ───────── TIMING ─────────
  readonly LOOP_PERIOD_MS: number;
  readonly WATCHDOG_TIMEOUT_SEC: number;
  readonly RECOVERY_LATENCY_MS: number;

  // ───────── FAULT INJECTION ─────────
  readonly FAULT_EMIT_EVERY: number;

  // ───────── HEALTH ALERTS ─────────
  readonly CPU_ALERT_PCT: number;
  readonly MEMORY_ALERT_PCT: number;

  // ───────── SIMULATED SUBSYSTEMS ─────────
  readonly SENSOR_FAILURE_PCT: number;
  readonly SENSOR_FAILURE_STREAK: number;
  readonly SUPPLY_NOMINAL_V: number;
  readonly SUPPLY_MIN_V: number;
  readonly SUPPLY_MAX_V: number;

  // ───────── OUTPUT ─────────
  readonly CONSOLE_LOG_LEVEL: Severity;
  readonly CONSOLE_COLORS: boolean;
  /** null runs console-only */
  readonly LOG_FILE_PATH: string | null;
  readonly DEBUG_RECENT_LOGS: number;
}

/**
 * Application constants
 * Internal engine constants that should rarely change
 */
export interface MonitorAppConstants {
  // ───────── RECORD LIMITS ─────────
  readonly MESSAGE_MAX_LENGTH: number;
  readonly FUNC_MAX_LENGTH: number;
  readonly DESCRIPTION_MAX_LENGTH: number;

  // ───────── GAUGE SIMULATION ─────────
  readonly CPU_GAUGE_MIN: number;
  readonly CPU_GAUGE_SPAN: number;
  readonly MEMORY_GAUGE_MIN: number;
  readonly MEMORY_GAUGE_SPAN: number;
  readonly RECOVERY_CPU_MIN: number;
  readonly RECOVERY_CPU_SPAN: number;
  readonly RECOVERY_MEMORY_MIN: number;
  readonly RECOVERY_MEMORY_SPAN: number;
}

/**
 * Complete monitor configuration
 * Combines user config and app constants
 */
export type MonitorConfig = MonitorUserConfig & MonitorAppConstants;
