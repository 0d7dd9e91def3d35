import { parseSeverity } from '$types/common';
import type { MonitorUserConfig, MonitorAppConstants, MonitorConfig } from '$types/config';

// ─────────────────────────────────────────────────────────────
// USER CONFIGURATION
//   Everything an operator might reasonably tune for capacity,
//   timing, alerts, and output.
// ─────────────────────────────────────────────────────────────

export const USER_CONFIG: Readonly<MonitorUserConfig> = {
  // LOG_CAPACITY
  //   Role: Number of log entries kept in memory; the oldest is evicted first.
  //   Critical: Integer ≥ 1.
  //   Recommended: 1000; enough for several minutes of a noisy fault.
  LOG_CAPACITY: 1000,

  // FAULT_HISTORY_CAPACITY
  //   Role: Number of injected faults remembered. Once full, new faults are not recorded.
  //   Critical: Integer ≥ 1.
  //   Recommended: 50.
  FAULT_HISTORY_CAPACITY: 50,

  // LOOP_PERIOD_MS
  //   Role: Sleep between control loop iterations in milliseconds.
  //   Critical: 10–10000 ms (error outside).
  //   Recommended: 100 ms; keeps key presses responsive.
  LOOP_PERIOD_MS: 100,

  // WATCHDOG_TIMEOUT_SEC
  //   Role: Seconds without a completed loop iteration before a watchdog timeout is logged.
  //   Critical: > 0.
  //   Recommended: 5 s; warning if not at least 3 loop periods.
  WATCHDOG_TIMEOUT_SEC: 5,

  // RECOVERY_LATENCY_MS
  //   Role: Simulated time a recovery attempt takes.
  //   Critical: ≥ 0.
  //   Recommended: 2000 ms; warning above 10000 ms as the loop is paused meanwhile.
  RECOVERY_LATENCY_MS: 2000,

  // FAULT_EMIT_EVERY
  //   Role: An active fault logs its signal on every Nth loop iteration.
  //   Critical: Integer ≥ 1.
  //   Recommended: 5; lower values flood the log.
  FAULT_EMIT_EVERY: 5,

  // CPU_ALERT_PCT
  //   Role: CPU gauge above this raises a system_overload error.
  //   Critical: 0–100.
  //   Recommended: 90.
  CPU_ALERT_PCT: 90,

  // MEMORY_ALERT_PCT
  //   Role: Memory gauge above this raises a memory_corruption error.
  //   Critical: 0–100.
  //   Recommended: 85.
  MEMORY_ALERT_PCT: 85,

  // SENSOR_FAILURE_PCT
  //   Role: Chance (%) that a simulated sensor read fails.
  //   Critical: 0–100.
  //   Recommended: 5.
  SENSOR_FAILURE_PCT: 5,

  // SENSOR_FAILURE_STREAK
  //   Role: Failed reads in a row tolerated before "Sensor failure detected" is logged.
  //   Critical: Integer ≥ 0.
  //   Recommended: 3.
  SENSOR_FAILURE_STREAK: 3,

  // SUPPLY_NOMINAL_V
  //   Role: Nominal simulated supply voltage.
  //   Critical: > 0, within [SUPPLY_MIN_V, SUPPLY_MAX_V].
  //   Recommended: 24 V.
  SUPPLY_NOMINAL_V: 24.0,

  // SUPPLY_MIN_V / SUPPLY_MAX_V
  //   Role: Acceptable supply window; readings outside log power_fluctuation.
  //   Critical: SUPPLY_MIN_V < SUPPLY_MAX_V.
  //   Recommended: 22–26 V; a window narrower than ±1 V around nominal warns constantly.
  SUPPLY_MIN_V: 22.0,
  SUPPLY_MAX_V: 26.0,

  // CONSOLE_LOG_LEVEL
  //   Role: Minimum severity shown on the operator console.
  //   Critical: One of debug, info, warning (error and critical would hide warnings).
  //   Recommended: warning.
  CONSOLE_LOG_LEVEL: 'warning',

  // CONSOLE_COLORS
  //   Role: Colour console lines by severity.
  //   Recommended: true on a terminal.
  CONSOLE_COLORS: true,

  // LOG_FILE_PATH
  //   Role: Append-only log written at shutdown; null runs console-only.
  //   Recommended: system_debug.log.
  LOG_FILE_PATH: 'system_debug.log',

  // DEBUG_RECENT_LOGS
  //   Role: Number of log entries shown in the debug report.
  //   Critical: Integer ≥ 0.
  //   Recommended: 5.
  DEBUG_RECENT_LOGS: 5
};

// ─────────────────────────────────────────────────────────────
// APPLICATION CONSTANTS
//   Internal engine settings. Change only with care.
// ─────────────────────────────────────────────────────────────

export const APP_CONSTANTS: Readonly<MonitorAppConstants> = {
  // ═══════════════════════════════════════════════════════════════
  // RECORD LIMITS
  // ═══════════════════════════════════════════════════════════════

  // Longer messages, function names and descriptions are truncated.
  MESSAGE_MAX_LENGTH: 255,
  FUNC_MAX_LENGTH: 63,
  DESCRIPTION_MAX_LENGTH: 127,

  // ═══════════════════════════════════════════════════════════════
  // GAUGE SIMULATION
  //   Gauges are MIN + floor(random * SPAN).
  // ═══════════════════════════════════════════════════════════════

  CPU_GAUGE_MIN: 10,
  CPU_GAUGE_SPAN: 40,
  MEMORY_GAUGE_MIN: 20,
  MEMORY_GAUGE_SPAN: 60,

  // Healthy range gauges are reset to after a recovery
  RECOVERY_CPU_MIN: 15,
  RECOVERY_CPU_SPAN: 20,
  RECOVERY_MEMORY_MIN: 25,
  RECOVERY_MEMORY_SPAN: 25
};

// ─────────────────────────────────────────────────────────────
// COMBINED CONFIG (DEFAULT EXPORT)
// ─────────────────────────────────────────────────────────────

const CONFIG: MonitorConfig = { ...APP_CONSTANTS, ...USER_CONFIG };

export default CONFIG;

// ─────────────────────────────────────────────────────────────
// ENVIRONMENT OVERLAY
// ─────────────────────────────────────────────────────────────

/**
 * Environment variables read by loadConfig
 * Names match the config keys, prefixed with MONITOR_
 */
export const ENV_PREFIX = 'MONITOR_';

type NumericKey = {
  [K in keyof MonitorUserConfig]: MonitorUserConfig[K] extends number ? K : never;
}[keyof MonitorUserConfig];

const NUMERIC_KEYS: readonly NumericKey[] = [
  'LOG_CAPACITY',
  'FAULT_HISTORY_CAPACITY',
  'LOOP_PERIOD_MS',
  'WATCHDOG_TIMEOUT_SEC',
  'RECOVERY_LATENCY_MS',
  'FAULT_EMIT_EVERY',
  'CPU_ALERT_PCT',
  'MEMORY_ALERT_PCT',
  'SENSOR_FAILURE_PCT',
  'SENSOR_FAILURE_STREAK',
  'SUPPLY_NOMINAL_V',
  'SUPPLY_MIN_V',
  'SUPPLY_MAX_V',
  'DEBUG_RECENT_LOGS'
];

/**
 * Result of overlaying the environment onto a configuration
 */
export interface LoadedConfig {
  config: MonitorConfig;
  /** Variables that were present but could not be parsed */
  errors: string[];
}

/**
 * Overlay MONITOR_* environment variables onto a base configuration
 *
 * Unparseable values are reported and the base value kept. An empty
 * MONITOR_LOG_FILE_PATH runs console-only.
 *
 * @param env - Environment (usually process.env after dotenv has loaded .env)
 * @param base - Configuration to start from
 * @returns Merged configuration and parse errors
 */
export function loadConfig(
  env: Readonly<Record<string, string | undefined>>,
  base: MonitorConfig = CONFIG
): LoadedConfig {
  const errors: string[] = [];
  const numeric: Partial<Record<NumericKey, number>> = {};

  for (let i = 0; i < NUMERIC_KEYS.length; i++) {
    const key = NUMERIC_KEYS[i];
    const raw = env[ENV_PREFIX + key];
    if (raw === undefined || raw.trim() === '') continue;

    const value = Number(raw);
    if (Number.isFinite(value)) {
      numeric[key] = value;
    } else {
      errors.push(ENV_PREFIX + key + ' must be a number, got "' + raw + '"');
    }
  }

  let level = base.CONSOLE_LOG_LEVEL;
  const rawLevel = env[ENV_PREFIX + 'CONSOLE_LOG_LEVEL'];
  if (rawLevel !== undefined && rawLevel.trim() !== '') {
    const parsed = parseSeverity(rawLevel);
    if (parsed === null) {
      errors.push(ENV_PREFIX + 'CONSOLE_LOG_LEVEL must be one of debug, info, warning, error, critical, got "' + rawLevel + '"');
    } else {
      level = parsed;
    }
  }

  let colors = base.CONSOLE_COLORS;
  const rawColors = env[ENV_PREFIX + 'CONSOLE_COLORS'];
  if (rawColors !== undefined && rawColors.trim() !== '') {
    const lower = rawColors.trim().toLowerCase();
    if (lower === 'true' || lower === '1') colors = true;
    else if (lower === 'false' || lower === '0') colors = false;
    else errors.push(ENV_PREFIX + 'CONSOLE_COLORS must be true or false, got "' + rawColors + '"');
  }

  let logFilePath = base.LOG_FILE_PATH;
  const rawPath = env[ENV_PREFIX + 'LOG_FILE_PATH'];
  if (rawPath !== undefined) {
    logFilePath = rawPath.trim() === '' ? null : rawPath.trim();
  }

  return {
    config: {
      ...base,
      ...numeric,
      CONSOLE_LOG_LEVEL: level,
      CONSOLE_COLORS: colors,
      LOG_FILE_PATH: logFilePath
    },
    errors: errors
  };
}
