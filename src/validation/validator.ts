import { isAtLeast } from '$types/common';

import {
  addError,
  addWarning,
  validateBoolean,
  validateIntegerRange,
  validateNumberRange,
  validatePath,
  validateSeverity
} from './helpers';

import type { MonitorUserConfig } from '$types/config';
import type { ValidationIssue, ValidationResult } from './types';

/**
 * Validate the user configuration
 *
 * @param config - User configuration (after environment and CLI overrides)
 * @returns Findings; valid is false when any critical error was found
 */
export function validateConfig(config: MonitorUserConfig): ValidationResult {
  const errors: ValidationIssue[] = [];
  const warnings: ValidationIssue[] = [];

  // Buffers
  validateIntegerRange(config.LOG_CAPACITY, 'LOG_CAPACITY', 1, 1000000, errors, warnings, 100, 10000);
  validateIntegerRange(config.FAULT_HISTORY_CAPACITY, 'FAULT_HISTORY_CAPACITY', 1, 100000, errors, warnings, 10, 1000);

  // Timing
  validateIntegerRange(config.LOOP_PERIOD_MS, 'LOOP_PERIOD_MS', 10, 10000, errors, warnings, 50, 1000);
  validateNumberRange(config.WATCHDOG_TIMEOUT_SEC, 'WATCHDOG_TIMEOUT_SEC', 0.001, 3600, errors, warnings, 1, 60);
  validateIntegerRange(config.RECOVERY_LATENCY_MS, 'RECOVERY_LATENCY_MS', 0, 600000, errors, warnings, 0, 10000);

  if (errors.length === 0 && config.WATCHDOG_TIMEOUT_SEC * 1000 < config.LOOP_PERIOD_MS * 3) {
    addWarning(warnings, 'WATCHDOG_TIMEOUT_SEC', 'WATCHDOG_TIMEOUT_SEC should cover at least 3 loop periods');
  }

  // Fault injection
  validateIntegerRange(config.FAULT_EMIT_EVERY, 'FAULT_EMIT_EVERY', 1, 10000, errors, warnings, 2, 100);

  // Health alerts
  validateNumberRange(config.CPU_ALERT_PCT, 'CPU_ALERT_PCT', 0, 100, errors, warnings, 50, 99);
  validateNumberRange(config.MEMORY_ALERT_PCT, 'MEMORY_ALERT_PCT', 0, 100, errors, warnings, 50, 99);

  // Simulated subsystems
  validateNumberRange(config.SENSOR_FAILURE_PCT, 'SENSOR_FAILURE_PCT', 0, 100, errors, warnings, 0, 20);
  validateIntegerRange(config.SENSOR_FAILURE_STREAK, 'SENSOR_FAILURE_STREAK', 0, 1000, errors, warnings);
  validateNumberRange(config.SUPPLY_NOMINAL_V, 'SUPPLY_NOMINAL_V', 0.001, 1000, errors, warnings);
  validateNumberRange(config.SUPPLY_MIN_V, 'SUPPLY_MIN_V', 0, 1000, errors, warnings);
  validateNumberRange(config.SUPPLY_MAX_V, 'SUPPLY_MAX_V', 0, 1000, errors, warnings);

  if (config.SUPPLY_MIN_V >= config.SUPPLY_MAX_V) {
    addError(errors, 'SUPPLY_MIN_V', 'SUPPLY_MIN_V must be below SUPPLY_MAX_V');
  } else if (config.SUPPLY_NOMINAL_V - 1 < config.SUPPLY_MIN_V || config.SUPPLY_NOMINAL_V + 1 > config.SUPPLY_MAX_V) {
    addWarning(warnings, 'SUPPLY_NOMINAL_V', 'Supply window is narrower than nominal ±1 V; power warnings will be frequent');
  }

  // Output
  validateSeverity(config.CONSOLE_LOG_LEVEL, 'CONSOLE_LOG_LEVEL', errors);
  // Warnings must always reach the console
  if (isAtLeast(config.CONSOLE_LOG_LEVEL, 'error')) {
    addError(errors, 'CONSOLE_LOG_LEVEL', `CONSOLE_LOG_LEVEL must be debug, info or warning (got ${config.CONSOLE_LOG_LEVEL})`);
  }
  validateBoolean(config.CONSOLE_COLORS, 'CONSOLE_COLORS', errors);
  validatePath(config.LOG_FILE_PATH, 'LOG_FILE_PATH', errors);
  validateIntegerRange(config.DEBUG_RECENT_LOGS, 'DEBUG_RECENT_LOGS', 0, config.LOG_CAPACITY, errors, warnings, 1, 50);

  return {
    valid: errors.length === 0,
    errors,
    warnings
  };
}
