/**
 * Common type definitions used throughout the project
 *
 * Every enumeration is a closed string union backed by a readonly tuple, so
 * switches over them are checked for exhaustiveness and the tuples can be
 * iterated for display and random selection.
 */

// ═══════════════════════════════════════════════════════════════
// SEVERITY
// ═══════════════════════════════════════════════════════════════

export const SEVERITIES = ['debug', 'info', 'warning', 'error', 'critical'] as const;

/**
 * Ordered log importance level
 */
export type Severity = typeof SEVERITIES[number];

/**
 * Rank of each severity, used for threshold comparisons
 */
export const SEVERITY_RANK: Readonly<Record<Severity, number>> = {
  debug: 0,
  info: 1,
  warning: 2,
  error: 3,
  critical: 4
};

/**
 * Check whether a severity meets or exceeds a threshold
 * @param severity - Severity to check
 * @param threshold - Minimum severity
 * @returns True if severity >= threshold
 */
export function isAtLeast(severity: Severity, threshold: Severity): boolean {
  return SEVERITY_RANK[severity] >= SEVERITY_RANK[threshold];
}

/**
 * Narrow an arbitrary string to a Severity
 * @param value - Candidate value (case-insensitive)
 * @returns The matching severity, or null
 */
export function parseSeverity(value: string): Severity | null {
  const lower = value.trim().toLowerCase();
  for (let i = 0; i < SEVERITIES.length; i++) {
    if (SEVERITIES[i] === lower) {
      return SEVERITIES[i];
    }
  }
  return null;
}

// ═══════════════════════════════════════════════════════════════
// ERROR KINDS
// Categories of actual reported failure conditions
// ═══════════════════════════════════════════════════════════════

export const ERROR_KINDS = [
  'none',
  'sensor_failure',
  'actuator_stuck',
  'communication_lost',
  'power_fluctuation',
  'memory_corruption',
  'watchdog_timeout',
  'invalid_state',
  'file_io_error',
  'system_overload'
] as const;

export type ErrorKind = typeof ERROR_KINDS[number];

// ═══════════════════════════════════════════════════════════════
// FAULT KINDS
// Categories of injected degradation
// ═══════════════════════════════════════════════════════════════

export const INJECTABLE_FAULT_KINDS = [
  'sensor_noise',
  'actuator_fail',
  'comm_break',
  'power_spike',
  'memory_leak'
] as const;

/**
 * A fault kind the injector can activate
 */
export type InjectableFaultKind = typeof INJECTABLE_FAULT_KINDS[number];

/**
 * Fault kind including the idle marker
 */
export type FaultKind = 'none' | InjectableFaultKind;

/**
 * Error kind reported for each fault kind
 */
export const FAULT_ERROR_KIND: Readonly<Record<FaultKind, ErrorKind>> = {
  none: 'none',
  sensor_noise: 'sensor_failure',
  actuator_fail: 'actuator_stuck',
  comm_break: 'communication_lost',
  power_spike: 'power_fluctuation',
  memory_leak: 'memory_corruption'
};

// ═══════════════════════════════════════════════════════════════
// SYSTEM STATE
// ═══════════════════════════════════════════════════════════════

export const SYSTEM_STATES = ['init', 'running', 'fault', 'recovery', 'shutdown'] as const;

/**
 * Availability state of the monitored system
 */
export type SystemState = typeof SYSTEM_STATES[number];

// ═══════════════════════════════════════════════════════════════
// RUNTIME ABSTRACTIONS
// Injected so tests control time, randomness and waiting
// ═══════════════════════════════════════════════════════════════

/**
 * Returns the current time in seconds (may be fractional)
 */
export type TimeSource = () => number;

/**
 * Returns a uniformly distributed number in [0, 1)
 */
export type RandomSource = () => number;

/**
 * Resolves after the given number of milliseconds
 */
export type SleepFn = (ms: number) => Promise<void>;
