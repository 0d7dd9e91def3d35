/**
 * Logging helper functions
 */

import type { Severity } from '$types/common';

/**
 * Operator-facing tags, one per severity
 */
export const SEVERITY_TAGS: Readonly<Record<Severity, string>> = {
  debug: 'DEBUG',
  info: 'INFO',
  warning: 'WARN',
  error: 'ERROR',
  critical: 'CRIT'
};

/**
 * Three-letter tags used in compact listings
 */
export const SEVERITY_SHORT_TAGS: Readonly<Record<Severity, string>> = {
  debug: 'DBG',
  info: 'INF',
  warning: 'WRN',
  error: 'ERR',
  critical: 'CRT'
};

/**
 * Format log message with severity tag
 *
 * @param severity - Severity of the message
 * @param msg - Message to format
 * @returns Formatted log line, e.g. "[WARN] checkHealth:42 - CPU usage critical"
 */
export function formatLogMessage(severity: Severity, msg: string): string {
  return '[' + SEVERITY_TAGS[severity] + '] ' + msg;
}

/**
 * Extract a printable message from an unknown thrown value
 * @param error - Caught value
 * @returns Error message or string form
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
