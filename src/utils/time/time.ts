/**
 * Time utility functions
 */

/**
 * Get current Unix timestamp in seconds
 * @returns Current time in seconds since epoch (fractional)
 */
export function now(): number {
  return Date.now() / 1000;
}

/**
 * Wait for a fixed duration
 * @param ms - Duration in milliseconds
 */
export function sleep(ms: number): Promise<void> {
  return new Promise(function(resolve) {
    setTimeout(resolve, ms);
  });
}

/**
 * Format a seconds timestamp as an ISO-8601 string
 * @param sec - Timestamp in seconds since epoch
 * @returns ISO string with millisecond precision
 */
export function formatTimestamp(sec: number): string {
  return new Date(sec * 1000).toISOString();
}
