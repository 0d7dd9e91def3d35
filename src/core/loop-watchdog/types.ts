/**
 * Loop watchdog type definitions
 */

/**
 * Watchdog state
 */
export interface WatchdogState {
  /** Timestamp (seconds) of last heartbeat */
  lastWatchdogPet: number;
  /** Stale window that last produced a timeout report (0 = none since the last pet) */
  lastFiredWindow: number;
}

/**
 * Result of evaluating the watchdog at a health check
 */
export interface WatchdogEvaluation {
  state: WatchdogState;
  /** True exactly once per stale window */
  fired: boolean;
  /** Seconds since the last pet */
  staleSec: number;
}
