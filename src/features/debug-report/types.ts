/**
 * Debug report types
 */

import type { Severity, SystemState } from '$types/common';

/**
 * Point-in-time view of the monitor for operators
 */
export interface DebugReport {
  state: SystemState;
  uptimeSec: number;
  faultCount: number;
  recoveryCount: number;
  cpuUsagePct: number;
  memoryUsagePct: number;
  /** Most recent log entries, oldest first */
  recentLogs: { severity: Severity; message: string }[];
  /** Whole fault history, oldest first */
  faults: { resolved: boolean; description: string }[];
}
