/**
 * Debug report
 *
 * Builds the operator's `d` view from a health snapshot, the log store and
 * the fault history, and renders it as plain lines for the console.
 */

import { SEVERITY_SHORT_TAGS } from '@logging';
import { stateLabel } from '@core/state-machine';

import type { SystemState } from '$types/common';
import type { FaultRecord } from '@core/fault-history';
import type { HealthState } from '@core/health-tracker';
import type { LogEntry } from '@core/log-store';
import type { DebugReport } from './types';

export type { DebugReport };

const INDENT = '  ';

/**
 * Assemble a debug report
 *
 * @param state - Current system state
 * @param health - Current health state
 * @param recentLogs - Last entries of the log store, oldest first
 * @param faults - Full fault history, oldest first
 * @returns Report detached from the monitor's internals
 */
export function buildDebugReport(
  state: SystemState,
  health: HealthState,
  recentLogs: LogEntry[],
  faults: FaultRecord[]
): DebugReport {
  return {
    state: state,
    uptimeSec: health.uptimeSec,
    faultCount: health.faultCount,
    recoveryCount: health.recoveryCount,
    cpuUsagePct: health.cpuUsagePct,
    memoryUsagePct: health.memoryUsagePct,
    recentLogs: recentLogs.map(function(entry) {
      return { severity: entry.severity, message: entry.message };
    }),
    faults: faults.map(function(record) {
      return { resolved: record.resolved, description: record.description };
    })
  };
}

/**
 * Render a debug report as console lines
 *
 * @param report - Report to render
 * @returns Lines without trailing newlines
 *
 * @example
 * ```typescript
 * formatDebugReport(report).forEach(line => console.log(line));
 * // === Debug Information ===
 * // System State: RUNNING
 * // Uptime: 12 seconds
 * // ...
 * ```
 */
export function formatDebugReport(report: DebugReport): string[] {
  const lines: string[] = [
    '=== Debug Information ===',
    'System State: ' + stateLabel(report.state),
    'Uptime: ' + Math.floor(report.uptimeSec) + ' seconds',
    'Fault Count: ' + report.faultCount,
    'Recovery Count: ' + report.recoveryCount,
    'CPU Usage: ' + report.cpuUsagePct.toFixed(1) + '%',
    'Memory Usage: ' + report.memoryUsagePct.toFixed(1) + '%',
    '',
    'Recent Log Entries:'
  ];

  for (let i = 0; i < report.recentLogs.length; i++) {
    const entry = report.recentLogs[i];
    lines.push(INDENT + '[' + SEVERITY_SHORT_TAGS[entry.severity] + '] ' + entry.message);
  }

  lines.push('', 'Fault History:');
  for (let i = 0; i < report.faults.length; i++) {
    const fault = report.faults[i];
    lines.push(INDENT + (fault.resolved ? 'RESOLVED' : 'ACTIVE') + ': ' + fault.description);
  }

  return lines;
}
