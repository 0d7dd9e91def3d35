import { createHealthState } from '@core/health-tracker';
import type { FaultRecord } from '@core/fault-history';
import type { LogEntry } from '@core/log-store';

import { buildDebugReport, formatDebugReport } from './debug-report';

function entry(severity: LogEntry['severity'], message: string): LogEntry {
  return { timestamp: 0, severity: severity, errorKind: 'none', message: message, origin: { func: 'test', line: 1 } };
}

function fault(description: string, resolved: boolean): FaultRecord {
  return { timestamp: 0, faultKind: 'comm_break', errorKind: 'communication_lost', resolved: resolved, description: description };
}

describe('debug-report', () => {
  const health = {
    ...createHealthState(100),
    uptimeSec: 12.7,
    faultCount: 2,
    recoveryCount: 1,
    cpuUsagePct: 33,
    memoryUsagePct: 41
  };

  describe('buildDebugReport', () => {
    it('should copy the health figures and strip entries down', () => {
      const report = buildDebugReport('running', health, [entry('info', 'hello')], [fault('Injected fault: comm_break', true)]);

      expect(report).toEqual({
        state: 'running',
        uptimeSec: 12.7,
        faultCount: 2,
        recoveryCount: 1,
        cpuUsagePct: 33,
        memoryUsagePct: 41,
        recentLogs: [{ severity: 'info', message: 'hello' }],
        faults: [{ resolved: true, description: 'Injected fault: comm_break' }]
      });
    });
  });

  describe('formatDebugReport', () => {
    it('should render the report lines', () => {
      const report = buildDebugReport(
        'fault',
        health,
        [entry('debug', 'a'), entry('warning', 'b'), entry('critical', 'c')],
        [fault('Injected fault: comm_break', true), fault('Injected fault: memory_leak', false)]
      );

      expect(formatDebugReport(report)).toEqual([
        '=== Debug Information ===',
        'System State: FAULT',
        'Uptime: 12 seconds',
        'Fault Count: 2',
        'Recovery Count: 1',
        'CPU Usage: 33.0%',
        'Memory Usage: 41.0%',
        '',
        'Recent Log Entries:',
        '  [DBG] a',
        '  [WRN] b',
        '  [CRT] c',
        '',
        'Fault History:',
        '  RESOLVED: Injected fault: comm_break',
        '  ACTIVE: Injected fault: memory_leak'
      ]);
    });

    it('should render empty sections', () => {
      const report = buildDebugReport('init', createHealthState(0), [], []);

      expect(formatDebugReport(report).slice(-4)).toEqual(['', 'Recent Log Entries:', '', 'Fault History:']);
    });
  });
});
