/**
 * Unit tests for configuration validator
 */

import { USER_CONFIG } from '@boot/config';
import type { MonitorUserConfig } from '$types/config';

import { validateConfig } from './validator';

function createMockConfig(overrides: Partial<MonitorUserConfig> = {}): MonitorUserConfig {
  return { ...USER_CONFIG, ...overrides };
}

function fields(issues: { field: string }[]): string[] {
  return issues.map(function(i) { return i.field; });
}

describe('validateConfig', () => {
  it('should accept the defaults without warnings', () => {
    const result = validateConfig(createMockConfig());

    expect(result).toEqual({ valid: true, errors: [], warnings: [] });
  });

  it('should reject a zero log capacity', () => {
    const result = validateConfig(createMockConfig({ LOG_CAPACITY: 0 }));

    expect(result.valid).toBe(false);
    // DEBUG_RECENT_LOGS is bounded by LOG_CAPACITY
    expect(fields(result.errors)).toEqual(['LOG_CAPACITY', 'DEBUG_RECENT_LOGS']);
  });

  it('should reject a fractional fault history capacity', () => {
    const result = validateConfig(createMockConfig({ FAULT_HISTORY_CAPACITY: 2.5 }));

    expect(result.errors[0].message).toBe('FAULT_HISTORY_CAPACITY must be an integer (got 2.5)');
  });

  it('should reject alert thresholds above 100', () => {
    const result = validateConfig(createMockConfig({ CPU_ALERT_PCT: 120 }));

    expect(fields(result.errors)).toEqual(['CPU_ALERT_PCT']);
  });

  it('should warn when the watchdog timeout is too short for the loop', () => {
    const result = validateConfig(createMockConfig({ WATCHDOG_TIMEOUT_SEC: 1, LOOP_PERIOD_MS: 500 }));

    expect(result.valid).toBe(true);
    expect(result.warnings).toEqual([{
      level: 'WARNING',
      field: 'WATCHDOG_TIMEOUT_SEC',
      message: 'WATCHDOG_TIMEOUT_SEC should cover at least 3 loop periods'
    }]);
  });

  it('should reject an inverted supply window', () => {
    const result = validateConfig(createMockConfig({ SUPPLY_MIN_V: 26, SUPPLY_MAX_V: 22 }));

    expect(fields(result.errors)).toEqual(['SUPPLY_MIN_V']);
  });

  it('should warn about a supply window narrower than the ripple', () => {
    const result = validateConfig(createMockConfig({ SUPPLY_MIN_V: 23.5 }));

    expect(result.valid).toBe(true);
    expect(fields(result.warnings)).toEqual(['SUPPLY_NOMINAL_V']);
  });

  it('should reject console levels that would hide warnings', () => {
    const result = validateConfig(createMockConfig({ CONSOLE_LOG_LEVEL: 'error' }));

    expect(result.valid).toBe(false);
    expect(result.errors).toEqual([
      { level: 'CRITICAL', field: 'CONSOLE_LOG_LEVEL', message: 'CONSOLE_LOG_LEVEL must be debug, info or warning (got error)' }
    ]);
    expect(validateConfig(createMockConfig({ CONSOLE_LOG_LEVEL: 'critical' })).valid).toBe(false);
    expect(validateConfig(createMockConfig({ CONSOLE_LOG_LEVEL: 'debug' })).valid).toBe(true);
  });

  it('should accept console-only output', () => {
    expect(validateConfig(createMockConfig({ LOG_FILE_PATH: null })).valid).toBe(true);
  });

  it('should not let the debug report ask for more entries than are kept', () => {
    const result = validateConfig(createMockConfig({ LOG_CAPACITY: 3, DEBUG_RECENT_LOGS: 5 }));

    expect(fields(result.errors)).toEqual(['DEBUG_RECENT_LOGS']);
  });
});
