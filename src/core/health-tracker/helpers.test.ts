import { sampleGauge, validateHealthConfig } from './helpers';
import type { HealthConfig } from './types';

const validConfig: HealthConfig = {
  CPU_GAUGE_MIN: 10,
  CPU_GAUGE_SPAN: 40,
  MEMORY_GAUGE_MIN: 20,
  MEMORY_GAUGE_SPAN: 60,
  CPU_ALERT_PCT: 90,
  MEMORY_ALERT_PCT: 85,
  WATCHDOG_TIMEOUT_SEC: 5,
  RECOVERY_CPU_MIN: 15,
  RECOVERY_CPU_SPAN: 20,
  RECOVERY_MEMORY_MIN: 25,
  RECOVERY_MEMORY_SPAN: 25
};

describe('Health Tracker Helpers', () => {
  describe('validateHealthConfig', () => {
    it('should accept valid configuration', () => {
      expect(() => validateHealthConfig(validConfig)).not.toThrow();
    });

    it('should throw on a negative gauge span', () => {
      expect(() => validateHealthConfig({ ...validConfig, CPU_GAUGE_SPAN: -1 }))
        .toThrow('CPU_GAUGE_SPAN must be a non-negative finite number, got -1');
    });

    it('should throw on an alert threshold above 100', () => {
      expect(() => validateHealthConfig({ ...validConfig, MEMORY_ALERT_PCT: 120 }))
        .toThrow('MEMORY_ALERT_PCT must be within [0, 100], got 120');
    });

    it('should throw on a zero watchdog timeout', () => {
      expect(() => validateHealthConfig({ ...validConfig, WATCHDOG_TIMEOUT_SEC: 0 }))
        .toThrow('WATCHDOG_TIMEOUT_SEC must be positive, got 0');
    });
  });

  describe('sampleGauge', () => {
    it('should stay inside the range', () => {
      expect(sampleGauge(() => 0, 10, 40)).toBe(10);
      expect(sampleGauge(() => 0.999, 10, 40)).toBe(49);
    });

    it('should clamp to 100', () => {
      expect(sampleGauge(() => 0.5, 90, 40)).toBe(100);
    });
  });
});
