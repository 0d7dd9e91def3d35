/**
 * Unit tests for logger coordinator
 */

import { createLogger } from './logger';
import type { LogSink, SinkWithLevel } from './types';

function createMockSink(): LogSink & { write: ReturnType<typeof vi.fn> } {
  return { write: vi.fn() };
}

describe('createLogger', () => {
  describe('log level methods', () => {
    it('should format and forward each severity', () => {
      const sink = createMockSink();
      const logger = createLogger({ level: 'debug' }, { sinks: [{ sink: sink, minLevel: 'debug' }] });

      logger.debug('a');
      logger.info('b');
      logger.warning('c');
      logger.error('d');
      logger.critical('e');

      expect(sink.write.mock.calls).toEqual([
        ['[DEBUG] a', 'debug'],
        ['[INFO] b', 'info'],
        ['[WARN] c', 'warning'],
        ['[ERROR] d', 'error'],
        ['[CRIT] e', 'critical']
      ]);
    });

    it('should drop messages below the logger level', () => {
      const sink = createMockSink();
      const logger = createLogger({ level: 'warning' }, { sinks: [{ sink: sink, minLevel: 'debug' }] });

      logger.info('quiet');
      logger.warning('loud');

      expect(sink.write).toHaveBeenCalledTimes(1);
      expect(sink.write).toHaveBeenCalledWith('[WARN] loud', 'warning');
    });
  });

  describe('sink filtering', () => {
    it('should only write to sinks whose minimum level is met', () => {
      const verbose = createMockSink();
      const alerts = createMockSink();
      const sinks: SinkWithLevel[] = [
        { sink: verbose, minLevel: 'debug' },
        { sink: alerts, minLevel: 'error' }
      ];
      const logger = createLogger({ level: 'debug' }, { sinks: sinks });

      logger.warning('power');
      logger.error('actuator');

      expect(verbose.write).toHaveBeenCalledTimes(2);
      expect(alerts.write).toHaveBeenCalledTimes(1);
      expect(alerts.write).toHaveBeenCalledWith('[ERROR] actuator', 'error');
    });

    it('should keep writing to other sinks when one throws', () => {
      const broken: LogSink = {
        write: function() { throw new Error('stream closed'); }
      };
      const healthy = createMockSink();
      const onSinkError = vi.fn();
      const logger = createLogger(
        { level: 'debug' },
        { sinks: [{ sink: broken, minLevel: 'debug' }, { sink: healthy, minLevel: 'debug' }], onSinkError: onSinkError }
      );

      logger.critical('watchdog');

      expect(onSinkError).toHaveBeenCalledWith('Logger sink error: stream closed');
      expect(healthy.write).toHaveBeenCalledWith('[CRIT] watchdog', 'critical');
    });
  });

  describe('setLevel / getLevel', () => {
    it('should change filtering at runtime', () => {
      const sink = createMockSink();
      const logger = createLogger({ level: 'error' }, { sinks: [{ sink: sink, minLevel: 'debug' }] });

      expect(logger.getLevel()).toBe('error');
      logger.info('hidden');
      logger.setLevel('info');
      logger.info('shown');

      expect(logger.getLevel()).toBe('info');
      expect(sink.write).toHaveBeenCalledTimes(1);
      expect(sink.write).toHaveBeenCalledWith('[INFO] shown', 'info');
    });
  });

  describe('log', () => {
    it('should accept an explicit severity', () => {
      const sink = createMockSink();
      const logger = createLogger({ level: 'debug' }, { sinks: [{ sink: sink, minLevel: 'debug' }] });

      logger.log('warning', 'comm check');

      expect(sink.write).toHaveBeenCalledWith('[WARN] comm check', 'warning');
    });
  });
});
