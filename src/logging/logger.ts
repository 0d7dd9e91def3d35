/**
 * Main logger coordinator
 *
 * Combines filtering, formatting, and output sinks into a unified logging system.
 * The logger routes messages through filters and formatters before writing to sinks.
 */

import { isAtLeast } from '$types/common';

import type { Severity } from '$types/common';
import { formatLogMessage, describeError } from './helpers';
import type { Logger, LoggerConfig, LoggerDependencies, SinkWithLevel } from './types';

/**
 * Create a logger instance
 *
 * Each message is:
 * 1. Checked against the current level
 * 2. Formatted with a severity tag
 * 3. Written to every sink whose minimum level it meets
 *
 * @param config - Logger configuration
 * @param dependencies - Sinks and sink-error reporter
 * @returns Logger instance with log methods
 *
 * @example
 * ```typescript
 * const logger = createLogger(
 *   { level: 'info' },
 *   { sinks: [{ sink: consoleSink, minLevel: 'warning' }] }
 * );
 *
 * logger.info('System started');       // filtered by the console sink
 * logger.warning('Power fluctuation'); // printed
 * ```
 */
export function createLogger(config: LoggerConfig, dependencies: LoggerDependencies): Logger {
  let currentLevel = config.level;
  const sinks: SinkWithLevel[] = dependencies.sinks;
  const onSinkError = dependencies.onSinkError || function(message: string) {
    console.warn(message);
  };

  function log(severity: Severity, msg: string): void {
    if (!isAtLeast(severity, currentLevel)) {
      return;
    }

    const formattedMessage = formatLogMessage(severity, msg);

    for (let i = 0; i < sinks.length; i++) {
      if (!isAtLeast(severity, sinks[i].minLevel)) {
        continue;
      }

      try {
        sinks[i].sink.write(formattedMessage, severity);
      } catch (e) {
        // Sink errors must not take down the control loop
        onSinkError('Logger sink error: ' + describeError(e));
      }
    }
  }

  function setLevel(newLevel: Severity): void {
    currentLevel = newLevel;
  }

  function getLevel(): Severity {
    return currentLevel;
  }

  return {
    log: log,
    debug: function(msg: string) { log('debug', msg); },
    info: function(msg: string) { log('info', msg); },
    warning: function(msg: string) { log('warning', msg); },
    error: function(msg: string) { log('error', msg); },
    critical: function(msg: string) { log('critical', msg); },
    setLevel: setLevel,
    getLevel: getLevel
  };
}
