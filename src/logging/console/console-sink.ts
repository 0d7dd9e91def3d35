/**
 * Console output sink
 *
 * Writes operator-facing lines straight to the console, coloured by severity.
 * Error and critical lines go to the error stream so they survive stdout
 * redirection.
 */

import { Chalk } from 'chalk';

import type { Severity } from '$types/common';
import type { ConsoleAPI, ConsoleSinkConfig, LogSink } from '../types';

type Paint = (text: string) => string;

/**
 * Create a console sink
 *
 * @param consoleApi - Console API for output (global console object)
 * @param config - Sink configuration
 * @returns Console sink instance
 *
 * @example
 * ```typescript
 * const consoleSink = createConsoleSink(console, { colors: true });
 * consoleSink.write('[WARN] checkHealth:12 - Memory usage critical', 'warning');
 * ```
 */
export function createConsoleSink(consoleApi: ConsoleAPI, config: ConsoleSinkConfig): LogSink {
  const chalk = config.colors ? new Chalk() : new Chalk({ level: 0 });

  const paint: Record<Severity, Paint> = {
    debug: chalk.gray,
    info: chalk.cyan,
    warning: chalk.yellow,
    error: chalk.red,
    critical: chalk.bold.red
  };

  function write(formattedMessage: string, severity: Severity): void {
    const line = paint[severity](formattedMessage);
    if (severity === 'error' || severity === 'critical') {
      consoleApi.error(line);
    } else {
      consoleApi.log(line);
    }
  }

  return {
    write: write
  };
}
