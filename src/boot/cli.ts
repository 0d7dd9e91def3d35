/**
 * Command-line options
 */

import { Command, InvalidArgumentError } from 'commander';

import { isAtLeast, parseSeverity } from '$types/common';

import type { Severity } from '$types/common';
import type { MonitorConfig } from '$types/config';
import type { CliOptions } from './types';

function parseLoopMs(value: string): number {
  const ms = Number(value);
  if (!Number.isInteger(ms) || ms <= 0) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return ms;
}

function parseLevel(value: string): Severity {
  const level = parseSeverity(value);
  if (level === null || isAtLeast(level, 'error')) {
    throw new InvalidArgumentError('Must be one of debug, info, warning.');
  }
  return level;
}

/**
 * Build the command-line program
 * @returns Commander program (not yet parsed)
 */
export function createProgram(): Command {
  return new Command()
    .name('fault-monitor')
    .description('Fault monitoring and recovery simulator')
    .option('--log-file <path>', 'Append the session log to this file at shutdown')
    .option('--no-log-file', 'Console only; write no log file')
    .option('--loop-ms <ms>', 'Control loop period in milliseconds', parseLoopMs)
    .option('--console-level <level>', 'Minimum severity shown on the console', parseLevel);
}

/**
 * Narrow parsed option values
 * @param values - program.opts()
 * @returns Typed overrides
 */
export function readCliOptions(values: Record<string, unknown>): CliOptions {
  const options: CliOptions = {};

  const logFile = values.logFile;
  if (typeof logFile === 'string' || logFile === false) options.logFile = logFile;

  const loopMs = values.loopMs;
  if (typeof loopMs === 'number') options.loopMs = loopMs;

  const level = values.consoleLevel;
  if (typeof level === 'string') {
    const parsed = parseSeverity(level);
    if (parsed !== null) options.consoleLevel = parsed;
  }

  return options;
}

/**
 * Apply command-line overrides on top of the environment-derived config
 * @param config - Configuration after loadConfig
 * @param options - Parsed overrides
 * @returns New configuration
 */
export function applyCliOptions(config: MonitorConfig, options: CliOptions): MonitorConfig {
  return {
    ...config,
    LOG_FILE_PATH: options.logFile === undefined ? config.LOG_FILE_PATH : (options.logFile === false ? null : options.logFile),
    LOOP_PERIOD_MS: options.loopMs === undefined ? config.LOOP_PERIOD_MS : options.loopMs,
    CONSOLE_LOG_LEVEL: options.consoleLevel === undefined ? config.CONSOLE_LOG_LEVEL : options.consoleLevel
  };
}
