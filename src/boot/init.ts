/**
 * Monitor initialization
 */

import { createConsoleSink, createFileLogTarget, createLogger } from '@logging';
import { stateLabel } from '@core/state-machine';
import { createMonitor } from '@system/monitor';
import { validateConfig } from '@validation';

import type { MonitorConfig } from '$types/config';
import type { UnrecoverableStateError } from '$types/errors';
import type { Result } from '$types/result';
import type { ShutdownReport } from '@system/monitor';
import type { BootedSystem, InitDependencies } from './types';

/**
 * Validate configuration, wire logging and bring the monitor to running
 *
 * @param config - Complete configuration
 * @param deps - Process services
 * @returns The running system, or null when the configuration is invalid
 */
export function initialize(config: MonitorConfig, deps: InitDependencies): BootedSystem | null {
  const consoleApi = deps.consoleApi;

  // Validate configuration
  const validation = validateConfig(config);

  if (!validation.valid) {
    consoleApi.error('INIT FAIL: Invalid configuration');
    validation.errors.forEach(function(issue) {
      consoleApi.error('  [' + issue.field + ']: ' + issue.message);
    });
    return null;
  }

  validation.warnings.forEach(function(issue) {
    consoleApi.warn('  [' + issue.field + ']: ' + issue.message);
  });

  // Setup logging
  const logger = createLogger({ level: 'debug' }, {
    sinks: [{ sink: createConsoleSink(consoleApi, { colors: config.CONSOLE_COLORS }), minLevel: config.CONSOLE_LOG_LEVEL }],
    onSinkError: consoleApi.warn
  });

  const logTarget = config.LOG_FILE_PATH === null ? null : createFileLogTarget(deps.fs, config.LOG_FILE_PATH);

  const monitor = createMonitor(config, {
    timeSource: deps.timeSource,
    random: deps.random,
    sleep: deps.sleep,
    logger: logger,
    logTarget: logTarget,
    onTransition: function(from, to) {
      logger.debug('State ' + stateLabel(from) + ' -> ' + stateLabel(to));
    }
  });

  monitor.init();

  return { monitor: monitor, logger: logger };
}

/**
 * Process exit code for a shutdown result
 * @returns 1 when the system shut down in an unrecoverable state, else 0
 */
export function exitCodeFor(result: Result<ShutdownReport, UnrecoverableStateError>): number {
  return result.ok ? 0 : 1;
}
