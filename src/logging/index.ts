/**
 * Logging module barrel export
 *
 * The logging system includes:
 * - Logger coordinator (createLogger)
 * - Console sink (createConsoleSink)
 * - Append-only file log target (createFileLogTarget)
 * - Pure format helpers
 */

export { formatLogMessage, describeError, SEVERITY_TAGS, SEVERITY_SHORT_TAGS } from './helpers';
export { createConsoleSink } from './console';
export { createFileLogTarget } from './file';
export { createLogger } from './logger';

export type {
  Logger,
  LoggerConfig,
  LoggerDependencies,
  SinkWithLevel,
  LogSink,
  ConsoleSinkConfig,
  ConsoleAPI,
  FileSystemAPI,
  LogTarget
} from './types';
