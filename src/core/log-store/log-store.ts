/**
 * Log store
 *
 * Bounded, insertion-ordered sequence of log entries. On overflow the single
 * oldest entry is evicted before the new one is appended. Every appended
 * entry is also handed to the logger, whose console sink surfaces warning
 * and above to the operator immediately.
 */

import { truncate } from '@utils/text';

import type { ErrorKind, Severity, TimeSource } from '$types/common';
import type { Logger } from '@logging';
import { createRingBuffer, formatOperatorMessage, validateLogStoreConfig } from './helpers';
import type { LogEntry, LogOrigin, LogStore, LogStoreConfig } from './types';

export type { LogEntry, LogEvent, LogOrigin, LogStore, LogStoreConfig } from './types';

/**
 * Log store external dependencies
 */
export interface LogStoreDependencies {
  timeSource: TimeSource;
  /** Operator-facing side channel; not part of the store's state */
  logger: Logger;
}

/**
 * Create a log store
 *
 * @param config - Capacity and field limits
 * @param dependencies - Clock and operator logger
 * @returns Log store instance
 * @throws {ConfigValidationError} If configuration is invalid
 *
 * @example
 * ```typescript
 * const store = createLogStore(
 *   { capacity: 1000, messageMaxLength: 255, funcMaxLength: 63 },
 *   { timeSource: now, logger: logger }
 * );
 * store.append('warning', 'power_fluctuation', 'Power fluctuation detected', { func: 'readPower', line: 0 });
 * ```
 */
export function createLogStore(config: LogStoreConfig, dependencies: LogStoreDependencies): LogStore {
  validateLogStoreConfig(config);

  const buffer = createRingBuffer<LogEntry>(config.capacity);
  let evicted = 0;

  function append(severity: Severity, errorKind: ErrorKind, message: string, origin: LogOrigin): LogEntry {
    const entry: LogEntry = Object.freeze({
      timestamp: dependencies.timeSource(),
      severity: severity,
      errorKind: errorKind,
      message: truncate(message, config.messageMaxLength),
      origin: Object.freeze({
        func: truncate(origin.func, config.funcMaxLength),
        line: origin.line
      })
    });

    if (buffer.push(entry) !== undefined) {
      evicted++;
    }

    dependencies.logger.log(severity, formatOperatorMessage(entry));

    return entry;
  }

  function recent(n: number): LogEntry[] {
    const size = buffer.size();
    const start = n >= size ? 0 : size - Math.max(n, 0);
    const out: LogEntry[] = [];
    for (let i = start; i < size; i++) {
      const entry = buffer.at(i);
      if (entry !== undefined) out.push(entry);
    }
    return out;
  }

  return {
    append: append,
    entries: buffer.toArray,
    recent: recent,
    size: buffer.size,
    capacity: buffer.capacity,
    evictedCount: function() { return evicted; }
  };
}
