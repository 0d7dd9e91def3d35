/**
 * Log store helper functions
 */

import { ConfigValidationError } from '$types/errors';
import { SEVERITY_TAGS } from '@logging';
import { isInteger } from '@utils/number';
import { formatTimestamp } from '@utils/time';

import type { LogEntry, LogStoreConfig, RingBuffer } from './types';

/**
 * Validate log store configuration
 * @throws {ConfigValidationError} If configuration is invalid
 */
export function validateLogStoreConfig(config: LogStoreConfig): void {
  if (!isInteger(config.capacity) || config.capacity < 1) {
    throw new ConfigValidationError('LOG_CAPACITY must be a positive integer, got ' + config.capacity, ['LOG_CAPACITY']);
  }
  if (!isInteger(config.messageMaxLength) || config.messageMaxLength < 1) {
    throw new ConfigValidationError('LOG_MESSAGE_MAX_LENGTH must be a positive integer, got ' + config.messageMaxLength, ['LOG_MESSAGE_MAX_LENGTH']);
  }
  if (!isInteger(config.funcMaxLength) || config.funcMaxLength < 1) {
    throw new ConfigValidationError('LOG_FUNC_MAX_LENGTH must be a positive integer, got ' + config.funcMaxLength, ['LOG_FUNC_MAX_LENGTH']);
  }
}

/**
 * Create a fixed-capacity ring buffer
 *
 * Push is O(1): when full, the slot of the oldest item is overwritten and the
 * head advances, so the remaining items keep their relative order.
 *
 * @param capacity - Maximum number of items
 * @returns Ring buffer instance
 */
export function createRingBuffer<T>(capacity: number): RingBuffer<T> {
  const slots: (T | undefined)[] = new Array<T | undefined>(capacity);
  let head = 0;
  let count = 0;

  function push(item: T): T | undefined {
    if (count < capacity) {
      slots[(head + count) % capacity] = item;
      count++;
      return undefined;
    }

    const evicted = slots[head];
    slots[head] = item;
    head = (head + 1) % capacity;
    return evicted;
  }

  function at(index: number): T | undefined {
    if (index < 0 || index >= count) {
      return undefined;
    }
    return slots[(head + index) % capacity];
  }

  function toArray(): T[] {
    const out: T[] = [];
    for (let i = 0; i < count; i++) {
      const item = slots[(head + i) % capacity];
      if (item !== undefined) out.push(item);
    }
    return out;
  }

  return {
    push: push,
    toArray: toArray,
    at: at,
    size: function() { return count; },
    capacity: function() { return capacity; }
  };
}

/**
 * Format an entry as one line of the persisted log
 *
 * @param entry - Stored entry
 * @returns e.g. "1970-01-01T00:16:40.000Z [ERROR] checkHealth:88 (system_overload) CPU usage critical"
 */
export function formatEntryLine(entry: LogEntry): string {
  return formatTimestamp(entry.timestamp) +
    ' [' + SEVERITY_TAGS[entry.severity] + '] ' +
    entry.origin.func + ':' + entry.origin.line +
    ' (' + entry.errorKind + ') ' +
    entry.message;
}

/**
 * Format an entry for the operator console (timestamp omitted)
 *
 * @param entry - Stored entry
 * @returns e.g. "checkHealth:88 - CPU usage critical"
 */
export function formatOperatorMessage(entry: LogEntry): string {
  return entry.origin.func + ':' + entry.origin.line + ' - ' + entry.message;
}
