/**
 * Log store type definitions
 */

import type { ErrorKind, Severity } from '$types/common';

/**
 * Where a log entry was raised
 */
export interface LogOrigin {
  /** Function name of the reporting call site */
  func: string;
  /** Source line of the reporting call site (0 when unknown) */
  line: number;
}

/**
 * Immutable log record held by the store
 */
export interface LogEntry {
  /** Seconds since epoch */
  readonly timestamp: number;
  readonly severity: Severity;
  readonly errorKind: ErrorKind;
  readonly message: string;
  readonly origin: Readonly<LogOrigin>;
}

/**
 * A log request produced by a component before it is timestamped and stored
 */
export interface LogEvent {
  severity: Severity;
  errorKind: ErrorKind;
  message: string;
  /** Name of the reporting function */
  func: string;
}

/**
 * Log store configuration
 */
export interface LogStoreConfig {
  /** Maximum number of entries kept */
  capacity: number;
  /** Maximum message length in characters */
  messageMaxLength: number;
  /** Maximum origin function-name length in characters */
  funcMaxLength: number;
}

/**
 * Bounded, insertion-ordered log buffer with oldest-entry eviction
 */
export interface LogStore {
  /** Append an entry stamped with the current time, evicting the oldest when full */
  append(severity: Severity, errorKind: ErrorKind, message: string, origin: LogOrigin): LogEntry;
  /** All entries, oldest first */
  entries(): LogEntry[];
  /** The last n entries, oldest first */
  recent(n: number): LogEntry[];
  size(): number;
  capacity(): number;
  /** Number of entries evicted since creation */
  evictedCount(): number;
}

/**
 * Fixed-capacity ring buffer
 */
export interface RingBuffer<T> {
  /** Push an item; returns the evicted item when the buffer was full */
  push(item: T): T | undefined;
  toArray(): T[];
  /** Item at logical index (0 = oldest) */
  at(index: number): T | undefined;
  size(): number;
  capacity(): number;
}
