/**
 * Logging type definitions
 *
 * Types for the logging system including:
 * - Logger interface and configuration
 * - Sink interfaces (console)
 * - Append-only file log target
 */

import type { Severity } from '$types/common';
import type { Result } from '$types/result';
import type { LogTargetError } from '$types/errors';

// ═══════════════════════════════════════════════════════════════
// LOGGER TYPES
// Core logger interface and configuration
// ═══════════════════════════════════════════════════════════════

/**
 * Main logger interface
 * Provides leveled logging methods and runtime configuration
 */
export interface Logger {
  /** Log at specified severity */
  log(severity: Severity, msg: string): void;
  debug(msg: string): void;
  info(msg: string): void;
  warning(msg: string): void;
  error(msg: string): void;
  critical(msg: string): void;
  /** Update minimum severity at runtime */
  setLevel(newLevel: Severity): void;
  getLevel(): Severity;
}

/**
 * Logger configuration
 */
export interface LoggerConfig {
  /** Messages below this severity are discarded before reaching any sink */
  level: Severity;
}

/**
 * Sink with its minimum severity
 * Logger filters messages before sending to each sink
 */
export interface SinkWithLevel {
  sink: LogSink;
  minLevel: Severity;
}

/**
 * Logger external dependencies
 */
export interface LoggerDependencies {
  sinks: SinkWithLevel[];
  /** Receives sink failures; defaults to console.warn */
  onSinkError?: (message: string) => void;
}

// ═══════════════════════════════════════════════════════════════
// SINK TYPES
// ═══════════════════════════════════════════════════════════════

/**
 * Base sink interface
 * Level filtering happens in the logger before write() is called
 */
export interface LogSink {
  write(formattedMessage: string, severity: Severity): void;
}

/**
 * Console sink configuration
 */
export interface ConsoleSinkConfig {
  /** Colour lines by severity */
  colors: boolean;
}

/**
 * Console API interface
 * Abstraction over global console for testability
 */
export interface ConsoleAPI {
  log(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

// ═══════════════════════════════════════════════════════════════
// FILE TARGET TYPES
// ═══════════════════════════════════════════════════════════════

/**
 * Subset of the fs module used by the file log target
 */
export interface FileSystemAPI {
  openSync(path: string, flags: string): number;
  writeSync(fd: number, data: string): number;
  closeSync(fd: number): void;
  mkdirSync(path: string, options: { recursive: true }): unknown;
}

/**
 * Append-only text log target
 */
export interface LogTarget {
  /** Path of the underlying file */
  readonly path: string;
  /** Open in append mode (idempotent) */
  open(): Result<void, LogTargetError>;
  isOpen(): boolean;
  /** Append lines, each terminated by a newline */
  write(lines: string[]): Result<void, LogTargetError>;
  /** Close the handle (idempotent) */
  close(): Result<void, LogTargetError>;
}
