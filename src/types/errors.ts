/**
 * Global error types for the fault monitor
 */

import type { ErrorKind, SystemState } from './common';

/**
 * Base validation error for configuration checks
 */
export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

/**
 * Error thrown when the assembled configuration fails validation
 */
export class ConfigValidationError extends ValidationError {
  readonly fields: string[];

  constructor(message: string, fields: string[]) {
    super(message);
    this.name = 'ConfigValidationError';
    this.fields = fields;
  }
}

/**
 * Base class for runtime monitor failures
 * Every monitor error carries the error kind it is reported under
 */
export class MonitorError extends Error {
  readonly kind: ErrorKind;

  constructor(kind: ErrorKind, message: string) {
    super(message);
    this.name = 'MonitorError';
    this.kind = kind;
  }
}

/**
 * A requested state transition is not an edge of the state graph
 */
export class StateTransitionError extends MonitorError {
  readonly from: SystemState;
  readonly to: SystemState;

  constructor(from: SystemState, to: SystemState) {
    super('invalid_state', 'Illegal transition ' + from + ' -> ' + to);
    this.name = 'StateTransitionError';
    this.from = from;
    this.to = to;
  }
}

/**
 * The state machine's own invariant no longer holds
 *
 * This is the only fatal condition. It is returned rather than thrown so the
 * process boundary decides how to terminate.
 */
export class UnrecoverableStateError extends MonitorError {
  readonly expected: string;
  readonly actual: SystemState;

  constructor(message: string, expected: string, actual: SystemState) {
    super('invalid_state', message);
    this.name = 'UnrecoverableStateError';
    this.expected = expected;
    this.actual = actual;
  }
}

/**
 * The append-only log target could not be opened, written or closed
 */
export class LogTargetError extends MonitorError {
  readonly path: string;

  constructor(message: string, path: string) {
    super('file_io_error', message);
    this.name = 'LogTargetError';
    this.path = path;
  }
}
