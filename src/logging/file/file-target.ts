/**
 * Append-only file log target
 *
 * Holds a single file descriptor opened in append mode. All operations are
 * synchronous so a flush at shutdown completes before the process exits.
 */

import * as path from 'path';

import { LogTargetError } from '$types/errors';
import { err, ok } from '$types/result';

import type { Result } from '$types/result';
import { describeError } from '../helpers';
import type { FileSystemAPI, LogTarget } from '../types';

/**
 * Create a file log target
 *
 * @param fsApi - File system API (the fs module)
 * @param filePath - Path of the log file, created on open if missing
 * @returns Log target; nothing touches the disk until open() is called
 *
 * @example
 * ```typescript
 * const target = createFileLogTarget(fs, 'system_debug.log');
 * const opened = target.open();
 * if (!opened.ok) console.warn(opened.error.message);
 * ```
 */
export function createFileLogTarget(fsApi: FileSystemAPI, filePath: string): LogTarget {
  let fd: number | null = null;

  function open(): Result<void, LogTargetError> {
    if (fd !== null) {
      return ok(undefined);
    }

    try {
      const dir = path.dirname(filePath);
      if (dir !== '.' && dir !== '') {
        fsApi.mkdirSync(dir, { recursive: true });
      }
      fd = fsApi.openSync(filePath, 'a');
      return ok(undefined);
    } catch (e) {
      return err(new LogTargetError('Could not open log file: ' + describeError(e), filePath));
    }
  }

  function write(lines: string[]): Result<void, LogTargetError> {
    if (fd === null) {
      return err(new LogTargetError('Log file not available', filePath));
    }
    if (lines.length === 0) {
      return ok(undefined);
    }

    try {
      fsApi.writeSync(fd, lines.join('\n') + '\n');
      return ok(undefined);
    } catch (e) {
      return err(new LogTargetError('Error writing to log file: ' + describeError(e), filePath));
    }
  }

  function close(): Result<void, LogTargetError> {
    if (fd === null) {
      return ok(undefined);
    }

    const handle = fd;
    fd = null;
    try {
      fsApi.closeSync(handle);
      return ok(undefined);
    } catch (e) {
      return err(new LogTargetError('Error closing log file: ' + describeError(e), filePath));
    }
  }

  return {
    path: filePath,
    open: open,
    isOpen: function() { return fd !== null; },
    write: write,
    close: close
  };
}
