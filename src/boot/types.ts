/**
 * Boot type definitions
 */

import type { RandomSource, Severity, SleepFn, TimeSource } from '$types/common';
import type { ConsoleAPI, FileSystemAPI, Logger } from '@logging';
import type { Monitor } from '@system/monitor';

/**
 * Process-level services handed to initialize()
 */
export interface InitDependencies {
  consoleApi: ConsoleAPI;
  fs: FileSystemAPI;
  timeSource: TimeSource;
  random: RandomSource;
  sleep: SleepFn;
}

/**
 * A monitor ready for the control loop
 */
export interface BootedSystem {
  monitor: Monitor;
  logger: Logger;
}

/**
 * Command-line overrides (undefined leaves the configured value)
 */
export interface CliOptions {
  /** A path, false for --no-log-file */
  logFile?: string | false;
  loopMs?: number;
  consoleLevel?: Severity;
}

/**
 * Minimal readable the keyboard reader needs (process.stdin satisfies it)
 */
export interface KeyInput {
  isTTY?: boolean;
  setRawMode?(mode: boolean): unknown;
  setEncoding(encoding: BufferEncoding): unknown;
  on(event: 'data', listener: (chunk: string) => void): unknown;
  off(event: 'data', listener: (chunk: string) => void): unknown;
  resume(): unknown;
  pause(): unknown;
}
