/**
 * Control module type definitions
 */

import type { RandomSource, SleepFn } from '$types/common';
import type { SensorConfig, SensorState } from '@hardware/sensors';
import type { PowerConfig } from '@hardware/power';
import type { Monitor } from '@system/monitor';

/**
 * Operator commands
 */
export type ParsedCommand =
  | { kind: 'inject' }
  | { kind: 'recover' }
  | { kind: 'debug' }
  | { kind: 'quit' }
  | { kind: 'unknown'; input: string };

/**
 * Non-blocking FIFO of raw operator input
 */
export interface CommandQueue {
  push(input: string): void;
  /** Oldest pending input, or null when none is waiting */
  poll(): string | null;
  size(): number;
}

/**
 * Loop configuration
 * Maps to MonitorConfig properties
 */
export interface ControlConfig extends SensorConfig, PowerConfig {
  LOOP_PERIOD_MS: number;
}

/**
 * Everything the loop drives or reads
 */
export interface Controller {
  monitor: Monitor;
  commands: CommandQueue;
  random: RandomSource;
  sleep: SleepFn;
  /** Operator console output (debug reports, command help) */
  print(line: string): void;
  config: ControlConfig;
}

/**
 * State carried between iterations
 */
export interface LoopState {
  /** Cleared by the quit command; checked at the top of each iteration */
  running: boolean;
  iterations: number;
  sensor: SensorState;
}
