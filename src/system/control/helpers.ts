/**
 * Control loop helpers
 */

import type { CommandQueue, ParsedCommand } from './types';

export const UNKNOWN_COMMAND_MESSAGE = 'Unknown command. Use: f, r, d, q';

/**
 * Parse one unit of operator input
 *
 * @param input - Raw key or line
 * @returns Parsed command, or null for blank input
 */
export function parseCommand(input: string): ParsedCommand | null {
  const key = input.trim().toLowerCase();
  switch (key) {
    case '':
      return null;
    case 'f':
      return { kind: 'inject' };
    case 'r':
      return { kind: 'recover' };
    case 'd':
      return { kind: 'debug' };
    case 'q':
      return { kind: 'quit' };
    default:
      return { kind: 'unknown', input: input };
  }
}

/**
 * Create an unbounded command queue
 * @returns Empty queue
 */
export function createCommandQueue(): CommandQueue {
  const pending: string[] = [];
  return {
    push: function(input: string) { pending.push(input); },
    poll: function() {
      const next = pending.shift();
      return next === undefined ? null : next;
    },
    size: function() { return pending.length; }
  };
}
