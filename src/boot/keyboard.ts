/**
 * Non-blocking operator input
 *
 * Puts a terminal into raw mode so single key presses arrive without Enter
 * and queues every character for the control loop to poll.
 */

import type { CommandQueue } from '@system/control';
import type { KeyInput } from './types';

const CTRL_C = '\u0003';

/**
 * Start queueing key presses
 *
 * Ctrl-C is queued as 'q' so the loop shuts down cleanly.
 *
 * @param input - Usually process.stdin
 * @param queue - Queue polled by the control loop
 * @returns Detach function restoring the terminal
 */
export function attachKeyboard(input: KeyInput, queue: CommandQueue): () => void {
  const raw = input.isTTY === true && input.setRawMode !== undefined;

  function onData(chunk: string): void {
    for (const ch of chunk) {
      queue.push(ch === CTRL_C ? 'q' : ch);
    }
  }

  if (raw && input.setRawMode) input.setRawMode(true);
  input.setEncoding('utf8');
  input.on('data', onData);
  input.resume();

  return function detach() {
    input.off('data', onData);
    if (raw && input.setRawMode) input.setRawMode(false);
    input.pause();
  };
}
