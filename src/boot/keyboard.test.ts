import { EventEmitter } from 'node:events';

import { createCommandQueue } from '@system/control';

import { attachKeyboard } from './keyboard';
import type { KeyInput } from './types';

class FakeInput extends EventEmitter implements KeyInput {
  isTTY = true;
  rawModes: boolean[] = [];
  paused = true;

  setRawMode(mode: boolean): this {
    this.rawModes.push(mode);
    return this;
  }

  setEncoding(): this {
    return this;
  }

  resume(): this {
    this.paused = false;
    return this;
  }

  pause(): this {
    this.paused = true;
    return this;
  }
}

describe('attachKeyboard', () => {
  it('should queue each key press', () => {
    const input = new FakeInput();
    const queue = createCommandQueue();
    attachKeyboard(input, queue);

    input.emit('data', 'f');
    input.emit('data', 'dq');

    expect([queue.poll(), queue.poll(), queue.poll(), queue.poll()]).toEqual(['f', 'd', 'q', null]);
  });

  it('should turn Ctrl-C into quit', () => {
    const input = new FakeInput();
    const queue = createCommandQueue();
    attachKeyboard(input, queue);

    input.emit('data', '\u0003');

    expect(queue.poll()).toBe('q');
  });

  it('should use raw mode on a terminal and restore it on detach', () => {
    const input = new FakeInput();
    const detach = attachKeyboard(input, createCommandQueue());

    expect(input.paused).toBe(false);
    detach();

    expect(input.rawModes).toEqual([true, false]);
    expect(input.paused).toBe(true);
    expect(input.listenerCount('data')).toBe(0);
  });

  it('should skip raw mode when not a terminal', () => {
    const input = new FakeInput();
    input.isTTY = false;

    attachKeyboard(input, createCommandQueue())();

    expect(input.rawModes).toEqual([]);
  });
});
