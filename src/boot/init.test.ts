/**
 * Tests for monitor initialization
 */

import CONFIG from './config';
import { exitCodeFor, initialize } from './init';
import { UnrecoverableStateError } from '$types/errors';
import { err, ok } from '$types/result';
import type { MonitorConfig } from '$types/config';
import type { Mock } from 'vitest';
import type { ConsoleAPI, FileSystemAPI } from '@logging';
import type { InitDependencies } from './types';

interface TestDeps extends InitDependencies {
  consoleApi: { log: Mock<ConsoleAPI['log']>; warn: Mock<ConsoleAPI['warn']>; error: Mock<ConsoleAPI['error']> };
  fs: { [K in keyof FileSystemAPI]: Mock<FileSystemAPI[K]> };
}

function createDeps(): TestDeps {
  return {
    consoleApi: { log: vi.fn<ConsoleAPI['log']>(), warn: vi.fn<ConsoleAPI['warn']>(), error: vi.fn<ConsoleAPI['error']>() },
    fs: {
      openSync: vi.fn<FileSystemAPI['openSync']>(() => 3),
      writeSync: vi.fn<FileSystemAPI['writeSync']>((_fd, data) => data.length),
      closeSync: vi.fn<FileSystemAPI['closeSync']>(),
      mkdirSync: vi.fn<FileSystemAPI['mkdirSync']>()
    },
    timeSource: () => 50,
    random: () => 0.5,
    sleep: async () => {}
  };
}

function createMockConfig(overrides: Partial<MonitorConfig> = {}): MonitorConfig {
  return { ...CONFIG, CONSOLE_COLORS: false, ...overrides };
}

describe('initialize', () => {
  it('should return a running monitor', () => {
    const deps = createDeps();

    const system = initialize(createMockConfig(), deps);

    expect(system).not.toBeNull();
    expect(system?.monitor.getState()).toBe('running');
    expect(deps.fs.openSync).toHaveBeenCalledWith('system_debug.log', 'a');
  });

  it('should refuse an invalid configuration', () => {
    const deps = createDeps();

    const system = initialize(createMockConfig({ LOG_CAPACITY: 0, DEBUG_RECENT_LOGS: 0 }), deps);

    expect(system).toBeNull();
    expect(deps.consoleApi.error.mock.calls).toEqual([
      ['INIT FAIL: Invalid configuration'],
      ['  [LOG_CAPACITY]: LOG_CAPACITY must be between 1 and 1000000 (got 0)']
    ]);
  });

  it('should refuse a console level that hides warnings', () => {
    const deps = createDeps();

    const system = initialize(createMockConfig({ CONSOLE_LOG_LEVEL: 'error' }), deps);

    expect(system).toBeNull();
    expect(deps.consoleApi.error.mock.calls).toEqual([
      ['INIT FAIL: Invalid configuration'],
      ['  [CONSOLE_LOG_LEVEL]: CONSOLE_LOG_LEVEL must be debug, info or warning (got error)']
    ]);
  });

  it('should print configuration warnings and continue', () => {
    const deps = createDeps();

    const system = initialize(createMockConfig({ FAULT_EMIT_EVERY: 1 }), deps);

    expect(system).not.toBeNull();
    expect(deps.consoleApi.warn).toHaveBeenCalledWith('  [FAULT_EMIT_EVERY]: FAULT_EMIT_EVERY is outside recommended range 2-100 (got 1)');
  });

  it('should run console-only without a log path', () => {
    const deps = createDeps();

    initialize(createMockConfig({ LOG_FILE_PATH: null }), deps);

    expect(deps.fs.openSync).not.toHaveBeenCalled();
  });

  it('should surface warnings on the console at the configured level', () => {
    const deps = createDeps();
    const system = initialize(createMockConfig({ LOG_FILE_PATH: null }), deps);

    system?.monitor.injectFault('comm_break');

    expect(deps.consoleApi.log).toHaveBeenCalledWith('[WARN] injectFault:0 - Fault injection activated: comm_break');
  });
});

describe('exitCodeFor', () => {
  it('should map results to exit codes', () => {
    expect(exitCodeFor(ok({ flushedEntries: 0, unresolvedFaults: 0, evictedEntries: 0, droppedFaults: 0, alreadyShutdown: false }))).toBe(0);
    expect(exitCodeFor(err(new UnrecoverableStateError('x', 'not FAULT', 'fault')))).toBe(1);
  });
});
