/**
 * Unit tests for the append-only file log target
 */

import { createFileLogTarget } from './file-target';
import type { FileSystemAPI } from '../types';

interface FakeFs extends FileSystemAPI {
  files: Map<string, string>;
  opened: Map<number, string>;
  closed: number[];
  failOpen: boolean;
  failWrite: boolean;
}

function createFakeFs(): FakeFs {
  let nextFd = 10;
  const fake: FakeFs = {
    files: new Map(),
    opened: new Map(),
    closed: [],
    failOpen: false,
    failWrite: false,
    openSync: function(path: string, flags: string) {
      if (fake.failOpen) throw new Error('EACCES: permission denied');
      expect(flags).toBe('a');
      const fd = nextFd++;
      fake.opened.set(fd, path);
      if (!fake.files.has(path)) fake.files.set(path, '');
      return fd;
    },
    writeSync: function(fd: number, data: string) {
      if (fake.failWrite) throw new Error('ENOSPC: no space left on device');
      const path = fake.opened.get(fd);
      if (path === undefined) throw new Error('EBADF');
      fake.files.set(path, (fake.files.get(path) || '') + data);
      return data.length;
    },
    closeSync: function(fd: number) {
      fake.closed.push(fd);
      fake.opened.delete(fd);
    },
    mkdirSync: vi.fn()
  };
  return fake;
}

describe('createFileLogTarget', () => {
  describe('open', () => {
    it('should open the file in append mode', () => {
      const fs = createFakeFs();
      const target = createFileLogTarget(fs, 'system_debug.log');

      const result = target.open();

      expect(result.ok).toBe(true);
      expect(target.isOpen()).toBe(true);
      expect(fs.opened.get(10)).toBe('system_debug.log');
      expect(fs.mkdirSync).not.toHaveBeenCalled();
    });

    it('should create the parent directory for nested paths', () => {
      const fs = createFakeFs();
      const target = createFileLogTarget(fs, 'logs/monitor/system_debug.log');

      target.open();

      expect(fs.mkdirSync).toHaveBeenCalledWith('logs/monitor', { recursive: true });
    });

    it('should be idempotent', () => {
      const fs = createFakeFs();
      const target = createFileLogTarget(fs, 'a.log');

      target.open();
      target.open();

      expect(fs.opened.size).toBe(1);
    });

    it('should report open failures as a log target error', () => {
      const fs = createFakeFs();
      fs.failOpen = true;
      const target = createFileLogTarget(fs, 'a.log');

      const result = target.open();

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.message).toBe('Could not open log file: EACCES: permission denied');
        expect(result.error.kind).toBe('file_io_error');
        expect(result.error.path).toBe('a.log');
      }
      expect(target.isOpen()).toBe(false);
    });
  });

  describe('write', () => {
    it('should append newline-terminated lines', () => {
      const fs = createFakeFs();
      const target = createFileLogTarget(fs, 'a.log');
      target.open();

      target.write(['first', 'second']);
      target.write(['third']);

      expect(fs.files.get('a.log')).toBe('first\nsecond\nthird\n');
    });

    it('should append to existing content', () => {
      const fs = createFakeFs();
      fs.files.set('a.log', 'previous session\n');
      const target = createFileLogTarget(fs, 'a.log');
      target.open();

      target.write(['next']);

      expect(fs.files.get('a.log')).toBe('previous session\nnext\n');
    });

    it('should do nothing for an empty batch', () => {
      const fs = createFakeFs();
      const target = createFileLogTarget(fs, 'a.log');
      target.open();

      expect(target.write([]).ok).toBe(true);
      expect(fs.files.get('a.log')).toBe('');
    });

    it('should fail when the file is not open', () => {
      const target = createFileLogTarget(createFakeFs(), 'a.log');

      const result = target.write(['x']);

      expect(result.ok).toBe(false);
      if (!result.ok) expect(result.error.message).toBe('Log file not available');
    });

    it('should report write failures', () => {
      const fs = createFakeFs();
      const target = createFileLogTarget(fs, 'a.log');
      target.open();
      fs.failWrite = true;

      const result = target.write(['x']);

      expect(result.ok).toBe(false);
      if (!result.ok) expect(result.error.message).toBe('Error writing to log file: ENOSPC: no space left on device');
    });
  });

  describe('close', () => {
    it('should close the descriptor once', () => {
      const fs = createFakeFs();
      const target = createFileLogTarget(fs, 'a.log');
      target.open();

      expect(target.close().ok).toBe(true);
      expect(target.close().ok).toBe(true);

      expect(fs.closed).toEqual([10]);
      expect(target.isOpen()).toBe(false);
    });
  });
});
