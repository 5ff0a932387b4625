/**
 * Unit tests for console sink
 */

import chalk from 'chalk';
import type { Mock } from 'vitest';

import type { TimerAPI } from '$types/common';
import { createConsoleSink, colorize } from './console-sink';
import type { ConsoleAPI } from '../types';

describe('createConsoleSink', () => {
  let timerCallback: (() => void) | null;
  let mockTimer: TimerAPI;
  let mockConsole: ConsoleAPI;
  let set: Mock<TimerAPI['set']>;
  let log: Mock<ConsoleAPI['log']>;
  let warn: Mock<ConsoleAPI['warn']>;

  beforeEach(() => {
    timerCallback = null;
    set = vi.fn<TimerAPI['set']>((_interval, _repeat, callback) => {
      timerCallback = callback;
      return setTimeout(() => undefined, 0);
    });
    mockTimer = { set: set, clear: vi.fn() };
    log = vi.fn<ConsoleAPI['log']>();
    warn = vi.fn<ConsoleAPI['warn']>();
    mockConsole = { log: log, warn: warn };
  });

  describe('write', () => {
    test('should buffer messages', () => {
      const sink = createConsoleSink(mockTimer, mockConsole, { bufferSize: 10, drainInterval: 100, colors: false });

      sink.write('message 1', 1);
      sink.write('message 2', 1);

      expect(sink.getBufferSize()).toBe(2);
      expect(log).not.toHaveBeenCalled();
    });

    test('should drop messages when buffer is full', () => {
      const sink = createConsoleSink(mockTimer, mockConsole, { bufferSize: 2, drainInterval: 100, colors: false });

      sink.write('message 1', 1);
      sink.write('message 2', 1);
      sink.write('message 3', 1);

      expect(sink.getBufferSize()).toBe(2);
      expect(warn).toHaveBeenCalledWith('Console log buffer overflow, dropping message: message 3');
    });
  });

  describe('drain', () => {
    test('should start the drain timer on initialize', () => {
      const sink = createConsoleSink(mockTimer, mockConsole, { bufferSize: 10, drainInterval: 100, colors: false });
      const callback = vi.fn();

      sink.initialize(callback);

      expect(set).toHaveBeenCalledWith(100, true, expect.any(Function));
      expect(callback).toHaveBeenCalledWith(true, 'Console sink initialized');
    });

    test('should start the timer only once', () => {
      const sink = createConsoleSink(mockTimer, mockConsole, { bufferSize: 10, drainInterval: 100, colors: false });

      sink.initialize(vi.fn());
      sink.initialize(vi.fn());

      expect(set).toHaveBeenCalledTimes(1);
    });

    test('should output one message per tick in FIFO order', () => {
      const sink = createConsoleSink(mockTimer, mockConsole, { bufferSize: 10, drainInterval: 100, colors: false });
      sink.initialize(vi.fn());
      sink.write('first', 1);
      sink.write('second', 1);

      timerCallback?.();
      expect(log).toHaveBeenCalledTimes(1);
      expect(log).toHaveBeenLastCalledWith('first');

      timerCallback?.();
      expect(log).toHaveBeenLastCalledWith('second');
      expect(sink.getBufferSize()).toBe(0);
    });

    test('should do nothing when buffer is empty', () => {
      const sink = createConsoleSink(mockTimer, mockConsole, { bufferSize: 10, drainInterval: 100, colors: false });
      sink.initialize(vi.fn());

      timerCallback?.();

      expect(log).not.toHaveBeenCalled();
    });
  });

  describe('flush', () => {
    test('should write out everything buffered', () => {
      const sink = createConsoleSink(mockTimer, mockConsole, { bufferSize: 10, drainInterval: 100, colors: false });
      sink.write('a', 1);
      sink.write('b', 2);

      sink.flush();

      expect(log.mock.calls).toEqual([['a'], ['b']]);
      expect(sink.getBufferSize()).toBe(0);
    });
  });

  describe('colors', () => {
    test('should colorize lines when enabled', () => {
      const sink = createConsoleSink(mockTimer, mockConsole, { bufferSize: 10, drainInterval: 100, colors: true });
      sink.write('careful', 2);

      sink.flush();

      expect(log).toHaveBeenCalledWith(chalk.yellow('careful'));
    });
  });
});

describe('colorize', () => {
  test('should leave INFO lines unstyled', () => {
    expect(colorize('plain', 1)).toBe('plain');
  });

  test('should style by level', () => {
    expect(colorize('d', 0)).toBe(chalk.gray('d'));
    expect(colorize('w', 2)).toBe(chalk.yellow('w'));
    expect(colorize('c', 3)).toBe(chalk.bold.red('c'));
  });
});
