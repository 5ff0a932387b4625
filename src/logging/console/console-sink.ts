/**
 * Console output sink with rate-limited buffering
 *
 * Keeps a burst of log lines (startup, a safety shutdown touching both
 * relays) from interleaving with other process output:
 * - Buffering messages up to a configurable limit
 * - Draining one message at a time at fixed intervals
 * - Dropping messages with warning when buffer overflows
 *
 * Lines are colorized by level with chalk when enabled.
 */

import chalk from 'chalk';

import type { TimerAPI } from '$types/common';
import type { ConsoleSink, ConsoleSinkConfig, ConsoleAPI, LogLevel } from '../types';

/**
 * Style a line for its level
 * @param message - Formatted log line
 * @param level - Log level (0=DEBUG, 1=INFO, 2=WARNING, 3=CRITICAL)
 * @returns Colorized line
 */
export function colorize(message: string, level: LogLevel): string {
  switch (level) {
    case 0:
      return chalk.gray(message);
    case 2:
      return chalk.yellow(message);
    case 3:
      return chalk.bold.red(message);
    default:
      return message;
  }
}

/**
 * Create a console sink with buffering
 *
 * @param timerApi - Timer API for scheduling drain
 * @param consoleApi - Console API for output (global console object)
 * @param config - Sink configuration (bufferSize, drainInterval, colors)
 * @returns Console sink instance
 *
 * @example
 * ```typescript
 * const consoleSink = createConsoleSink(createNodeTimer(), console, {
 *   bufferSize: 50,
 *   drainInterval: 50,
 *   colors: true
 * });
 * consoleSink.initialize(function() {});
 * consoleSink.write("Hello world", LOG_LEVELS.INFO);
 * ```
 */
export function createConsoleSink(
  timerApi: TimerAPI,
  consoleApi: ConsoleAPI,
  config: ConsoleSinkConfig
): ConsoleSink {
  const buffer: string[] = [];
  let drainStarted = false;

  /**
   * Drain one message from buffer
   * Called by timer at fixed interval
   */
  function drain(): void {
    const next = buffer.shift();
    if (next !== undefined) {
      consoleApi.log(next);
    }
  }

  function startDrain(): void {
    if (!drainStarted) {
      drainStarted = true;
      timerApi.set(config.drainInterval, true, drain);
    }
  }

  /**
   * Write formatted message to buffer
   * @param formattedMessage - Pre-formatted log message
   * @param level - Level the message was logged at
   */
  function write(formattedMessage: string, level: LogLevel): void {
    const line = config.colors ? colorize(formattedMessage, level) : formattedMessage;
    if (buffer.length < config.bufferSize) {
      buffer.push(line);
    } else {
      consoleApi.warn('Console log buffer overflow, dropping message: ' + formattedMessage);
    }
  }

  function flush(): void {
    while (buffer.length > 0) {
      drain();
    }
  }

  function getBufferSize(): number {
    return buffer.length;
  }

  /**
   * Initialize the sink by starting the drain timer
   * @param callback - Called with (success, message)
   */
  function initialize(callback: (success: boolean, message: string) => void): void {
    startDrain();
    callback(true, 'Console sink initialized');
  }

  return {
    write: write,
    initialize: initialize,
    getBufferSize: getBufferSize,
    flush: flush
  };
}
