/**
 * Node timer adapter
 *
 * Wraps setTimeout/setInterval behind the TimerAPI used by the log sinks and
 * the control loop so tests can capture callbacks. Timers are unref'd unless
 * keepAlive is set: a pending log drain or Slack retry never keeps the
 * process alive on its own, the control loop does.
 */

import type { TimerAPI, TimerHandle } from '$types/common';

export interface NodeTimerOptions {
  /** Keep the process running while a timer is pending */
  keepAlive?: boolean;
}

/**
 * Create a TimerAPI backed by Node's timers
 * @param options - Timer options
 * @returns Timer API instance
 */
export function createNodeTimer(options: NodeTimerOptions = {}): TimerAPI {
  const keepAlive = options.keepAlive === true;

  return {
    set: function(intervalMs: number, repeat: boolean, callback: () => void): TimerHandle {
      const handle = repeat ? setInterval(callback, intervalMs) : setTimeout(callback, intervalMs);
      if (!keepAlive) {
        handle.unref();
      }
      return handle;
    },
    clear: function(handle: TimerHandle): void {
      clearTimeout(handle);
    },
  };
}
