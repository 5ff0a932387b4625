/**
 * Control loop scheduling
 *
 * Ticks every updateIntervalSec of the current configuration. The stale
 * sensor threshold is a multiple of the same setting, so "silent for two
 * ticks" holds whatever the interval is. A reload that changes the interval
 * reschedules the loop after the tick that picked it up.
 */

import type { TimerAPI, TimerHandle } from '$types/common';
import { TIME_CONSTANTS } from '@utils/constants';
import { formatDuration } from '@utils/time';

import { run } from './control';
import type { ControlLoop, Controller } from './types';

/**
 * Tick period for the controller's current configuration
 * @returns Period in milliseconds
 */
export function tickPeriodMs(controller: Controller): number {
  return controller.state.config.updateIntervalSec * TIME_CONSTANTS.MS_PER_SECOND;
}

/**
 * Create the periodic control loop
 *
 * @param controller - Controller to tick
 * @param timer - Timer API (must keep the process alive in production)
 * @returns Loop handle
 */
export function createControlLoop(controller: Controller, timer: TimerAPI): ControlLoop {
  let handle: TimerHandle | null = null;
  let periodMs = 0;

  function schedule(): void {
    const next = tickPeriodMs(controller);
    if (handle !== null) {
      if (next === periodMs) {
        return;
      }
      timer.clear(handle);
      controller.logger.info(
        'Tick period ' + formatDuration(periodMs / TIME_CONSTANTS.MS_PER_SECOND) +
        ' → ' + formatDuration(next / TIME_CONSTANTS.MS_PER_SECOND)
      );
    }
    periodMs = next;
    handle = timer.set(periodMs, true, tick);
  }

  function tick(): void {
    run(controller);
    schedule();
  }

  function start(): void {
    if (handle === null) {
      tick();
    }
  }

  function stop(): void {
    if (handle !== null) {
      timer.clear(handle);
      handle = null;
    }
  }

  function getPeriodMs(): number {
    return periodMs;
  }

  return {
    start: start,
    stop: stop,
    getPeriodMs: getPeriodMs
  };
}
