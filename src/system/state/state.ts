/**
 * Controller state initialization
 */

import type { UserConfig } from '$types/config';
import { createEmptyBaselines } from '@core/swapped-plugs';
import type { ControllerState } from './types';

/**
 * Create the initial controller state
 *
 * @param t - Startup timestamp in seconds
 * @param config - Configuration loaded at startup
 * @returns Fresh state
 */
export function createInitialState(t: number, config: UserConfig): ControllerState {
  return {
    startTime: t,
    lastTickAt: null,
    tickCount: 0,

    config: config,
    configWarnings: '',

    lastTemperature: null,
    lastReadingAt: null,
    sensorActive: true,

    status: null,

    relayBaselines: createEmptyBaselines(),

    consecutiveErrors: 0,
    lastError: null,
    tickFailed: false
  };
}
