/**
 * Relay helper functions
 */

import type { RelayAction } from '$types/common';
import type { ActuatorResult } from '@hardware/actuator';
import type { RelayState } from './types';

/**
 * Fresh relay state, assumed off until a plug reports otherwise
 */
export function createRelayState(): RelayState {
  return {
    knownOn: false,
    pending: false,
    pendingAction: null,
    pendingSince: null,
    lastCommandAt: null,
    lastCommandAction: null,
    inFlightToken: null,
    nextToken: 1
  };
}

/**
 * Whether a result answers the command currently in flight
 *
 * @param state - Relay bookkeeping
 * @param result - Result from the actuator channel
 * @returns True when the tokens match
 */
export function isCurrentResult(state: RelayState, result: ActuatorResult): boolean {
  return state.pending && state.inFlightToken === result.token;
}

/**
 * On/off state a successful result confirms
 */
export function confirmedState(result: ActuatorResult): boolean {
  return result.observedOn ?? result.action === 'on';
}

export function actionLabel(action: RelayAction): string {
  return action.toUpperCase();
}
