/**
 * Threshold policy helper functions
 */

import { CONTROL_STATUS } from '$types/common';
import type { ControlStatus, DesiredAction, RelayKnownStates } from '$types/common';
import type { RelayDecision } from './types';

/**
 * Heating: on at or below the low limit, off at or above the high limit
 *
 * The "on" test runs first, so an inverted band (low > high) still heats
 * at temperatures under the low limit.
 *
 * @param temperature - Current temperature
 * @param lowLimit - Low limit
 * @param highLimit - High limit
 * @returns Desired heating action
 */
export function decideHeating(temperature: number, lowLimit: number, highLimit: number): DesiredAction {
  if (temperature <= lowLimit) return 'on';
  if (temperature >= highLimit) return 'off';
  return 'unchanged';
}

/**
 * Cooling: on at or above the high limit, off at or below the low limit
 *
 * @param temperature - Current temperature
 * @param lowLimit - Low limit
 * @param highLimit - High limit
 * @returns Desired cooling action
 */
export function decideCooling(temperature: number, lowLimit: number, highLimit: number): DesiredAction {
  if (temperature >= highLimit) return 'on';
  if (temperature <= lowLimit) return 'off';
  return 'unchanged';
}

/**
 * Resolve whether a relay ends up on after a decision
 * @internal
 */
function resultsInOn(desired: DesiredAction, knownOn: boolean): boolean {
  return desired === 'on' || (desired === 'unchanged' && knownOn);
}

/**
 * Controller status implied by a decision
 *
 * @param decision - Desired actions
 * @param known - Confirmed relay states
 * @returns heating, cooling or idle
 */
export function deriveStatus(decision: RelayDecision, known: RelayKnownStates): ControlStatus {
  if (resultsInOn(decision.heating, known.heating)) {
    return CONTROL_STATUS.HEATING;
  }
  if (resultsInOn(decision.cooling, known.cooling)) {
    return CONTROL_STATUS.COOLING;
  }
  return CONTROL_STATUS.IDLE;
}
