/**
 * Relay command gate
 *
 * Drops commands that would not change anything or would spam the plug.
 *
 * ## Decision order
 * 1. Same action already in flight: refuse (pending_duplicate)
 * 2. Opposite action in flight: send, replacing it (superseded)
 * 3. Plug already in the requested state: refuse (redundant)
 * 4. Same action sent within the window: refuse (rate_limited)
 * 5. Otherwise send
 *
 * Pending checks come first. A relay with an "on" in flight still reports
 * knownOn=false, so an "off" has to be compared with the in-flight action,
 * not the confirmed state, or it could never replace the "on".
 */

import type { RelayAction } from '$types/common';
import { validateGateInputs, isWithinWindow } from './helpers';
import { GATE_REASONS } from './types';
import type { GateDecision, GateRelayState } from './types';

/**
 * Decide whether a command should be sent, with the reason
 *
 * @param relayState - Relay bookkeeping
 * @param action - Requested action
 * @param now - Current timestamp in seconds
 * @param rateLimitWindowSec - Minimum seconds between identical commands
 * @returns Gate decision
 * @throws {GateValidationError} If now or the window is invalid
 */
export function checkCommand(
  relayState: GateRelayState,
  action: RelayAction,
  now: number,
  rateLimitWindowSec: number
): GateDecision {
  validateGateInputs(now, rateLimitWindowSec);

  if (relayState.pending) {
    if (relayState.pendingAction === action) {
      return { send: false, reason: GATE_REASONS.PENDING_DUPLICATE };
    }
    return { send: true, reason: GATE_REASONS.SUPERSEDED };
  }

  const wantOn = action === 'on';
  if (relayState.knownOn === wantOn) {
    return { send: false, reason: GATE_REASONS.REDUNDANT };
  }

  if (relayState.lastCommandAction === action &&
      isWithinWindow(relayState.lastCommandAt, now, rateLimitWindowSec)) {
    return { send: false, reason: GATE_REASONS.RATE_LIMITED };
  }

  return { send: true, reason: null };
}

/**
 * Decide whether a command should be sent
 *
 * @param relayState - Relay bookkeeping
 * @param action - Requested action
 * @param now - Current timestamp in seconds
 * @param rateLimitWindowSec - Minimum seconds between identical commands
 * @returns True if the command should go out
 */
export function shouldSend(
  relayState: GateRelayState,
  action: RelayAction,
  now: number,
  rateLimitWindowSec: number
): boolean {
  return checkCommand(relayState, action, now, rateLimitWindowSec).send;
}
