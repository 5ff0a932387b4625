/**
 * Relay command dispatcher
 *
 * Runs every relay request through the command gate, tracks the in-flight
 * command per relay, and applies actuator results. Commands go out on the
 * actuator channel and never block the caller.
 *
 * A result is applied only when its token matches the in-flight command;
 * anything else answers a superseded command and is counted and dropped.
 * Failed commands leave knownOn untouched so the next tick asks again.
 */

import type { RelayAction, RelayId, RelayKnownStates } from '$types/common';
import { checkCommand } from '@core/command-gate';
import type { ActuatorResult } from '@hardware/actuator';
import { actionLabel, confirmedState, createRelayState, isCurrentResult } from './helpers';
import type { RelayDispatcher, RelayDispatcherOptions, RelayState, RequestOutcome } from './types';

/**
 * Create a relay dispatcher
 *
 * @param options - Actuator channel, logger, clock and rate-limit window
 * @returns Relay dispatcher
 */
export function createRelayDispatcher(options: RelayDispatcherOptions): RelayDispatcher {
  const channel = options.channel;
  const logger = options.logger;
  const timeSource = options.timeSource;
  let rateLimitWindowSec = options.rateLimitWindowSec;
  let staleResults = 0;

  const states: Record<RelayId, RelayState> = {
    heating: createRelayState(),
    cooling: createRelayState()
  };

  // Relays already reported as missing a plug address
  const unconfiguredLogged = new Set<RelayId>();

  function request(relayId: RelayId, action: RelayAction, now?: number): RequestOutcome {
    const state = states[relayId];
    const t = now ?? timeSource();

    if (!channel.isConfigured(relayId)) {
      if (!unconfiguredLogged.has(relayId)) {
        unconfiguredLogged.add(relayId);
        logger.warning('No plug configured for ' + relayId + ', cannot turn it ' + actionLabel(action));
      }
      return 'unconfigured';
    }
    unconfiguredLogged.delete(relayId);

    const decision = checkCommand(state, action, t, rateLimitWindowSec);
    if (!decision.send) {
      logger.debug(relayId + ' ' + actionLabel(action) + ' not sent: ' + decision.reason);
      return decision.reason;
    }

    if (decision.reason === 'superseded') {
      logger.debug(relayId + ' ' + actionLabel(action) + ' supersedes in-flight ' + String(state.pendingAction));
    }

    const token = state.nextToken;
    state.nextToken = token + 1;
    state.pending = true;
    state.pendingAction = action;
    state.pendingSince = t;
    state.inFlightToken = token;
    state.lastCommandAt = t;
    state.lastCommandAction = action;

    logger.info('Turning ' + relayId + ' ' + actionLabel(action));
    channel.submit({ relayId: relayId, action: action, token: token });
    return 'sent';
  }

  function onResult(result: ActuatorResult): void {
    const state = states[result.relayId];

    if (!isCurrentResult(state, result)) {
      staleResults++;
      logger.debug('Discarding stale ' + result.relayId + ' result (token ' + result.token + ', in flight ' + String(state.inFlightToken) + ')');
      return;
    }

    state.pending = false;
    state.pendingAction = null;
    state.pendingSince = null;
    state.inFlightToken = null;

    if (result.success) {
      state.knownOn = confirmedState(result);
      logger.debug(result.relayId + ' plug confirmed ' + (state.knownOn ? 'ON' : 'OFF'));
      return;
    }

    logger.warning('Failed to turn ' + result.relayId + ' ' + actionLabel(result.action) + ': ' + (result.error ?? 'unknown error'));
  }

  function syncState(relayId: RelayId, isOn: boolean): void {
    states[relayId].knownOn = isOn;
  }

  function getState(relayId: RelayId): Readonly<RelayState> {
    return { ...states[relayId] };
  }

  function knownStates(): RelayKnownStates {
    return { heating: states.heating.knownOn, cooling: states.cooling.knownOn };
  }

  function setRateLimitWindow(seconds: number): void {
    rateLimitWindowSec = seconds;
  }

  function getStaleResultCount(): number {
    return staleResults;
  }

  return {
    request: request,
    onResult: onResult,
    syncState: syncState,
    getState: getState,
    knownStates: knownStates,
    setRateLimitWindow: setRateLimitWindow,
    getStaleResultCount: getStaleResultCount
  };
}
