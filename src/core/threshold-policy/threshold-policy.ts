/**
 * Threshold control policy
 *
 * Bang-bang control between two limits. Relay commands depend only on the
 * temperature and the limits; the arming flags shape notifications, never
 * commands.
 */

import type { RelayKnownStates, TemperatureReading } from '$types/common';
import { buildTriggerEvent } from '@events/helpers';
import { decideTriggerEvents } from '../triggers/triggers';
import { applyTransitions, createTriggerRegistry, pickFlags } from '../triggers/registry';
import { decideCooling, decideHeating, deriveStatus } from './helpers';
import type { ControlConfig, EvaluationResult, PolicyLimits, RelayDecision } from './types';

/**
 * Decide the desired action for both relays
 *
 * A disabled relay is always driven off.
 *
 * @param temperature - Current temperature
 * @param limits - Relay enables and limits
 * @returns Desired action per relay
 */
export function decideRelayAction(temperature: number, limits: PolicyLimits): RelayDecision {
  return {
    heating: limits.enableHeating ? decideHeating(temperature, limits.lowLimit, limits.highLimit) : 'off',
    cooling: limits.enableCooling ? decideCooling(temperature, limits.lowLimit, limits.highLimit) : 'off',
  };
}

/**
 * Evaluate one reading against the config
 *
 * Combines the relay decision with the temperature triggers. The flags
 * carried in config are not modified; the flags after this evaluation are
 * returned for the caller to keep.
 *
 * @param reading - Temperature reading
 * @param config - Config with arming flags
 * @param relayKnownStates - Confirmed relay states
 * @returns Desired actions, fired events, next flags and status
 */
export function evaluate(
  reading: TemperatureReading,
  config: ControlConfig,
  relayKnownStates: RelayKnownStates
): EvaluationResult {
  const decision = decideRelayAction(reading.value, config);

  const flags = pickFlags(config);
  const registry = createTriggerRegistry(flags);
  const fired = applyTransitions(registry, decideTriggerEvents(reading.value, config, flags));

  return {
    desiredHeating: decision.heating,
    desiredCooling: decision.cooling,
    triggerEvents: fired.map(function(trigger) {
      return buildTriggerEvent(trigger, reading.value, config, reading.observedAt);
    }),
    flags: registry.snapshot(),
    status: deriveStatus(decision, relayKnownStates),
  };
}
