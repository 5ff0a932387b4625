/**
 * Trigger decision logic
 *
 * Pure functions that turn a temperature (or a sensor safety situation)
 * into arm/fire transitions. Applying them is left to the registry.
 */

import { EVENT_NAMES } from '@events/types';
import type { TriggerFlags, TriggerTransition, SafetyTriggerInput } from './types';

/**
 * Thresholds and relay enables the temperature triggers look at
 */
export interface TriggerLimits {
  enableHeating: boolean;
  enableCooling: boolean;
  lowLimit: number;
  highLimit: number;
}

/**
 * Decide temperature trigger transitions
 *
 * - t <= low: fire below-limit, arm above-limit and in-range
 * - t >= high: fire above-limit, arm below-limit and in-range
 * - in between: fire in-range once a limit trigger has fired
 *
 * In-range re-arms only when the temperature next reaches a limit, so
 * oscillating inside the band notifies once. Nothing happens while both
 * relays are disabled.
 *
 * @param temperature - Current temperature
 * @param limits - Limits and relay enables
 * @param flags - Current arming flags
 * @returns Transitions in application order
 */
export function decideTriggerEvents(
  temperature: number,
  limits: TriggerLimits,
  flags: TriggerFlags
): TriggerTransition[] {
  if (!limits.enableHeating && !limits.enableCooling) {
    return [];
  }

  if (temperature <= limits.lowLimit) {
    return [
      { kind: 'fire', flag: 'belowLimitArmed', eventName: EVENT_NAMES.TEMP_BELOW_LOW_LIMIT },
      { kind: 'arm', flag: 'aboveLimitArmed' },
      { kind: 'arm', flag: 'inRangeArmed' },
    ];
  }

  if (temperature >= limits.highLimit) {
    return [
      { kind: 'fire', flag: 'aboveLimitArmed', eventName: EVENT_NAMES.TEMP_ABOVE_HIGH_LIMIT },
      { kind: 'arm', flag: 'belowLimitArmed' },
      { kind: 'arm', flag: 'inRangeArmed' },
    ];
  }

  if (!flags.belowLimitArmed || !flags.aboveLimitArmed) {
    return [{ kind: 'fire', flag: 'inRangeArmed', eventName: EVENT_NAMES.TEMP_IN_RANGE }];
  }

  return [];
}

/**
 * Decide safety trigger transitions while the sensor is inactive
 *
 * Per relay: a relay that is on gets a safety-off notification; a relay
 * that is off but would have been switched on gets a blocked notification.
 *
 * @param inputs - One entry per relay
 * @returns Transitions in application order
 */
export function decideSafetyTriggerEvents(inputs: readonly SafetyTriggerInput[]): TriggerTransition[] {
  const transitions: TriggerTransition[] = [];

  for (const input of inputs) {
    if (input.relayId === 'heating') {
      if (input.isOn) {
        transitions.push({ kind: 'fire', flag: 'heatingSafetyOffArmed', eventName: EVENT_NAMES.HEATING_SAFETY_OFF, relayId: 'heating' });
      } else if (input.wantsOn) {
        transitions.push({ kind: 'fire', flag: 'heatingBlockedArmed', eventName: EVENT_NAMES.HEATING_BLOCKED, relayId: 'heating' });
      }
    } else if (input.isOn) {
      transitions.push({ kind: 'fire', flag: 'coolingSafetyOffArmed', eventName: EVENT_NAMES.COOLING_SAFETY_OFF, relayId: 'cooling' });
    } else if (input.wantsOn) {
      transitions.push({ kind: 'fire', flag: 'coolingBlockedArmed', eventName: EVENT_NAMES.COOLING_BLOCKED, relayId: 'cooling' });
    }
  }

  return transitions;
}

/**
 * Transitions that re-arm every safety trigger once the sensor is live again
 */
export const SAFETY_REARM: readonly TriggerTransition[] = [
  { kind: 'arm', flag: 'heatingBlockedArmed' },
  { kind: 'arm', flag: 'coolingBlockedArmed' },
  { kind: 'arm', flag: 'heatingSafetyOffArmed' },
  { kind: 'arm', flag: 'coolingSafetyOffArmed' },
];
