/**
 * Swapped plug detection
 *
 * A heater on the cooling plug (or the reverse) makes the controller push
 * the temperature the wrong way. Each relay gets a baseline when it is first
 * seen confirmed on; once it has been on long enough, a clear move against
 * its direction flags the plugs as swapped. The alert fires once through the
 * trigger registry and re-arms only when the plug addresses change.
 */

import { RELAY_IDS } from '$types/common';
import type { RelayId, RelayKnownStates } from '$types/common';
import { EVENT_NAMES } from '@events/types';
import type { TriggerTransition } from '../triggers/types';
import { wrongWayDrift } from './helpers';
import type { RelayBaselines, SwappedPlugLimits } from './types';

/**
 * Take a baseline for relays that just came on and drop those that are off
 *
 * @param baselines - Current baselines
 * @param relayOn - Confirmed relay states
 * @param temperature - Current temperature
 * @param now - Current timestamp in seconds
 * @returns Updated baselines
 */
export function updateBaselines(
  baselines: RelayBaselines,
  relayOn: RelayKnownStates,
  temperature: number,
  now: number
): RelayBaselines {
  const next: RelayBaselines = { heating: null, cooling: null };

  for (const relayId of RELAY_IDS) {
    if (relayOn[relayId]) {
      next[relayId] = baselines[relayId] ?? { since: now, temperature: temperature };
    }
  }

  return next;
}

/**
 * Find a relay driving the temperature the wrong way
 *
 * @param baselines - Baselines of the relays that are on
 * @param temperature - Current temperature
 * @param now - Current timestamp in seconds
 * @param limits - Minimum on time and drift
 * @returns The suspect relay, heating first, or null
 */
export function detectSwappedPlug(
  baselines: RelayBaselines,
  temperature: number,
  now: number,
  limits: SwappedPlugLimits
): RelayId | null {
  for (const relayId of RELAY_IDS) {
    const baseline = baselines[relayId];
    if (baseline === null || now - baseline.since < limits.minOnSec) {
      continue;
    }
    if (wrongWayDrift(relayId, baseline, temperature) > limits.minDrift) {
      return relayId;
    }
  }

  return null;
}

/**
 * Transitions for a detection result
 *
 * @param suspect - Relay from detectSwappedPlug
 * @returns A fire transition for the suspect, or nothing
 */
export function decideSwappedPlugEvents(suspect: RelayId | null): TriggerTransition[] {
  if (suspect === null) {
    return [];
  }
  return [{ kind: 'fire', flag: 'swappedPlugsArmed', eventName: EVENT_NAMES.SWAPPED_PLUGS, relayId: suspect }];
}

/**
 * Re-arms the alert after the plug addresses change
 */
export const SWAPPED_PLUGS_REARM: readonly TriggerTransition[] = [
  { kind: 'arm', flag: 'swappedPlugsArmed' },
];
