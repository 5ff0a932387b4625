/**
 * Swapped plug detection helper functions
 */

import type { RelayId } from '$types/common';
import type { RelayBaseline, RelayBaselines } from './types';

/**
 * Baselines with both relays off
 * @returns Fresh baselines object
 */
export function createEmptyBaselines(): RelayBaselines {
  return { heating: null, cooling: null };
}

/**
 * Temperature change against the direction a relay should push
 *
 * Positive when heating saw the temperature fall or cooling saw it rise.
 *
 * @param relayId - Relay that is on
 * @param baseline - Baseline taken when it came on
 * @param temperature - Current temperature
 * @returns Wrong-way change in degrees
 */
export function wrongWayDrift(relayId: RelayId, baseline: RelayBaseline, temperature: number): number {
  return relayId === 'heating'
    ? baseline.temperature - temperature
    : temperature - baseline.temperature;
}
