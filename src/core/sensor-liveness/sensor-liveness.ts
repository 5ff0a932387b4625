/**
 * Sensor liveness guard
 *
 * Decides whether the assigned sensor is still broadcasting. An inactive
 * sensor forces both relays off; a freshly assigned one gets a grace period
 * to send its first reading.
 */

import { elapsedSec } from '@utils/time';
import { validateLivenessInputs } from './helpers';
import type { LivenessConfig, LivenessResult } from './types';

/**
 * Default liveness timing
 */
export const DEFAULT_LIVENESS_CONFIG: LivenessConfig = {
  SENSOR_GRACE_PERIOD_SEC: 900,
  STALE_INTERVAL_MULTIPLIER: 2,
  MAX_CLOCK_SKEW_SEC: 60,
};

/**
 * Stale threshold for an update interval
 *
 * @param updateIntervalSec - Expected seconds between broadcasts
 * @param config - Liveness timing
 * @returns Seconds of silence after which the sensor is stale
 */
export function staleThresholdFor(
  updateIntervalSec: number,
  config: LivenessConfig = DEFAULT_LIVENESS_CONFIG
): number {
  return config.STALE_INTERVAL_MULTIPLIER * updateIntervalSec;
}

/**
 * Check sensor liveness with the reason
 *
 * 1. No sensor assigned: active (manual or external temperature source)
 * 2. Assigned less than the grace period ago: active
 * 3. Otherwise active only if it broadcast within the stale threshold
 *
 * A broadcast dated more than MAX_CLOCK_SKEW_SEC ahead of now counts as not
 * seen; smaller skew reads as zero silence.
 *
 * @param assignedSensorId - Assigned sensor, null when none
 * @param lastBroadcastAt - Unix seconds of its last broadcast, null if never seen
 * @param assignedAt - Unix seconds of the assignment, null if unknown
 * @param now - Current timestamp in seconds
 * @param staleThresholdSec - Seconds of silence tolerated
 * @param config - Liveness timing
 * @returns Verdict with reason and silence duration
 * @throws {LivenessValidationError} If now or the threshold is invalid
 */
export function checkSensorLiveness(
  assignedSensorId: string | null,
  lastBroadcastAt: number | null,
  assignedAt: number | null,
  now: number,
  staleThresholdSec: number,
  config: LivenessConfig = DEFAULT_LIVENESS_CONFIG
): LivenessResult {
  validateLivenessInputs(now, staleThresholdSec);

  const future = lastBroadcastAt !== null && lastBroadcastAt - now > config.MAX_CLOCK_SKEW_SEC;
  const silenceSec = lastBroadcastAt === null || future ? null : elapsedSec(now, lastBroadcastAt);

  if (assignedSensorId === null) {
    return { active: true, reason: 'no_sensor', silenceSec: silenceSec };
  }

  if (assignedAt !== null && now - assignedAt < config.SENSOR_GRACE_PERIOD_SEC) {
    return { active: true, reason: 'grace_period', silenceSec: silenceSec };
  }

  if (future) {
    return { active: false, reason: 'future_timestamp', silenceSec: null };
  }

  if (silenceSec === null) {
    return { active: false, reason: 'never_seen', silenceSec: null };
  }

  if (silenceSec < staleThresholdSec) {
    return { active: true, reason: 'fresh', silenceSec: silenceSec };
  }

  return { active: false, reason: 'stale', silenceSec: silenceSec };
}

/**
 * Check sensor liveness
 *
 * @param assignedSensorId - Assigned sensor, null when none
 * @param lastBroadcastAt - Unix seconds of its last broadcast, null if never seen
 * @param assignedAt - Unix seconds of the assignment, null if unknown
 * @param now - Current timestamp in seconds
 * @param staleThresholdSec - Seconds of silence tolerated
 * @returns True if the sensor counts as active
 */
export function isSensorActive(
  assignedSensorId: string | null,
  lastBroadcastAt: number | null,
  assignedAt: number | null,
  now: number,
  staleThresholdSec: number
): boolean {
  return checkSensorLiveness(assignedSensorId, lastBroadcastAt, assignedAt, now, staleThresholdSec).active;
}
