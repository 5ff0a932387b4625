/**
 * Sensor liveness helper functions
 */

import { LivenessValidationError } from '$types/errors';
import { isFiniteNumber } from '@utils/number';

/**
 * Validate liveness timing inputs
 *
 * @param now - Current timestamp in seconds
 * @param staleThresholdSec - Stale threshold in seconds
 * @throws {LivenessValidationError} If inputs are invalid
 */
export function validateLivenessInputs(now: number, staleThresholdSec: number): void {
  if (!isFiniteNumber(now) || now < 0) {
    throw new LivenessValidationError("isSensorActive: now must be a non-negative finite number, got " + now);
  }
  if (!isFiniteNumber(staleThresholdSec) || staleThresholdSec <= 0) {
    throw new LivenessValidationError("isSensorActive: staleThreshold must be a positive finite number, got " + staleThresholdSec);
  }
}
