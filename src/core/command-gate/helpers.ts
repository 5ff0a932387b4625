/**
 * Command gate helper functions
 */

import { GateValidationError } from '$types/errors';
import { isFiniteNumber } from '@utils/number';

/**
 * Validate gate timing inputs
 *
 * @param now - Current timestamp in seconds
 * @param rateLimitWindowSec - Rate limit window in seconds
 * @throws {GateValidationError} If inputs are invalid
 */
export function validateGateInputs(now: number, rateLimitWindowSec: number): void {
  if (!isFiniteNumber(now) || now < 0) {
    throw new GateValidationError("checkCommand: now must be a non-negative finite number, got " + now);
  }
  if (!isFiniteNumber(rateLimitWindowSec) || rateLimitWindowSec < 0) {
    throw new GateValidationError("checkCommand: rateLimitWindowSec must be a non-negative finite number, got " + rateLimitWindowSec);
  }
}

/**
 * Check whether the same action was sent inside the rate limit window
 *
 * @internal
 */
export function isWithinWindow(
  lastCommandAt: number | null,
  now: number,
  rateLimitWindowSec: number
): boolean {
  if (lastCommandAt === null) {
    return false;
  }

  return now - lastCommandAt < rateLimitWindowSec;
}
