/**
 * Time utility functions
 */

import { TIME_CONSTANTS } from '@utils/constants';

/**
 * Get current Unix timestamp in seconds
 * @returns Current time in seconds since epoch
 */
export function now(): number {
  return Math.floor(Date.now() / TIME_CONSTANTS.MS_PER_SECOND);
}

/**
 * Resolve after the given number of milliseconds
 * @param ms - Delay in milliseconds (0 resolves on the next macrotask)
 */
export function sleep(ms: number): Promise<void> {
  return new Promise(function(resolve) {
    setTimeout(resolve, ms);
  });
}
