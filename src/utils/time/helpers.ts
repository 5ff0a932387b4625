/**
 * Time helper functions
 */

import { TIME_CONSTANTS } from '@utils/constants';
import { isFiniteNumber } from '@utils/number';

/**
 * Seconds elapsed since a timestamp, clamped at zero
 *
 * Clock steps backwards (NTP corrections) report zero rather than a
 * negative age.
 *
 * @param nowSec - Current timestamp in seconds
 * @param sinceSec - Earlier timestamp in seconds
 * @returns Elapsed seconds (>= 0)
 */
export function elapsedSec(nowSec: number, sinceSec: number): number {
  const dt = nowSec - sinceSec;
  return dt > 0 ? dt : 0;
}

/**
 * Parse a broadcast timestamp into Unix seconds
 *
 * Accepts Unix seconds or milliseconds as a number, or an ISO-8601 string.
 * Millisecond values are floored to whole seconds.
 *
 * @param value - Raw timestamp value
 * @returns Unix seconds, or null when the value is not a timestamp
 */
export function parseTimestamp(value: unknown): number | null {
  if (isFiniteNumber(value)) {
    return Math.abs(value) >= TIME_CONSTANTS.MS_TIMESTAMP_THRESHOLD
      ? Math.floor(value / TIME_CONSTANTS.MS_PER_SECOND)
      : value;
  }

  if (typeof value === 'string' && value.length > 0) {
    const ms = Date.parse(value);
    if (!Number.isNaN(ms)) {
      return Math.floor(ms / TIME_CONSTANTS.MS_PER_SECOND);
    }
  }

  return null;
}

/**
 * Format a duration for log messages ("45s", "12m 5s", "2h 3m")
 * @param totalSec - Duration in seconds
 * @returns Human-readable duration
 */
export function formatDuration(totalSec: number): string {
  const sec = Math.max(0, Math.floor(totalSec));
  if (sec < TIME_CONSTANTS.SECONDS_PER_MINUTE) {
    return sec + 's';
  }

  if (sec < TIME_CONSTANTS.SECONDS_PER_HOUR) {
    return Math.floor(sec / TIME_CONSTANTS.SECONDS_PER_MINUTE) + 'm ' + (sec % TIME_CONSTANTS.SECONDS_PER_MINUTE) + 's';
  }

  const hours = Math.floor(sec / TIME_CONSTANTS.SECONDS_PER_HOUR);
  const minutes = Math.floor((sec % TIME_CONSTANTS.SECONDS_PER_HOUR) / TIME_CONSTANTS.SECONDS_PER_MINUTE);
  return hours + 'h ' + minutes + 'm';
}
