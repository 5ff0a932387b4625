/**
 * Sensor helper functions
 */

import { isFiniteNumber } from '@utils/number';
import { isRecord } from '@utils/object';
import { parseTimestamp } from '@utils/time';
import type { SensorSample } from './types';

/**
 * Sample for a sensor that has never broadcast
 */
export const EMPTY_SAMPLE: SensorSample = { reading: null, lastBroadcastAt: null };

/**
 * Validate a temperature value
 *
 * Values outside a wide liquid range (either unit) count as no reading.
 *
 * @param value - Raw temperature value
 * @returns True if value is a usable temperature
 */
export function isValidTemperature(value: unknown): value is number {
  if (!isFiniteNumber(value)) {
    return false;
  }

  return value > -40 && value < 250;
}

/**
 * Turn one snapshot entry into a sample
 *
 * @param entry - Raw entry ({ temperature, timestamp })
 * @returns Parsed sample
 */
export function parseSensorEntry(entry: unknown): SensorSample {
  if (!isRecord(entry)) {
    return EMPTY_SAMPLE;
  }

  const observedAt = parseTimestamp(entry.timestamp);
  if (observedAt === null) {
    return EMPTY_SAMPLE;
  }

  if (!isValidTemperature(entry.temperature)) {
    return { reading: null, lastBroadcastAt: observedAt };
  }

  return {
    reading: { value: entry.temperature, observedAt: observedAt },
    lastBroadcastAt: observedAt
  };
}
