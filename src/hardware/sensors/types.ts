/**
 * Sensor feed types
 */

import type { TemperatureReading } from '$types/common';

/**
 * Key the scanner uses for a wired thermometer when no hydrometer is assigned
 */
export const EXTERNAL_SENSOR_KEY = 'external';

/**
 * Latest broadcast of one sensor
 */
export interface SensorSample {
  /** Valid reading, null when the sensor has none */
  reading: TemperatureReading | null;

  /** Unix seconds of the last broadcast, null if never heard */
  lastBroadcastAt: number | null;
}

/**
 * Source of the most recent sensor broadcasts
 */
export interface SensorFeed {
  /**
   * Latest sample for a sensor
   * @throws {SensorFeedError} When the snapshot cannot be parsed
   */
  read(sensorId: string | null): SensorSample;
}
