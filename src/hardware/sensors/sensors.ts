/**
 * File sensor feed
 *
 * The BLE scanner writes the latest broadcast of every hydrometer it hears
 * into a JSON snapshot:
 *
 *   { "red": { "temperature": 68.2, "timestamp": 1700000000 }, ... }
 *
 * The feed re-reads that file on every call. A missing file means no sensor
 * has been heard yet.
 */

import { readFileSync } from 'node:fs';

import { SensorFeedError, errorMessage } from '$types/errors';
import { isRecord } from '@utils/object';
import { EMPTY_SAMPLE, parseSensorEntry } from './helpers';
import { EXTERNAL_SENSOR_KEY } from './types';
import type { SensorFeed, SensorSample } from './types';

function isMissingFile(err: unknown): boolean {
  return isRecord(err) && err.code === 'ENOENT';
}

/**
 * Create a sensor feed backed by a snapshot file
 *
 * @param path - Snapshot file path
 * @returns Sensor feed
 */
export function createFileSensorFeed(path: string): SensorFeed {
  function readSnapshot(): Record<string, unknown> | null {
    let text: string;
    try {
      text = readFileSync(path, 'utf8');
    } catch (err: unknown) {
      if (isMissingFile(err)) {
        return null;
      }
      throw new SensorFeedError(path, errorMessage(err));
    }

    let data: unknown;
    try {
      data = JSON.parse(text);
    } catch (err: unknown) {
      throw new SensorFeedError(path, errorMessage(err));
    }

    if (!isRecord(data)) {
      throw new SensorFeedError(path, 'expected an object keyed by sensor id');
    }
    return data;
  }

  function read(sensorId: string | null): SensorSample {
    const snapshot = readSnapshot();
    if (snapshot === null) {
      return EMPTY_SAMPLE;
    }

    return parseSensorEntry(snapshot[sensorId ?? EXTERNAL_SENSOR_KEY]);
  }

  return {
    read: read
  };
}
