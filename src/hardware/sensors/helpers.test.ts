/**
 * Unit tests for sensor helpers
 */

import { isValidTemperature, parseSensorEntry } from './helpers';

describe('isValidTemperature', () => {
  it('should accept ordinary fermentation temperatures', () => {
    expect(isValidTemperature(68.2)).toBe(true);
    expect(isValidTemperature(19.5)).toBe(true);
    expect(isValidTemperature(0)).toBe(true);
  });

  it('should reject non-numbers', () => {
    expect(isValidTemperature('68')).toBe(false);
    expect(isValidTemperature(null)).toBe(false);
    expect(isValidTemperature(undefined)).toBe(false);
  });

  it('should reject NaN and Infinity', () => {
    expect(isValidTemperature(NaN)).toBe(false);
    expect(isValidTemperature(Infinity)).toBe(false);
  });

  it('should reject values outside the liquid range', () => {
    expect(isValidTemperature(-40)).toBe(false);
    expect(isValidTemperature(250)).toBe(false);
  });
});

describe('parseSensorEntry', () => {
  it('should parse a numeric timestamp', () => {
    expect(parseSensorEntry({ temperature: 68.2, timestamp: 1700000000 })).toEqual({
      reading: { value: 68.2, observedAt: 1700000000 },
      lastBroadcastAt: 1700000000
    });
  });

  it('should convert a millisecond timestamp to seconds', () => {
    expect(parseSensorEntry({ temperature: 68.2, timestamp: 1700000000250 })).toEqual({
      reading: { value: 68.2, observedAt: 1700000000 },
      lastBroadcastAt: 1700000000
    });
  });

  it('should parse an ISO timestamp', () => {
    expect(parseSensorEntry({ temperature: 20, timestamp: '2023-11-14T22:13:20Z' })).toEqual({
      reading: { value: 20, observedAt: 1700000000 },
      lastBroadcastAt: 1700000000
    });
  });

  it('should keep the broadcast time when the temperature is unusable', () => {
    expect(parseSensorEntry({ temperature: 'n/a', timestamp: 1700000000 })).toEqual({
      reading: null,
      lastBroadcastAt: 1700000000
    });
  });

  it('should return an empty sample without a timestamp', () => {
    expect(parseSensorEntry({ temperature: 68 })).toEqual({ reading: null, lastBroadcastAt: null });
  });

  it('should return an empty sample for missing entries', () => {
    expect(parseSensorEntry(undefined)).toEqual({ reading: null, lastBroadcastAt: null });
  });
});
