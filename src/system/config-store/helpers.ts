/**
 * Field readers for the JSON config file
 *
 * Each reader returns the default when the key is absent and records an
 * error when it is present with the wrong type.
 */

import type { NotificationToggles, UserConfig } from '$types/config';
import type { TemperatureUnit } from '$types/common';
import { ALL_EVENT_NAMES } from '@events/types';
import type { TriggerEventName } from '@events/types';
import { TRIGGER_FLAG_NAMES } from '@core/triggers';
import { isFiniteNumber } from '@utils/number';
import { isRecord } from '@utils/object';

const CONFIG_KEYS: ReadonlySet<string> = new Set<keyof UserConfig>([
  'controlEnabled',
  'enableHeating',
  'enableCooling',
  'heatingPlug',
  'coolingPlug',
  'lowLimit',
  'highLimit',
  'unit',
  'assignedSensorId',
  'sensorAssignedAt',
  'updateIntervalSec',
  'rateLimitWindowSec',
  'notifications'
]);

// Trigger flags live in memory only; a copy on disk is ignored silently
const IGNORED_KEYS: ReadonlySet<string> = new Set<string>(TRIGGER_FLAG_NAMES);

export interface ParseResult {
  config: UserConfig;
  errors: string[];
  warnings: string[];
}

function readBoolean(raw: Record<string, unknown>, key: string, fallback: boolean, errors: string[]): boolean {
  const value = raw[key];
  if (value === undefined) return fallback;
  if (typeof value === 'boolean') return value;
  errors.push(key + ' must be a boolean');
  return fallback;
}

function readNumber(raw: Record<string, unknown>, key: string, fallback: number, errors: string[]): number {
  const value = raw[key];
  if (value === undefined) return fallback;
  if (isFiniteNumber(value)) return value;
  errors.push(key + ' must be a number');
  return fallback;
}

function readNullableNumber(raw: Record<string, unknown>, key: string, fallback: number | null, errors: string[]): number | null {
  const value = raw[key];
  if (value === undefined) return fallback;
  if (value === null || isFiniteNumber(value)) return value;
  errors.push(key + ' must be a number or null');
  return fallback;
}

function readNullableString(raw: Record<string, unknown>, key: string, fallback: string | null, errors: string[]): string | null {
  const value = raw[key];
  if (value === undefined) return fallback;
  if (value === null || typeof value === 'string') return value;
  errors.push(key + ' must be a string or null');
  return fallback;
}

function readUnit(raw: Record<string, unknown>, fallback: TemperatureUnit, errors: string[]): TemperatureUnit {
  const value = raw.unit;
  if (value === undefined) return fallback;
  if (value === 'F' || value === 'C') return value;
  errors.push('unit must be "F" or "C"');
  return fallback;
}

function readNotifications(
  raw: Record<string, unknown>,
  fallback: NotificationToggles,
  errors: string[],
  warnings: string[]
): NotificationToggles {
  const value = raw.notifications;
  if (value === undefined) return fallback;
  if (!isRecord(value)) {
    errors.push('notifications must be an object');
    return fallback;
  }

  const toggles: Record<TriggerEventName, boolean> = { ...fallback };
  const toggleErrors: string[] = [];
  for (const name of ALL_EVENT_NAMES) {
    toggles[name] = readBoolean(value, name, fallback[name], toggleErrors);
  }
  for (const message of toggleErrors) {
    errors.push('notifications.' + message);
  }
  for (const key of Object.keys(value)) {
    if (!ALL_EVENT_NAMES.some((name) => name === key)) {
      warnings.push('Unknown notification "' + key + '" ignored');
    }
  }
  return toggles;
}

/**
 * Overlay a parsed JSON document onto the defaults
 *
 * @param raw - Parsed JSON
 * @param defaults - Values for absent keys
 * @returns Merged config plus type errors and warnings
 */
export function parseUserConfig(raw: unknown, defaults: UserConfig): ParseResult {
  const errors: string[] = [];
  const warnings: string[] = [];

  if (!isRecord(raw)) {
    return { config: defaults, errors: ['configuration must be a JSON object'], warnings: warnings };
  }

  for (const key of Object.keys(raw)) {
    if (!CONFIG_KEYS.has(key) && !IGNORED_KEYS.has(key)) {
      warnings.push('Unknown setting "' + key + '" ignored');
    }
  }

  const config: UserConfig = {
    controlEnabled: readBoolean(raw, 'controlEnabled', defaults.controlEnabled, errors),
    enableHeating: readBoolean(raw, 'enableHeating', defaults.enableHeating, errors),
    enableCooling: readBoolean(raw, 'enableCooling', defaults.enableCooling, errors),
    heatingPlug: readNullableString(raw, 'heatingPlug', defaults.heatingPlug, errors),
    coolingPlug: readNullableString(raw, 'coolingPlug', defaults.coolingPlug, errors),
    lowLimit: readNumber(raw, 'lowLimit', defaults.lowLimit, errors),
    highLimit: readNumber(raw, 'highLimit', defaults.highLimit, errors),
    unit: readUnit(raw, defaults.unit, errors),
    assignedSensorId: readNullableString(raw, 'assignedSensorId', defaults.assignedSensorId, errors),
    sensorAssignedAt: readNullableNumber(raw, 'sensorAssignedAt', defaults.sensorAssignedAt, errors),
    updateIntervalSec: readNumber(raw, 'updateIntervalSec', defaults.updateIntervalSec, errors),
    rateLimitWindowSec: readNumber(raw, 'rateLimitWindowSec', defaults.rateLimitWindowSec, errors),
    notifications: readNotifications(raw, defaults.notifications, errors, warnings)
  };

  return { config: config, errors: errors, warnings: warnings };
}
