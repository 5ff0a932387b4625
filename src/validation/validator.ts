/**
 * User configuration validator
 *
 * Errors reject the configuration (the controller keeps the last good one);
 * warnings are logged and the configuration is used as-is.
 */

import type { RelayId, UserConfig } from '$types';
import { APP_CONSTANTS } from '@boot/config';
import { isFiniteNumber } from '@utils/number';
import { addError, addWarning, validateIntegerRange, validateNumberRange, validateOptionalName } from './helpers';
import type { ValidationError, ValidationResult, ValidationWarning } from './types';

function plugField(relayId: RelayId): 'heatingPlug' | 'coolingPlug' {
  return relayId === 'heating' ? 'heatingPlug' : 'coolingPlug';
}

function validateLimits(config: UserConfig, errors: ValidationError[], warnings: ValidationWarning[]): void {
  const range = APP_CONSTANTS.LIMIT_RANGE[config.unit];
  const lowOk = validateNumberRange(config.lowLimit, 'lowLimit', range.min, range.max, errors);
  const highOk = validateNumberRange(config.highLimit, 'highLimit', range.min, range.max, errors);
  if (!lowOk || !highOk) {
    return;
  }

  // Inverted bands still run: each relay tests its "on" condition first
  if (config.lowLimit > config.highLimit) {
    addWarning(warnings, 'lowLimit', `lowLimit ${config.lowLimit} is above highLimit ${config.highLimit}; heating and cooling may both run`);
    return;
  }

  const gap = config.highLimit - config.lowLimit;
  if (gap < APP_CONSTANTS.MIN_LIMIT_GAP_WARNING) {
    addWarning(warnings, 'highLimit', `Band of ${gap}°${config.unit} is narrower than ${APP_CONSTANTS.MIN_LIMIT_GAP_WARNING}°${config.unit}; relays will switch often`);
  }
}

function validateRelays(config: UserConfig, errors: ValidationError[], warnings: ValidationWarning[]): void {
  validateOptionalName(config.heatingPlug, 'heatingPlug', errors);
  validateOptionalName(config.coolingPlug, 'coolingPlug', errors);

  if (!config.controlEnabled) {
    return;
  }

  if (!config.enableHeating && !config.enableCooling) {
    addWarning(warnings, 'controlEnabled', 'Control is enabled but heating and cooling are both disabled');
  }

  const enabled: Array<[RelayId, boolean]> = [['heating', config.enableHeating], ['cooling', config.enableCooling]];
  for (const [relayId, isEnabled] of enabled) {
    const field = plugField(relayId);
    if (isEnabled && config[field] === null) {
      addWarning(warnings, field, `${relayId} is enabled but ${field} is not set`);
    }
  }

  if (config.enableHeating && config.enableCooling &&
      config.heatingPlug !== null && config.heatingPlug === config.coolingPlug) {
    addError(errors, 'coolingPlug', 'heatingPlug and coolingPlug must be different plugs');
  }
}

function validateSensor(config: UserConfig, errors: ValidationError[]): void {
  validateOptionalName(config.assignedSensorId, 'assignedSensorId', errors);

  const assignedAt = config.sensorAssignedAt;
  if (assignedAt !== null && (!isFiniteNumber(assignedAt) || assignedAt < 0)) {
    addError(errors, 'sensorAssignedAt', `sensorAssignedAt must be null or a Unix timestamp (got ${assignedAt})`);
  }

  validateIntegerRange(
    config.updateIntervalSec,
    'updateIntervalSec',
    APP_CONSTANTS.MIN_UPDATE_INTERVAL_SEC,
    APP_CONSTANTS.MAX_UPDATE_INTERVAL_SEC,
    errors
  );
}

/**
 * Validate a user configuration
 *
 * @param config - Parsed user configuration
 * @returns Errors, warnings and the overall verdict
 */
export function validateConfig(config: UserConfig): ValidationResult {
  const errors: ValidationError[] = [];
  const warnings: ValidationWarning[] = [];

  validateLimits(config, errors, warnings);
  validateRelays(config, errors, warnings);
  validateSensor(config, errors);
  validateNumberRange(config.rateLimitWindowSec, 'rateLimitWindowSec', 0, APP_CONSTANTS.MAX_RATE_LIMIT_WINDOW_SEC, errors);

  return {
    valid: errors.length === 0,
    errors: errors,
    warnings: warnings
  };
}
