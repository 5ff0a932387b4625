/**
 * Validation helper functions
 * Provides reusable utilities for configuration validation
 */

import type { ValidationError, ValidationWarning } from './types';
import { isFiniteNumber, isInteger } from '@utils/number';

// ═══════════════════════════════════════════════════════════════
// ERROR AND WARNING BUILDERS
// ═══════════════════════════════════════════════════════════════

/**
 * Add a critical error to the errors list
 * @param errors - Array to append the error to
 * @param field - Field name that failed validation
 * @param message - Human-readable error message
 */
export function addError(errors: ValidationError[], field: string, message: string): void {
  errors.push({ level: 'CRITICAL', field: field, message: message });
}

/**
 * Add a warning to the warnings list
 * @param warnings - Array to append the warning to
 * @param field - Field name with sub-optimal value
 * @param message - Human-readable warning message
 */
export function addWarning(warnings: ValidationWarning[], field: string, message: string): void {
  warnings.push({ level: 'WARNING', field: field, message: message });
}

// ═══════════════════════════════════════════════════════════════
// RANGE VALIDATORS
// ═══════════════════════════════════════════════════════════════

/**
 * Validate a number against a critical range
 *
 * @param value - Value to validate
 * @param field - Field name for error messages
 * @param min - Minimum acceptable value
 * @param max - Maximum acceptable value
 * @param errors - Array to append errors to
 * @returns True when the value is inside the range
 */
export function validateNumberRange(
  value: number,
  field: string,
  min: number,
  max: number,
  errors: ValidationError[]
): boolean {
  if (!isFiniteNumber(value) || value < min || value > max) {
    addError(errors, field, `${field} must be between ${min} and ${max} (got ${value})`);
    return false;
  }
  return true;
}

/**
 * Validate an integer against a critical range
 *
 * First checks if the value is an integer, then validates the range
 */
export function validateIntegerRange(
  value: number,
  field: string,
  min: number,
  max: number,
  errors: ValidationError[]
): boolean {
  if (!isInteger(value)) {
    addError(errors, field, `${field} must be an integer (got ${value})`);
    return false;
  }

  return validateNumberRange(value, field, min, max, errors);
}

// ═══════════════════════════════════════════════════════════════
// STRING VALIDATORS
// ═══════════════════════════════════════════════════════════════

/**
 * Validate an optional identifier: null or a non-blank string
 *
 * @param value - Value to validate
 * @param field - Field name for error messages
 * @param errors - Array to append errors to
 */
export function validateOptionalName(
  value: string | null,
  field: string,
  errors: ValidationError[]
): void {
  if (value !== null && value.trim().length === 0) {
    addError(errors, field, `${field} must be null or a non-empty string`);
  }
}
