/**
 * Validation result types
 */

/**
 * Problem that rejects a configuration
 */
export interface ValidationError {
  field: string;
  message: string;
  level: 'CRITICAL';
}

/**
 * Questionable but usable setting
 */
export interface ValidationWarning {
  field: string;
  message: string;
  level: 'WARNING';
}

export interface ValidationResult {
  valid: boolean;
  errors: ValidationError[];
  warnings: ValidationWarning[];
}
