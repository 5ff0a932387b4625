/**
 * Global error types for the fermentation controller
 * Custom errors for validation, configuration and actuator failures
 */

/**
 * Base validation error for all modules
 */
export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

/**
 * Error thrown when the user configuration fails validation
 *
 * Carries every problem found so one log line explains the rejected reload.
 */
export class ConfigValidationError extends ValidationError {
  readonly errors: readonly string[];

  constructor(errors: readonly string[]) {
    super('Invalid configuration: ' + errors.join('; '));
    this.name = 'ConfigValidationError';
    this.errors = errors;
  }
}

/**
 * Error thrown when the configuration file cannot be read or parsed
 */
export class ConfigLoadError extends Error {
  readonly path: string;

  constructor(path: string, message: string) {
    super('Cannot load configuration from ' + path + ': ' + message);
    this.name = 'ConfigLoadError';
    this.path = path;
  }
}

/**
 * Error thrown when a smart plug rejects or fails an RPC call
 */
export class ActuatorError extends Error {
  readonly address: string;

  constructor(address: string, message: string) {
    super(address + ': ' + message);
    this.name = 'ActuatorError';
    this.address = address;
  }
}

/**
 * Error thrown when sensor liveness inputs are invalid
 */
export class LivenessValidationError extends ValidationError {
  constructor(message: string) {
    super(message);
    this.name = 'LivenessValidationError';
  }
}

/**
 * Error thrown when command gate inputs are invalid
 */
export class GateValidationError extends ValidationError {
  constructor(message: string) {
    super(message);
    this.name = 'GateValidationError';
  }
}

/**
 * Extract a log-friendly message from any thrown value
 * @param err - Caught value
 * @returns Error message, or the value stringified
 */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Error thrown when the sensor snapshot file exists but cannot be parsed
 */
export class SensorFeedError extends Error {
  readonly path: string;

  constructor(path: string, message: string) {
    super('Cannot read sensor snapshot ' + path + ': ' + message);
    this.name = 'SensorFeedError';
    this.path = path;
  }
}
