export { validateConfig } from './validator';
export { addError, addWarning, validateNumberRange, validateIntegerRange, validateOptionalName } from './helpers';
export type { ValidationError, ValidationWarning, ValidationResult } from './types';
