/**
 * Config store types
 */

import type { UserConfig } from '$types/config';

/**
 * A successfully loaded configuration
 */
export interface LoadedConfig {
  config: UserConfig;
  /** Non-fatal problems: validator warnings, unknown keys, missing file */
  warnings: string[];
}

/**
 * Source of the user configuration, read on every tick
 */
export interface ConfigStore {
  readonly path: string;
  /**
   * Read, parse and validate the configuration
   * @throws {ConfigLoadError} When the file cannot be read or is not JSON
   * @throws {ConfigValidationError} When fields have the wrong type or fail validation
   */
  load(): LoadedConfig;
}
