/**
 * File-backed user configuration
 *
 * The JSON file holds UserConfig fields; absent keys take their defaults.
 * Type errors and validator errors reject the whole file so the caller can
 * keep running on the last good configuration.
 */

import { readFileSync } from 'node:fs';

import type { UserConfig } from '$types/config';
import { ConfigLoadError, ConfigValidationError, errorMessage } from '$types/errors';
import { isRecord } from '@utils/object';
import { validateConfig } from '@validation';
import { parseUserConfig } from './helpers';
import type { ConfigStore, LoadedConfig } from './types';

function isMissingFile(err: unknown): boolean {
  return isRecord(err) && err.code === 'ENOENT';
}

/**
 * Create a config store for a JSON file
 *
 * @param path - Config file path
 * @param defaults - Values for keys the file does not set
 * @returns Config store
 */
export function createFileConfigStore(path: string, defaults: UserConfig): ConfigStore {
  function readRaw(): unknown {
    let text: string;
    try {
      text = readFileSync(path, 'utf8');
    } catch (err: unknown) {
      if (isMissingFile(err)) {
        return undefined;
      }
      throw new ConfigLoadError(path, errorMessage(err));
    }

    try {
      return JSON.parse(text);
    } catch (err: unknown) {
      throw new ConfigLoadError(path, errorMessage(err));
    }
  }

  function load(): LoadedConfig {
    const raw = readRaw();
    if (raw === undefined) {
      return { config: defaults, warnings: ['Config file ' + path + ' not found, using defaults'] };
    }

    const parsed = parseUserConfig(raw, defaults);
    if (parsed.errors.length > 0) {
      throw new ConfigValidationError(parsed.errors);
    }

    const validation = validateConfig(parsed.config);
    if (!validation.valid) {
      throw new ConfigValidationError(validation.errors.map(function(e) {
        return e.message;
      }));
    }

    const warnings = parsed.warnings.concat(validation.warnings.map(function(w) {
      return w.message;
    }));
    return { config: parsed.config, warnings: warnings };
  }

  return {
    path: path,
    load: load
  };
}
