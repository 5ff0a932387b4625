/**
 * Configuration check for the CLI
 */

import { USER_CONFIG } from './config';
import type { ProcessSettings } from '$types/config';
import { ConfigValidationError, errorMessage } from '$types/errors';
import type { ConsoleAPI } from '@logging';
import { createFileConfigStore } from '@system/config-store';

/**
 * Validate the config file and print the effective configuration
 *
 * @param settings - Process settings (config path)
 * @param consoleApi - Output
 * @returns True if the controller would accept the file
 */
export function checkConfig(settings: ProcessSettings, consoleApi: ConsoleAPI): boolean {
  const path = settings.CONFIG_PATH;

  try {
    const loaded = createFileConfigStore(path, USER_CONFIG).load();

    consoleApi.log('✅ ' + path + ' is valid');
    for (const warning of loaded.warnings) {
      consoleApi.warn('⚠️ ' + warning);
    }
    consoleApi.log(JSON.stringify(loaded.config, null, 2));
    return true;
  } catch (err: unknown) {
    consoleApi.warn('❌ ' + path + ' is invalid');
    const problems = err instanceof ConfigValidationError ? err.errors : [errorMessage(err)];
    for (const problem of problems) {
      consoleApi.warn('  - ' + problem);
    }
    return false;
  }
}
