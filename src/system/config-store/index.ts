export { createFileConfigStore } from './config-store';
export { parseUserConfig } from './helpers';
export type { ParseResult } from './helpers';
export type { ConfigStore, LoadedConfig } from './types';
