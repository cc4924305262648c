/**
 * Configuration module exports
 */

export {
  buildHostUrl,
  fetchInstanceSecrets,
  normalizeUrlBase,
  STATUS_PATH,
  type InstanceSecrets,
} from './auth.js';
export {
  DEFAULT_CONFIG_PATH,
  loadConfig,
  parseConfig,
  resolveConfigPath,
  type LoadedConfig,
  type ResolvedInstance,
} from './loader.js';
export { deepMerge } from './merge.js';
export * from './schema.js';
