/**
 * Configuration module.
 * Loads and validates runtime config from a config file and the
 * environment. Zod-validated; CLI flags are applied by the caller.
 */

export { DEFAULT_CONFIG_FILES, ENV_OVERRIDES } from './defaults.js';
export type { EnvOverride } from './defaults.js';
export { applyEnvOverrides, loadConfig, readConfigFile, validateConfig } from './loader.js';
export type { LoadConfigOptions } from './loader.js';
