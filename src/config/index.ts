/**
 * Configuration module.
 * Resolves probe settings from CLI flags, env, and an optional config file.
 * Zod-validated. Compiled-in defaults apply only where nothing overrides them.
 */

export { TASKRUN_VERSION, PROBE_TARGET, TIMEOUTS, EXIT_CODES } from './defaults.js';
export { loadConfigFile, ConfigError } from './loader.js';
export { resolveProbeSettings } from './resolve.js';
export type { SettingsSources } from './resolve.js';
