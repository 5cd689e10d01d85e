/**
 * Configuration module.
 * Defaults, the browser preference table, and the config-file loader.
 * Zod-validated.
 */

export { TIMEOUTS, PORTS, LIMITS, LOOPBACK_HOST } from './defaults.js';
export { loadConfigFile, resolveConfigPaths } from './loader.js';
export { loadDefaultPrefs, logDirPrefs, PORT_PREF } from './prefs.js';
