/**
 * Configuration module.
 * Loads and validates runtime config from config files; CLI flags override.
 * Zod-validated.
 */

export { TIMEOUTS, LIMITS, VIEWPORT, TOKEN_GUARDS } from './defaults.js';
export { PROMPTS_DIR } from './paths.js';
export { loadConfigFile, loadOptionalConfigFile, DEFAULT_CONFIG_PATH } from './loader.js';
