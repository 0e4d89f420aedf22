/**
 * Configuration module.
 * Settings from env and `.env`, session options from flags and env,
 * and the optional harness file. Zod-validated.
 */

export {
  DEFAULT_BASE_URL,
  DEFAULT_CONFIG_PATH,
  TIMEOUTS,
  DIRECTORIES,
  SESSION_DEFAULTS,
  ENV,
  CHROMIUM_ARGS,
} from './defaults.js';
export { loadSettings } from './settings.js';
export type { LoadSettingsOptions } from './settings.js';
export { loadHarnessConfig } from './loader.js';
export {
  registerSessionOptions,
  resolveSessionOptions,
  parseWindowSize,
  formatWindowSize,
  isCI,
} from './options.js';
export type { SessionFlags, ResolveSources } from './options.js';
export { ConfigurationError, UnsupportedBrowserError } from './errors.js';
