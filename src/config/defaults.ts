/**
 * Default configuration values.
 * Timeouts and directories are overridable via the harness file.
 */

export const DEFAULT_BASE_URL = 'https://automationexercise.com';

export const DEFAULT_CONFIG_PATH = 'harness.config.yaml';

export const TIMEOUTS = {
  PAGE_LOAD: 30_000,
  ELEMENT: 10_000,
  PROBE: 5_000,
  ALERT: 5_000,
  IMPLICIT: 10_000,
  POLL_INTERVAL: 500,
} as const;

export const DIRECTORIES = {
  SCREENSHOTS: 'screenshots',
  REPORTS: 'test-reports',
  ALLURE_RESULTS: 'allure-results',
} as const;

export const SESSION_DEFAULTS = {
  BROWSER: 'chrome',
  HEADLESS: false,
  WINDOW_SIZE: '1920,1080',
} as const;

/** Variables the harness reads, besides the settings in `.env`. */
export const ENV = {
  BROWSER: 'UI_BROWSER',
  HEADLESS: 'UI_HEADLESS',
  WINDOW_SIZE: 'UI_WINDOW_SIZE',
  CONFIG: 'UI_CONFIG',
  CI: 'CI',
} as const;

/** Chromium switches applied to every chrome/edge session. */
export const CHROMIUM_ARGS = [
  '--no-sandbox',
  '--disable-dev-shm-usage',
  '--disable-gpu',
  '--disable-extensions',
  '--disable-plugins',
  '--log-level=3',
] as const;
