/**
 * Playwright Test integration.
 * Import `test` and `expect` from here instead of '@playwright/test'.
 */

export { test, expect } from './fixtures.js';
export type { Credentials, HarnessTestFixtures, HarnessWorkerFixtures } from './fixtures.js';
export { playwrightReporter } from './reporter.js';
