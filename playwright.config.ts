import { defineConfig } from '@playwright/test';

const isCI = Boolean(process.env.CI);

/**
 * End-to-end suite. Browsers are launched by the harness `session`
 * fixture, so no projects are declared here. Run through
 * `ui-harness run` to pass --browser / --headless / --window-size.
 */
export default defineConfig({
  testDir: './e2e',
  testMatch: '**/*.spec.ts',
  globalSetup: './src/harness/globalSetup.ts',
  outputDir: 'test-reports/playwright',
  timeout: 300_000,
  fullyParallel: false,
  retries: 0,
  maxFailures: isCI ? 1 : 5,
  reporter: [
    ['list'],
    ['junit', { outputFile: 'test-reports/junit.xml' }],
    ['allure-playwright', { resultsDir: 'allure-results' }],
  ],
});
