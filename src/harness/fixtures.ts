import { test as base } from '@playwright/test';

import { DEFAULT_CONFIG_PATH, ENV } from '../config/defaults.js';
import { loadHarnessConfig } from '../config/loader.js';
import { resolveSessionOptions } from '../config/options.js';
import { loadSettings } from '../config/settings.js';
import type { PlaywrightDriver } from '../driver/playwrightDriver.js';
import type { ReportSink } from '../report/sink.js';
import { ScreenshotCapture } from '../report/screenshots.js';
import type { HarnessConfig } from '../schema/harnessConfig.js';
import type { SessionOptions } from '../schema/options.js';
import type { Settings } from '../schema/settings.js';
import { launchSession } from '../session/launcher.js';
import type { PlaywrightSession } from '../session/launcher.js';
import { withBrowserSession } from '../session/lifecycle.js';
import { timestamp } from '../utils/names.js';
import { playwrightReporter } from './reporter.js';

// ── Fixture types ────────────────────────────────────────────

export interface Credentials {
  email: string | undefined;
  password: string | undefined;
}

export interface HarnessWorkerFixtures {
  harnessConfig: HarnessConfig;
  settings: Settings;
  sessionOptions: SessionOptions;
}

export interface HarnessTestFixtures {
  reportSink: ReportSink;
  session: PlaywrightSession;
  driver: PlaywrightDriver;
  takeScreenshot: (name?: string) => Promise<string>;
  baseUrl: string;
  validUserCredentials: Credentials;
  invalidUserCredentials: Credentials;
}

// ── Fixtures ─────────────────────────────────────────────────

/**
 * Playwright Test with a harness-managed browser session per test.
 * Session options come from UI_BROWSER / UI_HEADLESS / UI_WINDOW_SIZE
 * (set by `ui-harness run`) over the harness file.
 */
export const test = base.extend<HarnessTestFixtures, HarnessWorkerFixtures>({
  harnessConfig: [
    async ({}, use) => {
      await use(await loadHarnessConfig(process.env[ENV.CONFIG] ?? DEFAULT_CONFIG_PATH));
    },
    { scope: 'worker' },
  ],

  settings: [
    async ({}, use) => {
      await use(loadSettings());
    },
    { scope: 'worker' },
  ],

  sessionOptions: [
    async ({ harnessConfig }, use) => {
      await use(resolveSessionOptions({}, { file: harnessConfig.session }));
    },
    { scope: 'worker' },
  ],

  reportSink: async ({}, use, testInfo) => {
    await use(playwrightReporter(testInfo));
  },

  session: async ({ sessionOptions, harnessConfig, reportSink }, use, testInfo) => {
    await withBrowserSession(
      {
        testName: testInfo.title,
        launch: () =>
          launchSession(sessionOptions, { implicitTimeout: harnessConfig.timeouts.implicit }),
        reporter: reportSink,
        screenshotDir: harnessConfig.directories.screenshots,
        hasFailed: () => testInfo.status !== testInfo.expectedStatus,
      },
      use,
    );
  },

  driver: async ({ session }, use) => {
    await use(session.driver);
  },

  takeScreenshot: async ({ session, reportSink, harnessConfig }, use, testInfo) => {
    const capture = new ScreenshotCapture(session.driver, {
      reporter: reportSink,
      directory: harnessConfig.directories.screenshots,
    });
    await use((name) => capture.page(name ?? `${testInfo.title}_${timestamp()}`));
  },

  baseUrl: async ({ settings }, use) => {
    await use(settings.baseUrl);
  },

  validUserCredentials: async ({ settings }, use) => {
    await use({ email: settings.username, password: settings.password });
  },

  invalidUserCredentials: async ({}, use) => {
    await use({ email: 'invalid@example.com', password: 'wrongpassword' });
  },
});

export { expect } from '@playwright/test';
