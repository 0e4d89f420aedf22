import { test } from '@playwright/test';
import type { TestInfo } from '@playwright/test';

import type { ReportSink } from '../report/sink.js';

/**
 * ReportSink bound to the running Playwright test. Steps and attachments
 * land in the test's own report, and from there in allure-playwright.
 */
export function playwrightReporter(testInfo: TestInfo): ReportSink {
  return {
    step: <T>(title: string, body: () => Promise<T>): Promise<T> => test.step<T>(title, body),

    async attach(name, body, contentType): Promise<void> {
      await testInfo.attach(name, { body, contentType });
    },
  };
}
