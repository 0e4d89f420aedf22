import type { ReportSink } from '../report/sink.js';
import { consoleReporter } from '../report/sink.js';
import { ScreenshotCapture } from '../report/screenshots.js';
import { DIRECTORIES } from '../config/defaults.js';
import * as log from '../utils/logger.js';
import { timestamp, toFileName } from '../utils/names.js';
import type { BrowserSession } from './launcher.js';
import { describeSession } from './launcher.js';

// ── Public types ─────────────────────────────────────────────

export type SessionState = 'inactive' | 'active' | 'tornDown';

export interface SessionHooks<S extends BrowserSession> {
  testName: string;
  launch(): Promise<S>;
  reporter?: ReportSink;
  screenshotDir?: string;
  /**
   * Failure as the runner sees it. Needed where the body is a fixture's
   * `use`, which resolves even when the test fails.
   */
  hasFailed?: () => boolean;
  onStateChange?: (state: SessionState) => void;
}

// ── Lifecycle ────────────────────────────────────────────────

/**
 * One test's browser session: inactive → active → tornDown.
 *
 * A failing test gets exactly one failure screenshot, taken while the
 * session is still open. The session is closed whatever the outcome, and
 * the body's error is what propagates.
 */
export async function withBrowserSession<S extends BrowserSession>(
  hooks: SessionHooks<S>,
  body: (session: S) => Promise<void>,
): Promise<void> {
  const reporter = hooks.reporter ?? consoleReporter;
  hooks.onStateChange?.('inactive');

  const session = await hooks.launch();
  hooks.onStateChange?.('active');

  let threw = false;
  try {
    await attachQuietly(reporter, 'Browser Info', describeSession(session.options));
    await body(session);
  } catch (err) {
    threw = true;
    throw err;
  } finally {
    const failed = threw || hooks.hasFailed?.() === true;
    if (failed) {
      await captureFailureScreenshot(session, hooks.testName, {
        reporter,
        directory: hooks.screenshotDir ?? DIRECTORIES.SCREENSHOTS,
      });
    }
    await closeSession(session, failed);
    hooks.onStateChange?.('tornDown');
  }
}

/**
 * Screenshot named `FAILED_<test>_<timestamp>`.
 * Returns undefined, after logging, when the capture itself fails.
 */
export async function captureFailureScreenshot(
  session: BrowserSession,
  testName: string,
  options: { reporter: ReportSink; directory: string },
): Promise<string | undefined> {
  const name = `FAILED_${toFileName(testName)}_${timestamp()}`;
  try {
    const capture = new ScreenshotCapture(session.driver, options);
    return await capture.page(name, 'Failure Screenshot');
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    log.warn(`Failed to capture screenshot: ${message}`);
    return undefined;
  }
}

// ── Helpers ──────────────────────────────────────────────────

async function closeSession(session: BrowserSession, testFailed: boolean): Promise<void> {
  try {
    await session.close();
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    log.warn(`Failed to close browser session: ${message}`);
    // A failing test keeps its own error.
    if (!testFailed) throw err;
  }
}

async function attachQuietly(reporter: ReportSink, name: string, body: string): Promise<void> {
  try {
    await reporter.attach(name, body, 'text/plain');
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    log.warn(`Failed to attach ${name}: ${message}`);
  }
}
