import type { BrowserDriver, NavigationOptions, PageElement } from '../driver/types.js';
import { describeLocator } from '../driver/selectors.js';
import type { ReportSink } from '../report/sink.js';
import { consoleReporter } from '../report/sink.js';
import { ScreenshotCapture } from '../report/screenshots.js';
import type { Locator } from '../schema/locator.js';
import { timeoutsSchema } from '../schema/harnessConfig.js';
import type { Timeouts } from '../schema/harnessConfig.js';
import * as log from '../utils/logger.js';
import { timestamp } from '../utils/names.js';
import { isTimeoutError, pollUntil, WaitTimeoutError } from '../utils/wait.js';
import type { Condition } from '../utils/wait.js';
import { ElementNotFoundError, PageAssertionError } from './errors.js';

// ── Public types ─────────────────────────────────────────────

export interface BasePageOptions {
  reporter?: ReportSink;
  screenshotDir?: string;
  timeouts?: Partial<Timeouts>;
}

export interface EnterTextOptions {
  clearFirst?: boolean;
  timeout?: number;
}

export type AlertAction = 'accept' | 'dismiss';

interface WaitFailure {
  /** Screenshot name prefix; a timestamp is appended. */
  tag: string;
  error: (cause: WaitTimeoutError) => Error;
}

// ── Base page ────────────────────────────────────────────────

/**
 * Common functionality for all page objects.
 *
 * Every lookup waits with one polling policy (see `pollUntil`). A wait
 * that runs out captures a screenshot and throws a WaitTimeoutError;
 * a failed assertion captures one and throws a PageAssertionError.
 * The `is*` probes treat a timeout as `false`.
 */
export class BasePage {
  protected readonly reporter: ReportSink;
  protected readonly screenshots: ScreenshotCapture;
  protected readonly timeouts: Timeouts;

  constructor(
    protected readonly driver: BrowserDriver,
    options: BasePageOptions = {},
  ) {
    this.reporter = options.reporter ?? consoleReporter;
    this.timeouts = { ...timeoutsSchema.parse({}), ...options.timeouts };
    this.screenshots = new ScreenshotCapture(driver, {
      reporter: this.reporter,
      ...(options.screenshotDir !== undefined ? { directory: options.screenshotDir } : {}),
    });
  }

  // ── Navigation ─────────────────────────────────────────────

  async navigateTo(url: string): Promise<void> {
    await this.navigate(`Navigate to URL: ${url}`, (options) => this.driver.goto(url, options));
  }

  currentUrl(): Promise<string> {
    return this.driver.currentUrl();
  }

  title(): Promise<string> {
    return this.driver.title();
  }

  async refresh(): Promise<void> {
    await this.navigate('Refresh page', (options) => this.driver.reload(options));
  }

  async goBack(): Promise<void> {
    await this.navigate('Navigate back', (options) => this.driver.goBack(options));
  }

  async waitForPageLoad(timeout = this.timeouts.pageLoad): Promise<void> {
    await this.reporter.step('Wait for page to load', () => this.untilLoaded(timeout, timeout));
  }

  // ── Element lookup ─────────────────────────────────────────

  findElement(locator: Locator, timeout = this.timeouts.element): Promise<PageElement> {
    return this.waitFor(this.presenceOf(locator), timeout, {
      tag: `element_not_found_${locator.value}`,
      error: (cause) => this.notFound('Element not found', locator, timeout, cause),
    });
  }

  async findElements(locator: Locator, timeout = this.timeouts.element): Promise<PageElement[]> {
    await this.waitFor(this.presenceOf(locator), timeout, {
      tag: `elements_not_found_${locator.value}`,
      error: (cause) => this.notFound('Elements not found', locator, timeout, cause),
    });
    return this.driver.query(locator);
  }

  // ── Interaction ────────────────────────────────────────────

  async click(locator: Locator, timeout = this.timeouts.element): Promise<void> {
    await this.reporter.step(`Click element: ${describeLocator(locator)}`, async () => {
      const tag = `click_failed_${locator.value}`;
      const element = await this.waitFor(this.clickabilityOf(locator), timeout, {
        tag,
        error: (cause) =>
          new WaitTimeoutError(`Element not clickable: ${describeLocator(locator)}`, timeout, { cause }),
      });
      await this.guard(tag, () => element.click());
    });
  }

  async enterText(locator: Locator, text: string, options: EnterTextOptions = {}): Promise<void> {
    const timeout = options.timeout ?? this.timeouts.element;
    const clearFirst = options.clearFirst ?? true;

    await this.reporter.step(
      `Enter text '${text}' into element: ${describeLocator(locator)}`,
      async () => {
        const tag = `text_entry_failed_${locator.value}`;
        const element = await this.waitFor(this.clickabilityOf(locator), timeout, {
          tag,
          error: (cause) =>
            new WaitTimeoutError(
              `Cannot enter text in element: ${describeLocator(locator)}`,
              timeout,
              { cause },
            ),
        });
        await this.guard(tag, async () => {
          if (clearFirst) await element.clear();
          await element.type(text);
        });
      },
    );
  }

  async hover(locator: Locator): Promise<void> {
    await this.reporter.step(`Hover over element: ${describeLocator(locator)}`, async () => {
      const element = await this.findElement(locator);
      await this.guard(`hover_failed_${locator.value}`, () => element.hover());
    });
  }

  async doubleClick(locator: Locator): Promise<void> {
    await this.reporter.step(`Double click element: ${describeLocator(locator)}`, async () => {
      const element = await this.findElement(locator);
      await this.guard(`double_click_failed_${locator.value}`, () => element.doubleClick());
    });
  }

  async rightClick(locator: Locator): Promise<void> {
    await this.reporter.step(`Right click element: ${describeLocator(locator)}`, async () => {
      const element = await this.findElement(locator);
      await this.guard(`right_click_failed_${locator.value}`, () => element.rightClick());
    });
  }

  async dragAndDrop(source: Locator, target: Locator): Promise<void> {
    await this.reporter.step(
      `Drag element ${describeLocator(source)} to ${describeLocator(target)}`,
      async () => {
        const from = await this.findElement(source);
        const to = await this.findElement(target);
        await this.guard(`drag_failed_${source.value}`, () => from.dragTo(to));
      },
    );
  }

  async scrollToElement(locator: Locator): Promise<void> {
    await this.reporter.step(`Scroll to element: ${describeLocator(locator)}`, async () => {
      const element = await this.findElement(locator);
      await element.scrollIntoView();
    });
  }

  async scrollToTop(): Promise<void> {
    await this.reporter.step('Scroll to top of page', async () => {
      await this.driver.evaluate('window.scrollTo(0, 0)');
    });
  }

  async scrollToBottom(): Promise<void> {
    await this.reporter.step('Scroll to bottom of page', async () => {
      await this.driver.evaluate('window.scrollTo(0, document.body.scrollHeight)');
    });
  }

  // ── Query ──────────────────────────────────────────────────

  async getText(locator: Locator, timeout = this.timeouts.element): Promise<string> {
    const element = await this.waitFor(this.presenceOf(locator), timeout, {
      tag: `get_text_failed_${locator.value}`,
      error: (cause) => this.notFound('Cannot get text from element', locator, timeout, cause),
    });
    return element.text();
  }

  async getAttribute(
    locator: Locator,
    attribute: string,
    timeout = this.timeouts.element,
  ): Promise<string | null> {
    const element = await this.waitFor(this.presenceOf(locator), timeout, {
      tag: `get_attribute_failed_${locator.value}`,
      error: (cause) => this.notFound('Cannot get attribute from element', locator, timeout, cause),
    });
    return element.attribute(attribute);
  }

  isPresent(locator: Locator, timeout = this.timeouts.probe): Promise<boolean> {
    return this.probe(this.presenceOf(locator), timeout);
  }

  isVisible(locator: Locator, timeout = this.timeouts.probe): Promise<boolean> {
    return this.probe(this.visibilityOf(locator), timeout);
  }

  isClickable(locator: Locator, timeout = this.timeouts.probe): Promise<boolean> {
    return this.probe(this.clickabilityOf(locator), timeout);
  }

  // ── Explicit waits ─────────────────────────────────────────

  waitForVisible(locator: Locator, timeout = this.timeouts.element): Promise<PageElement> {
    return this.reporter.step(
      `Wait for element to be visible: ${describeLocator(locator)}`,
      () =>
        this.waitFor(this.visibilityOf(locator), timeout, {
          tag: `wait_visible_failed_${locator.value}`,
          error: (cause) =>
            new WaitTimeoutError(`Element not visible: ${describeLocator(locator)}`, timeout, { cause }),
        }),
    );
  }

  async waitForInvisible(locator: Locator, timeout = this.timeouts.element): Promise<void> {
    await this.reporter.step(
      `Wait for element to be invisible: ${describeLocator(locator)}`,
      () =>
        this.waitFor(this.invisibilityOf(locator), timeout, {
          tag: `wait_invisible_failed_${locator.value}`,
          error: (cause) =>
            new WaitTimeoutError(`Element still visible: ${describeLocator(locator)}`, timeout, { cause }),
        }),
    );
  }

  async waitForText(locator: Locator, text: string, timeout = this.timeouts.element): Promise<void> {
    await this.reporter.step(
      `Wait for text '${text}' in element: ${describeLocator(locator)}`,
      () =>
        this.waitFor(this.textIn(locator, text), timeout, {
          tag: `wait_text_failed_${locator.value}`,
          error: (cause) =>
            new WaitTimeoutError(
              `Text '${text}' not found in element: ${describeLocator(locator)}`,
              timeout,
              { cause },
            ),
        }),
    );
  }

  async waitForUrlContains(text: string, timeout = this.timeouts.element): Promise<void> {
    await this.reporter.step(`Wait for URL to contain: ${text}`, () =>
      this.waitFor(
        async () => (await this.driver.currentUrl()).includes(text),
        timeout,
        {
          tag: `url_wait_failed_${text}`,
          error: (cause) => new WaitTimeoutError(`URL does not contain: ${text}`, timeout, { cause }),
        },
      ),
    );
  }

  // ── Screenshots ────────────────────────────────────────────

  takeScreenshot(name?: string): Promise<string> {
    return this.screenshots.page(name);
  }

  /** Falls back to a whole-page capture when the element cannot be captured. */
  async takeElementScreenshot(locator: Locator, name?: string): Promise<string> {
    try {
      const element = await this.findElement(locator);
      return await this.screenshots.element(element, name);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      log.warn(`Failed to take element screenshot: ${message}`);
      return this.screenshots.page(name);
    }
  }

  // ── Browser utilities ──────────────────────────────────────

  executeScript(expression: string): Promise<unknown> {
    return this.reporter.step(`Execute JavaScript: ${expression.slice(0, 50)}...`, () =>
      this.driver.evaluate(expression),
    );
  }

  /** Waits for a dialog, attaches its text, then accepts or dismisses it. */
  handleAlert(action: AlertAction = 'accept'): Promise<string> {
    return this.reporter.step(`Handle alert - action: ${action}`, async () => {
      const dialog = await pollUntil(() => this.driver.takeDialog(), {
        timeoutMs: this.timeouts.alert,
        intervalMs: this.timeouts.pollInterval,
        message: 'No alert present',
      });
      await this.reporter.attach('Alert Text', dialog.message, 'text/plain');
      if (action === 'accept') {
        await dialog.accept();
      } else {
        await dialog.dismiss();
      }
      return dialog.message;
    });
  }

  pageSource(): Promise<string> {
    return this.driver.pageSource();
  }

  async clearCookies(): Promise<void> {
    await this.reporter.step('Clear browser cookies', () => this.driver.clearCookies());
  }

  async setWindowSize(width: number, height: number): Promise<void> {
    await this.reporter.step(`Set window size: ${String(width)}x${String(height)}`, () =>
      this.driver.setWindowSize(width, height),
    );
  }

  // ── Assertions ─────────────────────────────────────────────

  async assertElementText(
    locator: Locator,
    expected: string,
    timeout = this.timeouts.element,
  ): Promise<void> {
    await this.reporter.step(`Assert element text equals '${expected}'`, async () => {
      const actual = await this.getText(locator, timeout);
      if (actual !== expected) {
        await this.failAssertion(`Expected '${expected}', but got '${actual}'`, expected, actual);
      }
    });
  }

  async assertContainsText(
    locator: Locator,
    expected: string,
    timeout = this.timeouts.element,
  ): Promise<void> {
    await this.reporter.step(`Assert element contains text '${expected}'`, async () => {
      const actual = await this.getText(locator, timeout);
      if (!actual.includes(expected)) {
        await this.failAssertion(`Text '${expected}' not found in '${actual}'`, expected, actual);
      }
    });
  }

  async assertTitle(expected: string): Promise<void> {
    await this.reporter.step(`Assert page title equals '${expected}'`, async () => {
      const actual = await this.title();
      if (actual !== expected) {
        await this.failAssertion(
          `Expected title '${expected}', but got '${actual}'`,
          expected,
          actual,
        );
      }
    });
  }

  async assertUrl(expected: string): Promise<void> {
    await this.reporter.step(`Assert current URL equals '${expected}'`, async () => {
      const actual = await this.currentUrl();
      if (actual !== expected) {
        await this.failAssertion(`Expected URL '${expected}', but got '${actual}'`, expected, actual);
      }
    });
  }

  async assertUrlContains(expected: string): Promise<void> {
    await this.reporter.step(`Assert URL contains '${expected}'`, async () => {
      const actual = await this.currentUrl();
      if (!actual.includes(expected)) {
        await this.failAssertion(
          `Text '${expected}' not found in URL '${actual}'`,
          expected,
          actual,
        );
      }
    });
  }

  // ── Conditions ─────────────────────────────────────────────

  protected presenceOf(locator: Locator): Condition<PageElement> {
    return async () => (await this.driver.query(locator))[0];
  }

  protected visibilityOf(locator: Locator): Condition<PageElement> {
    return async () => {
      for (const element of await this.driver.query(locator)) {
        if (await element.isVisible()) return element;
      }
      return undefined;
    };
  }

  protected clickabilityOf(locator: Locator): Condition<PageElement> {
    return async () => {
      for (const element of await this.driver.query(locator)) {
        if ((await element.isVisible()) && (await element.isEnabled())) return element;
      }
      return undefined;
    };
  }

  protected invisibilityOf(locator: Locator): Condition<true> {
    return async () => {
      for (const element of await this.driver.query(locator)) {
        if (await element.isVisible()) return false;
      }
      return true;
    };
  }

  protected textIn(locator: Locator, text: string): Condition<true> {
    return async () => {
      const element = (await this.driver.query(locator))[0];
      return element !== undefined && (await element.text()).includes(text);
    };
  }

  // ── Internals ──────────────────────────────────────────────

  /**
   * Navigation and the ready-state wait after it share one page-load
   * window. Running out of it, in either part, is a page load timeout.
   */
  private async navigate(
    title: string,
    action: (options: NavigationOptions) => Promise<void>,
  ): Promise<void> {
    const timeout = this.timeouts.pageLoad;
    const deadline = Date.now() + timeout;
    await this.reporter.step(title, async () => {
      try {
        await action({ timeout });
      } catch (err) {
        if (!isTimeoutError(err)) {
          await this.captureQuietly('navigation_failed');
          throw err;
        }
        await this.captureQuietly('page_load_timeout');
        throw new WaitTimeoutError('Page load timeout', timeout, { cause: err });
      }
      await this.reporter.step('Wait for page to load', () =>
        this.untilLoaded(Math.max(deadline - Date.now(), 0), timeout),
      );
    });
  }

  private async untilLoaded(windowMs: number, timeoutMs: number): Promise<void> {
    await this.waitFor(
      async () => (await this.driver.evaluate('document.readyState')) === 'complete',
      windowMs,
      {
        tag: 'page_load_timeout',
        error: (cause) => new WaitTimeoutError('Page load timeout', timeoutMs, { cause }),
      },
    );
  }

  private async waitFor<T>(
    condition: Condition<T>,
    timeoutMs: number,
    failure: WaitFailure,
  ): Promise<T> {
    try {
      return await pollUntil(condition, {
        timeoutMs,
        intervalMs: this.timeouts.pollInterval,
      });
    } catch (err) {
      if (!(err instanceof WaitTimeoutError)) throw err;
      await this.captureQuietly(failure.tag);
      throw failure.error(err);
    }
  }

  private async probe<T>(condition: Condition<T>, timeoutMs: number): Promise<boolean> {
    try {
      await pollUntil(condition, { timeoutMs, intervalMs: this.timeouts.pollInterval });
      return true;
    } catch (err) {
      if (err instanceof WaitTimeoutError) return false;
      throw err;
    }
  }

  /** Run an action; on failure, screenshot and rethrow the original error. */
  private async guard(tag: string, action: () => Promise<void>): Promise<void> {
    try {
      await action();
    } catch (err) {
      await this.captureQuietly(tag);
      throw err;
    }
  }

  private async failAssertion(message: string, expected: string, actual: string): Promise<never> {
    await this.captureQuietly('assertion_failed');
    throw new PageAssertionError(message, expected, actual);
  }

  private notFound(
    prefix: string,
    locator: Locator,
    timeoutMs: number,
    cause: WaitTimeoutError,
  ): ElementNotFoundError {
    return new ElementNotFoundError(
      `${prefix}: ${describeLocator(locator)}`,
      locator,
      timeoutMs,
      { cause },
    );
  }

  /** Diagnostic capture on a failure path. Never throws. */
  private async captureQuietly(tag: string): Promise<void> {
    try {
      await this.screenshots.page(`${tag}_${timestamp()}`);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      log.warn(`Failed to capture screenshot: ${message}`);
    }
  }
}
