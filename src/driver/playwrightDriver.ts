import type { Locator as PlaywrightLocator, Page } from 'playwright';

import type { Locator } from '../schema/locator.js';
import type { BrowserDriver, DialogHandle, NavigationOptions, PageElement } from './types.js';
import { DialogQueue } from './dialogs.js';
import { resolveLocator } from './selectors.js';

// ── Element ──────────────────────────────────────────────────

export class PlaywrightElement implements PageElement {
  constructor(readonly locator: PlaywrightLocator) {}

  text(): Promise<string> {
    return this.locator.innerText();
  }

  attribute(name: string): Promise<string | null> {
    return this.locator.getAttribute(name);
  }

  isVisible(): Promise<boolean> {
    return this.locator.isVisible();
  }

  isEnabled(): Promise<boolean> {
    return this.locator.isEnabled();
  }

  click(): Promise<void> {
    return this.locator.click();
  }

  clear(): Promise<void> {
    return this.locator.clear();
  }

  type(text: string): Promise<void> {
    return this.locator.pressSequentially(text);
  }

  hover(): Promise<void> {
    return this.locator.hover();
  }

  doubleClick(): Promise<void> {
    return this.locator.dblclick();
  }

  rightClick(): Promise<void> {
    return this.locator.click({ button: 'right' });
  }

  async dragTo(target: PageElement): Promise<void> {
    if (!(target instanceof PlaywrightElement)) {
      throw new TypeError('Drag target does not belong to a Playwright page');
    }
    await this.locator.dragTo(target.locator);
  }

  scrollIntoView(): Promise<void> {
    return this.locator.scrollIntoViewIfNeeded();
  }

  async screenshot(filePath: string): Promise<void> {
    await this.locator.screenshot({ path: filePath });
  }
}

// ── Driver ───────────────────────────────────────────────────

/**
 * BrowserDriver over a Playwright page.
 *
 * Dialogs are queued as they open. Holding a listener keeps Playwright
 * from auto-dismissing them before a page object gets to handle them;
 * any left unhandled are dismissed before the next navigation.
 */
export class PlaywrightDriver implements BrowserDriver {
  private readonly dialogs = new DialogQueue();

  constructor(readonly page: Page) {
    page.on('dialog', (dialog) => {
      this.dialogs.push(dialog);
    });
  }

  async goto(url: string, options: NavigationOptions = {}): Promise<void> {
    await this.dialogs.dismissPending();
    await this.page.goto(url, { ...options, waitUntil: 'domcontentloaded' });
  }

  async reload(options: NavigationOptions = {}): Promise<void> {
    await this.dialogs.dismissPending();
    await this.page.reload({ ...options, waitUntil: 'domcontentloaded' });
  }

  async goBack(options: NavigationOptions = {}): Promise<void> {
    await this.dialogs.dismissPending();
    await this.page.goBack({ ...options, waitUntil: 'domcontentloaded' });
  }

  async currentUrl(): Promise<string> {
    return this.page.url();
  }

  title(): Promise<string> {
    return this.page.title();
  }

  pageSource(): Promise<string> {
    return this.page.content();
  }

  evaluate(expression: string): Promise<unknown> {
    return this.page.evaluate(expression);
  }

  async query(locator: Locator): Promise<PageElement[]> {
    const matches = await resolveLocator(this.page, locator).all();
    return matches.map((match) => new PlaywrightElement(match));
  }

  async screenshot(filePath: string): Promise<void> {
    await this.page.screenshot({ path: filePath, fullPage: true });
  }

  async takeDialog(): Promise<DialogHandle | undefined> {
    return this.dialogs.take();
  }

  async clearCookies(): Promise<void> {
    await this.page.context().clearCookies();
  }

  async setWindowSize(width: number, height: number): Promise<void> {
    await this.page.setViewportSize({ width, height });
  }
}
