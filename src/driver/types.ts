import type { Locator } from '../schema/locator.js';

// ── Element ─────────────────────────────────────────────────

/** One matched element, as page objects see it. */
export interface PageElement {
  text(): Promise<string>;
  attribute(name: string): Promise<string | null>;
  isVisible(): Promise<boolean>;
  isEnabled(): Promise<boolean>;
  click(): Promise<void>;
  clear(): Promise<void>;
  type(text: string): Promise<void>;
  hover(): Promise<void>;
  doubleClick(): Promise<void>;
  rightClick(): Promise<void>;
  dragTo(target: PageElement): Promise<void>;
  scrollIntoView(): Promise<void>;
  screenshot(filePath: string): Promise<void>;
}

// ── Dialog ──────────────────────────────────────────────────

export interface DialogHandle {
  readonly message: string;
  accept(): Promise<void>;
  dismiss(): Promise<void>;
}

// ── Driver ──────────────────────────────────────────────────

export interface NavigationOptions {
  /** Milliseconds before the navigation gives up. */
  timeout?: number;
}

/**
 * The session handle page objects talk to.
 *
 * Every lookup is a snapshot: `query` returns what matches right now and
 * never waits. Waiting is the page object's job.
 */
export interface BrowserDriver {
  goto(url: string, options?: NavigationOptions): Promise<void>;
  reload(options?: NavigationOptions): Promise<void>;
  goBack(options?: NavigationOptions): Promise<void>;
  currentUrl(): Promise<string>;
  title(): Promise<string>;
  pageSource(): Promise<string>;
  /** Evaluate a JavaScript expression in the page. */
  evaluate(expression: string): Promise<unknown>;
  query(locator: Locator): Promise<PageElement[]>;
  screenshot(filePath: string): Promise<void>;
  /** Oldest dialog opened and not yet handled, if any. */
  takeDialog(): Promise<DialogHandle | undefined>;
  clearCookies(): Promise<void>;
  setWindowSize(width: number, height: number): Promise<void>;
}
