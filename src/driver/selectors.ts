import type { Locator as PlaywrightLocator, Page } from 'playwright';

import type { Locator } from '../schema/locator.js';

// ── Resolver ──────────────────────────────────────────────────

/**
 * Maps a harness Locator to a Playwright Locator.
 *
 *   id        → #value (attribute selector, so ids with dots work)
 *   css       → page.locator(value)
 *   xpath     → xpath=value
 *   name      → [name="value"]
 *   class     → .value
 *   tag       → value
 *   text      → page.getByText(value)
 *   linkText  → page.getByRole('link', { name: value, exact: true })
 *   testid    → page.getByTestId(value)
 */
export function resolveLocator(page: Page, locator: Locator): PlaywrightLocator {
  switch (locator.strategy) {
    case 'id':
      return page.locator(`[id="${escapeAttribute(locator.value)}"]`);
    case 'css':
      return page.locator(locator.value);
    case 'xpath':
      return page.locator(`xpath=${locator.value}`);
    case 'name':
      return page.locator(`[name="${escapeAttribute(locator.value)}"]`);
    case 'class':
      return page.locator(`.${locator.value}`);
    case 'tag':
      return page.locator(locator.value);
    case 'text':
      return page.getByText(locator.value);
    case 'linkText':
      return page.getByRole('link', { name: locator.value, exact: true });
    case 'testid':
      return page.getByTestId(locator.value);
  }
}

// ── Description helper ────────────────────────────────────────

/** Human-readable one-liner describing the locator for reports and errors. */
export function describeLocator(locator: Locator): string {
  switch (locator.strategy) {
    case 'id':
      return `#${locator.value}`;
    case 'css':
    case 'tag':
      return locator.value;
    case 'xpath':
      return `xpath=${locator.value}`;
    case 'name':
      return `[name="${locator.value}"]`;
    case 'class':
      return `.${locator.value}`;
    case 'text':
      return `text="${locator.value}"`;
    case 'linkText':
      return `link="${locator.value}"`;
    case 'testid':
      return `[data-testid="${locator.value}"]`;
  }
}

function escapeAttribute(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/"/g, '\\"');
}
