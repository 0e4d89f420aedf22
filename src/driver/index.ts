/**
 * Driver module.
 * The session handle page objects talk to, and its Playwright implementation.
 */

export type { BrowserDriver, PageElement, DialogHandle, NavigationOptions } from './types.js';
export { PlaywrightDriver, PlaywrightElement } from './playwrightDriver.js';
export { resolveLocator, describeLocator } from './selectors.js';
