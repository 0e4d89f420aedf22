export { BasePage } from './basePage.js';
export type { BasePageOptions, EnterTextOptions, AlertAction } from './basePage.js';
export { LoginPage } from './loginPage.js';
export { ElementNotFoundError, PageAssertionError, WaitTimeoutError } from './errors.js';
