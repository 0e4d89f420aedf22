import type { BrowserDriver } from '../driver/types.js';
import { by } from '../schema/locator.js';
import { BasePage } from './basePage.js';
import type { BasePageOptions } from './basePage.js';

/**
 * Login / signup page of the demo shop the harness ships settings for.
 * Doubles as the reference for writing page objects on top of BasePage.
 */
export class LoginPage extends BasePage {
  static readonly PATH = '/login';

  static readonly locators = {
    emailInput: by.css('input[data-qa="login-email"]'),
    passwordInput: by.css('input[data-qa="login-password"]'),
    loginButton: by.css('button[data-qa="login-button"]'),
    errorMessage: by.css('form[action="/login"] p'),
    loggedInAs: by.xpath('//a[contains(., "Logged in as")]'),
    logoutLink: by.css('a[href="/logout"]'),
  } as const;

  constructor(
    driver: BrowserDriver,
    private readonly baseUrl: string,
    options: BasePageOptions = {},
  ) {
    super(driver, options);
  }

  async open(): Promise<void> {
    await this.navigateTo(new URL(LoginPage.PATH, this.baseUrl).toString());
  }

  async login(email: string, password: string): Promise<void> {
    await this.enterText(LoginPage.locators.emailInput, email);
    await this.enterText(LoginPage.locators.passwordInput, password);
    await this.click(LoginPage.locators.loginButton);
  }

  loginError(): Promise<string> {
    return this.getText(LoginPage.locators.errorMessage);
  }

  isLoggedIn(): Promise<boolean> {
    return this.isVisible(LoginPage.locators.loggedInAs);
  }

  async logout(): Promise<void> {
    await this.click(LoginPage.locators.logoutLink);
    await this.waitForUrlContains(LoginPage.PATH);
  }
}
