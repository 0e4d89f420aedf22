// ── Configuration errors ─────────────────────────────────────

export class ConfigurationError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConfigurationError';
  }
}

export class UnsupportedBrowserError extends ConfigurationError {
  readonly browser: string;

  constructor(browser: string) {
    super(`Browser '${browser}' is not supported`);
    this.name = 'UnsupportedBrowserError';
    this.browser = browser;
  }
}
