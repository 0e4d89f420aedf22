import type { Locator } from '../schema/locator.js';
import { WaitTimeoutError } from '../utils/wait.js';

export { WaitTimeoutError };

// ── Lookup failures ──────────────────────────────────────────

export class ElementNotFoundError extends WaitTimeoutError {
  readonly locator: Locator;

  constructor(
    message: string,
    locator: Locator,
    timeoutMs: number,
    options?: { cause?: unknown },
  ) {
    super(message, timeoutMs, options);
    this.name = 'ElementNotFoundError';
    this.locator = locator;
  }
}

// ── Assertion failures ───────────────────────────────────────

export class PageAssertionError extends Error {
  readonly expected: string;
  readonly actual: string;

  constructor(message: string, expected: string, actual: string) {
    super(message);
    this.name = 'PageAssertionError';
    this.expected = expected;
    this.actual = actual;
  }
}
