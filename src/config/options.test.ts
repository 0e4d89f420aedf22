import { Command } from 'commander';
import { describe, expect, it } from 'vitest';

import { ConfigurationError, UnsupportedBrowserError } from './errors.js';
import {
  formatWindowSize,
  isCI,
  parseWindowSize,
  registerSessionOptions,
  resolveSessionOptions,
} from './options.js';

describe('resolveSessionOptions', () => {
  it('falls back to chrome, headed, 1920x1080', () => {
    expect(resolveSessionOptions({}, { env: {} })).toEqual({
      browser: 'chrome',
      headless: false,
      headlessRequested: false,
      windowSize: { width: 1920, height: 1080 },
    });
  });

  it.each(['chrome', 'firefox', 'edge'] as const)('accepts %s', (browser) => {
    expect(resolveSessionOptions({ browser }, { env: {} }).browser).toBe(browser);
  });

  it('lower-cases the browser name', () => {
    expect(resolveSessionOptions({ browser: 'Firefox' }, { env: {} }).browser).toBe('firefox');
  });

  it('rejects an unsupported browser before anything launches', () => {
    expect(() => resolveSessionOptions({ browser: 'safari' }, { env: {} })).toThrow(
      UnsupportedBrowserError,
    );
    expect(() => resolveSessionOptions({ browser: 'safari' }, { env: {} })).toThrow(
      "Browser 'safari' is not supported",
    );
  });

  it('reports an unsupported browser as a configuration error', () => {
    expect(() => resolveSessionOptions({}, { env: { UI_BROWSER: 'opera' } })).toThrow(
      ConfigurationError,
    );
  });

  it('forces headless under CI whatever was requested', () => {
    const options = resolveSessionOptions({}, { env: { CI: 'true' } });
    expect(options.headless).toBe(true);
    expect(options.headlessRequested).toBe(false);
  });

  it('keeps the requested mode outside CI', () => {
    expect(resolveSessionOptions({ headless: true }, { env: {} }).headless).toBe(true);
    expect(resolveSessionOptions({}, { env: { CI: 'false' } }).headless).toBe(false);
  });

  it('prefers flags over environment over the harness file', () => {
    const env = { UI_BROWSER: 'edge', UI_WINDOW_SIZE: '1280x720' };
    const file = { browser: 'firefox', windowSize: '800,600', headless: true };

    expect(resolveSessionOptions({ browser: 'chrome' }, { env, file })).toEqual({
      browser: 'chrome',
      headless: true,
      headlessRequested: true,
      windowSize: { width: 1280, height: 720 },
    });
    expect(resolveSessionOptions({}, { env: {}, file }).browser).toBe('firefox');
  });

  it('reads UI_HEADLESS as a boolean', () => {
    expect(resolveSessionOptions({}, { env: { UI_HEADLESS: '1' } }).headless).toBe(true);
    expect(resolveSessionOptions({}, { env: { UI_HEADLESS: 'no' } }).headless).toBe(false);
  });
});

describe('parseWindowSize', () => {
  it('accepts comma and x separators', () => {
    expect(parseWindowSize('1920,1080')).toEqual({ width: 1920, height: 1080 });
    expect(parseWindowSize('1280x720')).toEqual({ width: 1280, height: 720 });
    expect(parseWindowSize(' 800 , 600 ')).toEqual({ width: 800, height: 600 });
  });

  it('rejects malformed sizes', () => {
    expect(() => parseWindowSize('big')).toThrow('Invalid window size "big" (expected WIDTH,HEIGHT)');
    expect(() => parseWindowSize('0,600')).toThrow(ConfigurationError);
  });

  it('formats back to WIDTH,HEIGHT', () => {
    expect(formatWindowSize({ width: 1024, height: 768 })).toBe('1024,768');
  });
});

describe('isCI', () => {
  it('is false when CI is unset, empty, false or 0', () => {
    expect(isCI({})).toBe(false);
    expect(isCI({ CI: '' })).toBe(false);
    expect(isCI({ CI: 'FALSE' })).toBe(false);
    expect(isCI({ CI: '0' })).toBe(false);
  });

  it('is true for any other value', () => {
    expect(isCI({ CI: 'true' })).toBe(true);
    expect(isCI({ CI: '1' })).toBe(true);
  });
});

describe('registerSessionOptions', () => {
  it('registers --browser, --headless and --window-size', () => {
    const program = registerSessionOptions(new Command().exitOverride());
    program.parse(['--browser', 'firefox', '--headless', '--window-size', '1024,768'], {
      from: 'user',
    });

    expect(program.opts()).toEqual({
      browser: 'firefox',
      headless: true,
      windowSize: '1024,768',
    });
  });

  it('leaves unset flags undefined so other sources apply', () => {
    const program = registerSessionOptions(new Command().exitOverride());
    program.parse([], { from: 'user' });

    expect(program.opts()).toEqual({});
  });
});
