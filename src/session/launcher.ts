import { chromium, firefox } from 'playwright';
import type { BrowserContextOptions, BrowserType, LaunchOptions, Page } from 'playwright';

import type { BrowserFamily, SessionOptions } from '../schema/options.js';
import { CHROMIUM_ARGS, TIMEOUTS } from '../config/defaults.js';
import { UnsupportedBrowserError } from '../config/errors.js';
import { formatWindowSize } from '../config/options.js';
import { PlaywrightDriver } from '../driver/playwrightDriver.js';
import type { BrowserDriver } from '../driver/types.js';
import * as log from '../utils/logger.js';

// ── Public types ─────────────────────────────────────────────

export interface BrowserSession {
  readonly options: SessionOptions;
  readonly driver: BrowserDriver;
  close(): Promise<void>;
}

export interface PlaywrightSession extends BrowserSession {
  readonly page: Page;
  readonly driver: PlaywrightDriver;
}

export type Engine = 'chromium' | 'firefox';

export interface LaunchPlan {
  engine: Engine;
  launchOptions: LaunchOptions;
  contextOptions: BrowserContextOptions;
}

export interface LaunchConfig {
  /** Default timeout for every Playwright action in the session. */
  implicitTimeout?: number;
}

// ── Launch planning ──────────────────────────────────────────

const ENGINES: Record<Engine, BrowserType> = { chromium, firefox };

/**
 * Translate session options into Playwright launch arguments.
 * Throws UnsupportedBrowserError for anything outside the known families,
 * so nothing is launched for a bad value.
 */
export function planLaunch(options: SessionOptions): LaunchPlan {
  const { width, height } = options.windowSize;
  const contextOptions: BrowserContextOptions = { viewport: { width, height } };
  const family: string = options.browser;

  switch (family) {
    case 'chrome':
    case 'edge':
      return {
        engine: 'chromium',
        launchOptions: {
          headless: options.headless,
          args: [...CHROMIUM_ARGS, `--window-size=${String(width)},${String(height)}`],
          ...(family === 'edge' ? { channel: 'msedge' } : {}),
        },
        contextOptions,
      };

    case 'firefox':
      return {
        engine: 'firefox',
        launchOptions: {
          headless: options.headless,
          args: [`--width=${String(width)}`, `--height=${String(height)}`],
        },
        contextOptions,
      };

    default:
      throw new UnsupportedBrowserError(family);
  }
}

// ── Session launcher ─────────────────────────────────────────

export async function launchSession(
  options: SessionOptions,
  config: LaunchConfig = {},
): Promise<PlaywrightSession> {
  const plan = planLaunch(options);

  const browser = await ENGINES[plan.engine].launch(plan.launchOptions);
  try {
    const context = await browser.newContext(plan.contextOptions);
    context.setDefaultTimeout(config.implicitTimeout ?? TIMEOUTS.IMPLICIT);
    const page = await context.newPage();

    log.session(
      `${familyLabel(options.browser)} started (headless: ${String(options.headless)}, window: ${formatWindowSize(options.windowSize)})`,
    );

    return {
      options,
      page,
      driver: new PlaywrightDriver(page),
      async close(): Promise<void> {
        await browser.close();
        log.session(`${familyLabel(options.browser)} closed`);
      },
    };
  } catch (err) {
    await browser.close();
    throw err;
  }
}

// ── Helpers ──────────────────────────────────────────────────

export function familyLabel(family: BrowserFamily): string {
  return family.charAt(0).toUpperCase() + family.slice(1);
}

/** Text body of the "Browser Info" attachment. */
export function describeSession(options: SessionOptions): string {
  return [
    `Browser: ${familyLabel(options.browser)}`,
    `Headless: ${String(options.headless)}`,
    `Window Size: ${formatWindowSize(options.windowSize)}`,
  ].join('\n');
}
