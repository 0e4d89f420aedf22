import type { Command } from 'commander';

import { browserFamilySchema } from '../schema/options.js';
import type { SessionOptions, WindowSize } from '../schema/options.js';
import type { SessionDefaults } from '../schema/harnessConfig.js';
import { ENV, SESSION_DEFAULTS } from './defaults.js';
import { ConfigurationError, UnsupportedBrowserError } from './errors.js';

// ── Public types ─────────────────────────────────────────────

/** Raw values as they arrive from command-line flags. */
export interface SessionFlags {
  browser?: string;
  headless?: boolean;
  windowSize?: string;
}

export interface ResolveSources {
  env?: NodeJS.ProcessEnv;
  file?: SessionDefaults;
}

// ── Option registration ──────────────────────────────────────

export function registerSessionOptions(command: Command): Command {
  return command
    .option(
      '--browser <name>',
      'Browser to run tests: chrome, firefox, edge',
    )
    .option('--headless', 'Run tests in headless mode')
    .option(
      '--window-size <size>',
      `Browser window size (width,height) (default: "${SESSION_DEFAULTS.WINDOW_SIZE}")`,
    );
}

// ── Resolution ───────────────────────────────────────────────

/**
 * Merge flags, environment, harness file and defaults, in that order.
 * Throws before any browser is launched when a value is unusable.
 */
export function resolveSessionOptions(
  flags: SessionFlags = {},
  sources: ResolveSources = {},
): SessionOptions {
  const env = sources.env ?? process.env;
  const file = sources.file ?? {};

  const browserRaw = (
    flags.browser ??
    nonEmpty(env[ENV.BROWSER]) ??
    file.browser ??
    SESSION_DEFAULTS.BROWSER
  ).toLowerCase();
  const parsedBrowser = browserFamilySchema.safeParse(browserRaw);
  if (!parsedBrowser.success) {
    throw new UnsupportedBrowserError(browserRaw);
  }

  const headlessRequested =
    flags.headless ??
    parseBooleanFlag(env[ENV.HEADLESS]) ??
    file.headless ??
    SESSION_DEFAULTS.HEADLESS;

  const windowSize = parseWindowSize(
    flags.windowSize ??
      nonEmpty(env[ENV.WINDOW_SIZE]) ??
      file.windowSize ??
      SESSION_DEFAULTS.WINDOW_SIZE,
  );

  return {
    browser: parsedBrowser.data,
    headless: headlessRequested || isCI(env),
    headlessRequested,
    windowSize,
  };
}

/** Accepts `1920,1080` and `1920x1080`. */
export function parseWindowSize(raw: string): WindowSize {
  const match = /^\s*(\d+)\s*[,xX]\s*(\d+)\s*$/.exec(raw);
  const width = Number(match?.[1]);
  const height = Number(match?.[2]);
  if (!match || width <= 0 || height <= 0) {
    throw new ConfigurationError(
      `Invalid window size "${raw}" (expected WIDTH,HEIGHT)`,
    );
  }
  return { width, height };
}

export function formatWindowSize(size: WindowSize): string {
  return `${String(size.width)},${String(size.height)}`;
}

/** `CI` set to anything but an empty string, `false` or `0`. */
export function isCI(env: NodeJS.ProcessEnv = process.env): boolean {
  const value = nonEmpty(env[ENV.CI]);
  if (value === undefined) return false;
  return !['false', '0'].includes(value.toLowerCase());
}

// ── Helpers ──────────────────────────────────────────────────

function nonEmpty(value: string | undefined): string | undefined {
  return value !== undefined && value.trim().length > 0 ? value.trim() : undefined;
}

function parseBooleanFlag(value: string | undefined): boolean | undefined {
  const trimmed = nonEmpty(value)?.toLowerCase();
  if (trimmed === undefined) return undefined;
  return ['1', 'true', 'yes', 'on'].includes(trimmed);
}
