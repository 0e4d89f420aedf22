import { spawn } from 'node:child_process';
import { createRequire } from 'node:module';

import type { Command } from 'commander';

import { DEFAULT_CONFIG_PATH, ENV } from '../config/defaults.js';
import { loadHarnessConfig } from '../config/loader.js';
import { formatWindowSize, registerSessionOptions, resolveSessionOptions } from '../config/options.js';
import type { SessionFlags } from '../config/options.js';
import { loadSettings } from '../config/settings.js';
import type { HarnessConfig } from '../schema/harnessConfig.js';
import type { SessionOptions } from '../schema/options.js';
import { prepareTestEnvironment } from '../session/environment.js';
import * as log from '../utils/logger.js';

// ── Shared option shape ──────────────────────────────────────

interface CommonOpts extends SessionFlags {
  config: string;
}

const EXIT_CONFIG_ERROR = 4;

// ── Resolution ───────────────────────────────────────────────

async function resolve(opts: CommonOpts): Promise<{
  harnessConfig: HarnessConfig;
  options: SessionOptions;
}> {
  const harnessConfig = await loadHarnessConfig(opts.config);
  const options = resolveSessionOptions(opts, { file: harnessConfig.session });
  return { harnessConfig, options };
}

function withCommonOptions(command: Command): Command {
  return registerSessionOptions(command).option(
    '--config <path>',
    'Path to harness config file',
    process.env[ENV.CONFIG] ?? DEFAULT_CONFIG_PATH,
  );
}

function reportError(err: unknown): void {
  const message = err instanceof Error ? err.message : String(err);
  process.stderr.write(`Error: ${message}\n`);
  process.exitCode = EXIT_CONFIG_ERROR;
}

// ── run ──────────────────────────────────────────────────────

/**
 * `ui-harness run [args...]` prepares the output directories, then hands
 * over to `playwright test`. Unknown options pass through untouched.
 */
export function registerRunCommand(program: Command): void {
  withCommonOptions(
    program
      .command('run')
      .description('Run the Playwright suite with the given session options')
      .argument('[args...]', 'Arguments passed to playwright test')
      .allowUnknownOption(),
  ).action(async (args: string[], opts: CommonOpts) => {
    let resolved: Awaited<ReturnType<typeof resolve>>;
    try {
      resolved = await resolve(opts);
      await prepareTestEnvironment(resolved.harnessConfig.directories, loadSettings(), resolved.options);
    } catch (err) {
      reportError(err);
      return;
    }

    const { options } = resolved;
    log.section(
      `Running tests on ${options.browser} (headless: ${String(options.headless)})`,
    );

    try {
      process.exitCode = await runPlaywright(args, {
        ...process.env,
        [ENV.BROWSER]: options.browser,
        [ENV.HEADLESS]: String(options.headless),
        [ENV.WINDOW_SIZE]: formatWindowSize(options.windowSize),
        [ENV.CONFIG]: opts.config,
      });
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      log.error(`Could not start playwright: ${message}`);
      process.exitCode = 1;
    }
  });
}

function runPlaywright(args: string[], env: NodeJS.ProcessEnv): Promise<number> {
  const requireFromHere = createRequire(import.meta.url);
  const cli = requireFromHere.resolve('@playwright/test/cli');

  return new Promise((resolveExit, reject) => {
    const child = spawn(process.execPath, [cli, 'test', ...args], {
      env,
      stdio: 'inherit',
    });
    child.on('error', reject);
    child.on('exit', (code, signal) => {
      resolveExit(code ?? (signal !== null ? 1 : 0));
    });
  });
}

// ── setup ────────────────────────────────────────────────────

export function registerSetupCommand(program: Command): void {
  withCommonOptions(
    program
      .command('setup')
      .description('Create output directories and write environment.properties'),
  ).action(async (opts: CommonOpts) => {
    try {
      const { harnessConfig, options } = await resolve(opts);
      const prepared = await prepareTestEnvironment(
        harnessConfig.directories,
        loadSettings(),
        options,
      );
      for (const dir of prepared.directories) {
        process.stdout.write(`${dir}\n`);
      }
      process.stdout.write(`${prepared.environmentFile}\n`);
    } catch (err) {
      reportError(err);
    }
  });
}

// ── env ──────────────────────────────────────────────────────

export function registerEnvCommand(program: Command): void {
  withCommonOptions(
    program
      .command('env')
      .description('Print the resolved settings and session options as JSON'),
  ).action(async (opts: CommonOpts) => {
    try {
      const { harnessConfig, options } = await resolve(opts);
      const settings = loadSettings();
      const output = {
        settings: {
          baseUrl: settings.baseUrl,
          username: settings.username ?? null,
          password: settings.password !== undefined ? '********' : null,
        },
        session: options,
        timeouts: harnessConfig.timeouts,
        directories: harnessConfig.directories,
      };
      process.stdout.write(JSON.stringify(output, null, 2) + '\n');
    } catch (err) {
      reportError(err);
    }
  });
}
