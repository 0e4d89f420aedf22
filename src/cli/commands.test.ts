import os from 'node:os';
import path from 'node:path';

import { Command } from 'commander';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { registerEnvCommand } from './commands.js';

describe('env command', () => {
  const missingConfig = path.join(os.tmpdir(), 'ui-harness-no-such-config.yaml');
  let output: string[];

  beforeEach(() => {
    output = [];
    vi.spyOn(process.stdout, 'write').mockImplementation((chunk: string | Uint8Array) => {
      output.push(String(chunk));
      return true;
    });
    vi.stubEnv('BASE_URL', 'https://shop.example');
    vi.stubEnv('AE_USERNAME', 'user@example.com');
    vi.stubEnv('AE_PASSWORD', 'test-secret');
    vi.stubEnv('CI', '');
    vi.stubEnv('UI_BROWSER', '');
    vi.stubEnv('UI_HEADLESS', '');
    vi.stubEnv('UI_WINDOW_SIZE', '');
  });

  afterEach(() => {
    process.exitCode = undefined;
  });

  async function run(...args: string[]): Promise<void> {
    const program = new Command().exitOverride();
    registerEnvCommand(program);
    await program.parseAsync(['env', '--config', missingConfig, ...args], { from: 'user' });
  }

  it('prints the resolved configuration with the password masked', async () => {
    await run('--browser', 'firefox', '--window-size', '1280x720');

    expect(JSON.parse(output.join(''))).toEqual({
      settings: {
        baseUrl: 'https://shop.example',
        username: 'user@example.com',
        password: '********',
      },
      session: {
        browser: 'firefox',
        headless: false,
        headlessRequested: false,
        windowSize: { width: 1280, height: 720 },
      },
      timeouts: {
        pageLoad: 30_000,
        element: 10_000,
        probe: 5_000,
        alert: 5_000,
        implicit: 10_000,
        pollInterval: 500,
      },
      directories: {
        screenshots: 'screenshots',
        reports: 'test-reports',
        allureResults: 'allure-results',
      },
    });
    expect(process.exitCode).toBeUndefined();
  });

  it('exits with the configuration error code for an unknown browser', async () => {
    await run('--browser', 'safari');

    expect(output).toEqual([]);
    expect(process.exitCode).toBe(4);
  });
});
