import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { formatEnvironmentProperties, writeEnvironmentProperties } from './environment.js';

describe('formatEnvironmentProperties', () => {
  it('writes one key=value line per entry', () => {
    const text = formatEnvironmentProperties({
      baseUrl: 'https://shop.example',
      browser: 'firefox',
      headless: true,
      nodeVersion: 'v20.11.0',
      platform: 'linux',
    });

    expect(text).toBe(
      'Base.URL=https://shop.example\n' +
        'Browser=firefox\n' +
        'Headless=true\n' +
        'Node.Version=v20.11.0\n' +
        'Platform=linux\n',
    );
  });

  it('defaults to the running Node version and platform', () => {
    const text = formatEnvironmentProperties({
      baseUrl: 'https://shop.example',
      browser: 'chrome',
      headless: false,
    });

    expect(text).toContain(`Node.Version=${process.version}\n`);
    expect(text).toContain(`Platform=${process.platform}\n`);
  });

  it('escapes backslashes and line breaks', () => {
    const text = formatEnvironmentProperties({
      baseUrl: 'C:\\site\nnext',
      browser: 'chrome',
      headless: false,
      nodeVersion: 'v20',
      platform: 'win32',
    });

    expect(text.split('\n')[0]).toBe('Base.URL=C:\\\\site\\nnext');
  });
});

describe('writeEnvironmentProperties', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'ui-harness-env-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('writes environment.properties into the directory', async () => {
    const target = path.join(dir, 'allure-results');

    const filePath = await writeEnvironmentProperties(target, {
      baseUrl: 'https://shop.example',
      browser: 'edge',
      headless: false,
      nodeVersion: 'v20.11.0',
      platform: 'darwin',
    });

    expect(filePath).toBe(path.join(target, 'environment.properties'));
    expect(fs.readFileSync(filePath, 'utf-8')).toBe(
      'Base.URL=https://shop.example\nBrowser=edge\nHeadless=false\nNode.Version=v20.11.0\nPlatform=darwin\n',
    );
  });
});
