import { mkdir } from 'node:fs/promises';

import type { Directories } from '../schema/harnessConfig.js';
import type { SessionOptions } from '../schema/options.js';
import type { Settings } from '../schema/settings.js';
import { writeEnvironmentProperties } from '../report/environment.js';

// ── Public types ─────────────────────────────────────────────

export interface PreparedEnvironment {
  directories: string[];
  environmentFile: string;
}

// ── Setup ────────────────────────────────────────────────────

/**
 * Create the output directories and write the report's
 * environment.properties. Safe to call any number of times.
 */
export async function prepareTestEnvironment(
  directories: Directories,
  settings: Settings,
  options: SessionOptions,
): Promise<PreparedEnvironment> {
  const dirs = [directories.screenshots, directories.reports, directories.allureResults];
  for (const dir of dirs) {
    await mkdir(dir, { recursive: true });
  }

  const environmentFile = await writeEnvironmentProperties(directories.allureResults, {
    baseUrl: settings.baseUrl,
    browser: options.browser,
    headless: options.headless,
  });

  return { directories: dirs, environmentFile };
}
