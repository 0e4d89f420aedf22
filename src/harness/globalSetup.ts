import { DEFAULT_CONFIG_PATH, ENV } from '../config/defaults.js';
import { loadHarnessConfig } from '../config/loader.js';
import { resolveSessionOptions } from '../config/options.js';
import { loadSettings } from '../config/settings.js';
import { prepareTestEnvironment } from '../session/environment.js';
import * as log from '../utils/logger.js';

/** Playwright `globalSetup`: output directories and environment.properties. */
export default async function globalSetup(): Promise<void> {
  const harnessConfig = await loadHarnessConfig(process.env[ENV.CONFIG] ?? DEFAULT_CONFIG_PATH);
  const options = resolveSessionOptions({}, { file: harnessConfig.session });

  const prepared = await prepareTestEnvironment(
    harnessConfig.directories,
    loadSettings(),
    options,
  );
  log.info(`Test environment ready (${prepared.directories.join(', ')})`);
}
