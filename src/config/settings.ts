import { existsSync, readFileSync } from 'node:fs';

import { parse as parseDotenv } from 'dotenv';

import { settingsSchema } from '../schema/settings.js';
import type { Settings } from '../schema/settings.js';

// ── Public API ──────────────────────────────────────────────

export interface LoadSettingsOptions {
  env?: NodeJS.ProcessEnv;
  /** Path to a dotenv file. Missing files are ignored. */
  envFile?: string;
}

/**
 * Read base URL and credentials from the environment.
 *
 * Values from the dotenv file fill gaps only: a variable already present
 * in `env` always wins. Missing credentials stay `undefined`; the test
 * that needs them is where that surfaces.
 */
export function loadSettings(options: LoadSettingsOptions = {}): Settings {
  const env = options.env ?? process.env;
  const fileVars = readEnvFile(options.envFile ?? '.env');
  const merged: Record<string, string | undefined> = { ...fileVars, ...definedOnly(env) };

  return Object.freeze(
    settingsSchema.parse({
      baseUrl: merged['BASE_URL'],
      username: merged['AE_USERNAME'],
      password: merged['AE_PASSWORD'],
    }),
  );
}

// ── Helpers ─────────────────────────────────────────────────

function readEnvFile(envFile: string): Record<string, string> {
  if (!existsSync(envFile)) return {};
  return parseDotenv(readFileSync(envFile));
}

function definedOnly(env: NodeJS.ProcessEnv): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined) out[key] = value;
  }
  return out;
}
