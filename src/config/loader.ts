import { readFile } from 'node:fs/promises';

import { parse as parseYaml } from 'yaml';
import { ZodError } from 'zod';

import { harnessConfigSchema } from '../schema/harnessConfig.js';
import type { HarnessConfig } from '../schema/harnessConfig.js';
import { ConfigurationError } from './errors.js';

// ── Public API ──────────────────────────────────────────────

/**
 * Load and validate the harness YAML (or JSON) file.
 * A missing file yields the defaults; an invalid one throws.
 */
export async function loadHarnessConfig(configPath: string): Promise<HarnessConfig> {
  let raw: string;
  try {
    raw = await readFile(configPath, 'utf-8');
  } catch (err) {
    if (isNotFound(err)) return harnessConfigSchema.parse({});
    throw err;
  }

  try {
    const parsed: unknown = configPath.endsWith('.json')
      ? JSON.parse(raw)
      : parseYaml(raw);
    return harnessConfigSchema.parse(parsed ?? {});
  } catch (err) {
    throw new ConfigurationError(
      `Invalid harness config ${configPath}: ${describeParseError(err)}`,
      { cause: err },
    );
  }
}

// ── Helpers ─────────────────────────────────────────────────

function isNotFound(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

function describeParseError(err: unknown): string {
  if (err instanceof ZodError) {
    return err.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
  }
  return err instanceof Error ? err.message : String(err);
}
