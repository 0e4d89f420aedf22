import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';

// ── environment.properties ───────────────────────────────────

export interface EnvironmentInfo {
  baseUrl: string;
  browser: string;
  headless: boolean;
  nodeVersion?: string;
  platform?: string;
}

export const ENVIRONMENT_FILE = 'environment.properties';

export function formatEnvironmentProperties(info: EnvironmentInfo): string {
  const entries: Array<[string, string]> = [
    ['Base.URL', info.baseUrl],
    ['Browser', info.browser],
    ['Headless', String(info.headless)],
    ['Node.Version', info.nodeVersion ?? process.version],
    ['Platform', info.platform ?? process.platform],
  ];
  return entries.map(([key, value]) => `${key}=${escapeValue(value)}\n`).join('');
}

/** Writes `<directory>/environment.properties` and returns its path. */
export async function writeEnvironmentProperties(
  directory: string,
  info: EnvironmentInfo,
): Promise<string> {
  await mkdir(directory, { recursive: true });
  const filePath = path.join(directory, ENVIRONMENT_FILE);
  await writeFile(filePath, formatEnvironmentProperties(info), 'utf-8');
  return filePath;
}

// Java properties treat backslashes and line breaks specially.
function escapeValue(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/\r?\n/g, '\\n');
}
