import { mkdir, readFile } from 'node:fs/promises';
import path from 'node:path';

import type { BrowserDriver, PageElement } from '../driver/types.js';
import { DIRECTORIES } from '../config/defaults.js';
import * as log from '../utils/logger.js';
import { timestamp, toFileName } from '../utils/names.js';
import type { ReportSink } from './sink.js';
import { consoleReporter } from './sink.js';

// ── Public types ─────────────────────────────────────────────

export interface ScreenshotOptions {
  directory?: string;
  reporter?: ReportSink;
}

// ── Capture ──────────────────────────────────────────────────

/**
 * Writes PNGs into one directory and attaches each to the report.
 * A capture that fails propagates; an attach that fails is only logged.
 */
export class ScreenshotCapture {
  readonly directory: string;
  private readonly reporter: ReportSink;

  constructor(
    private readonly driver: BrowserDriver,
    options: ScreenshotOptions = {},
  ) {
    this.directory = options.directory ?? DIRECTORIES.SCREENSHOTS;
    this.reporter = options.reporter ?? consoleReporter;
  }

  /** Whole-page capture. Defaults to `screenshot_<timestamp>`. */
  async page(name?: string, label = 'Screenshot'): Promise<string> {
    const fileName = toFileName(name ?? `screenshot_${timestamp()}`);
    const filePath = await this.prepare(fileName);
    await this.driver.screenshot(filePath);
    log.screenshot(filePath);
    await attachFile(this.reporter, `${label}: ${fileName}`, filePath);
    return filePath;
  }

  /** Element-only capture. Defaults to `element_screenshot_<timestamp>`. */
  async element(element: PageElement, name?: string): Promise<string> {
    const fileName = toFileName(name ?? `element_screenshot_${timestamp()}`);
    const filePath = await this.prepare(fileName);
    await element.screenshot(filePath);
    log.screenshot(filePath);
    await attachFile(this.reporter, `Element Screenshot: ${fileName}`, filePath);
    return filePath;
  }

  private async prepare(fileName: string): Promise<string> {
    await mkdir(this.directory, { recursive: true });
    return path.join(this.directory, `${fileName}.png`);
  }
}

// ── Attachment ───────────────────────────────────────────────

export async function attachFile(
  reporter: ReportSink,
  name: string,
  filePath: string,
): Promise<void> {
  try {
    const body = await readFile(filePath);
    await reporter.attach(name, body, 'image/png');
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    log.warn(`Failed to attach screenshot to report: ${message}`);
  }
}
