import * as log from '../utils/logger.js';

// ── Attachment protocol ──────────────────────────────────────

export type AttachmentType = 'text/plain' | 'image/png';

/**
 * Where steps and attachments go. The Playwright Test fixtures bind this
 * to `test.step` and `testInfo.attach`; anything else can log.
 */
export interface ReportSink {
  step<T>(title: string, body: () => Promise<T>): Promise<T>;
  attach(name: string, body: Buffer | string, contentType: AttachmentType): Promise<void>;
}

// ── Console sink ─────────────────────────────────────────────

export const consoleReporter: ReportSink = {
  async step<T>(title: string, body: () => Promise<T>): Promise<T> {
    log.step(title);
    try {
      return await body();
    } catch (err) {
      log.stepResult(false, title);
      throw err;
    }
  },

  async attach(name: string, body: Buffer | string, contentType: AttachmentType): Promise<void> {
    const size = typeof body === 'string' ? Buffer.byteLength(body) : body.length;
    log.detail(`attached ${name} (${contentType}, ${String(size)} bytes)`);
  },
};
