import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import type { Mock } from 'vitest';

import { FakeDriver, RecordingReporter } from '../../test/fakes.js';
import type { BrowserSession } from './launcher.js';
import { withBrowserSession } from './lifecycle.js';
import type { SessionHooks, SessionState } from './lifecycle.js';

interface FakeSession extends BrowserSession {
  readonly driver: FakeDriver;
}

describe('withBrowserSession', () => {
  let dir: string;
  let driver: FakeDriver;
  let session: FakeSession;
  let close: Mock<() => Promise<void>>;
  let reporter: RecordingReporter;
  let states: SessionState[];

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'ui-harness-lifecycle-'));
    driver = new FakeDriver();
    close = vi.fn<() => Promise<void>>(async () => {
      driver.calls.push('close');
    });
    session = {
      options: {
        browser: 'chrome',
        headless: true,
        headlessRequested: false,
        windowSize: { width: 1920, height: 1080 },
      },
      driver,
      close,
    };
    reporter = new RecordingReporter();
    states = [];
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  function hooks(overrides: Partial<SessionHooks<FakeSession>> = {}): SessionHooks<FakeSession> {
    return {
      testName: 'login fails',
      launch: async () => session,
      reporter,
      screenshotDir: dir,
      onStateChange: (state) => states.push(state),
      ...overrides,
    };
  }

  const failureShots = (): string[] =>
    reporter.attachments
      .map((a) => a.name)
      .filter((name) => name.startsWith('Failure Screenshot: '));

  it('walks inactive → active → tornDown for a passing test', async () => {
    let seen: FakeSession | undefined;

    await withBrowserSession(hooks(), async (s) => {
      seen = s;
      expect(states).toEqual(['inactive', 'active']);
    });

    expect(seen).toBe(session);
    expect(states).toEqual(['inactive', 'active', 'tornDown']);
    expect(close).toHaveBeenCalledTimes(1);
    expect(failureShots()).toEqual([]);
  });

  it('attaches browser info once the session is up', async () => {
    await withBrowserSession(hooks(), async () => undefined);

    expect(reporter.attachments[0]).toEqual({
      name: 'Browser Info',
      body: 'Browser: Chrome\nHeadless: true\nWindow Size: 1920,1080',
      contentType: 'text/plain',
    });
  });

  it('captures exactly one failure screenshot, then closes, then rethrows', async () => {
    const failure = new Error('expected Login');

    await expect(
      withBrowserSession(hooks(), async () => {
        throw failure;
      }),
    ).rejects.toBe(failure);

    expect(failureShots()).toHaveLength(1);
    expect(failureShots()[0]).toMatch(/^Failure Screenshot: FAILED_login_fails_\d{8}_\d{6}$/);
    expect(driver.calls).toEqual(['screenshot', 'close']);
    expect(states).toEqual(['inactive', 'active', 'tornDown']);
  });

  it('captures when the runner reports a failure the body did not throw', async () => {
    await withBrowserSession(hooks({ hasFailed: () => true }), async () => undefined);

    expect(failureShots()).toHaveLength(1);
    expect(close).toHaveBeenCalledTimes(1);
  });

  it('keeps the original error when the failure capture breaks', async () => {
    driver.screenshotError = new Error('browser crashed');
    const failure = new Error('expected Login');

    await expect(
      withBrowserSession(hooks(), async () => {
        throw failure;
      }),
    ).rejects.toBe(failure);

    expect(failureShots()).toEqual([]);
    expect(close).toHaveBeenCalledTimes(1);
  });

  it('keeps the original error when closing breaks', async () => {
    close.mockRejectedValueOnce(new Error('already closed'));
    const failure = new Error('expected Login');

    await expect(
      withBrowserSession(hooks(), async () => {
        throw failure;
      }),
    ).rejects.toBe(failure);
  });

  it('swallows a close failure when the runner reports the test as failed', async () => {
    close.mockRejectedValueOnce(new Error('close broke'));

    await expect(
      withBrowserSession(hooks({ hasFailed: () => true }), async () => undefined),
    ).resolves.toBeUndefined();
    expect(failureShots()).toHaveLength(1);
    expect(states).toEqual(['inactive', 'active', 'tornDown']);
  });

  it('surfaces a close failure of a passing test', async () => {
    close.mockRejectedValueOnce(new Error('already closed'));

    await expect(withBrowserSession(hooks(), async () => undefined)).rejects.toThrow(
      'already closed',
    );
  });

  it('runs nothing when the launch fails', async () => {
    const body = vi.fn(async () => undefined);

    await expect(
      withBrowserSession(
        hooks({
          launch: async () => {
            throw new Error('no browser');
          },
        }),
        body,
      ),
    ).rejects.toThrow('no browser');

    expect(body).not.toHaveBeenCalled();
    expect(close).not.toHaveBeenCalled();
    expect(states).toEqual(['inactive']);
  });
});
