import { setTimeout as sleep } from 'node:timers/promises';

import { TIMEOUTS } from '../config/defaults.js';

// ── Error ─────────────────────────────────────────────────────

export class WaitTimeoutError extends Error {
  readonly timeoutMs: number;

  constructor(message: string, timeoutMs: number, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'WaitTimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

/** A bounded wait ran out, here or inside the browser engine. */
export function isTimeoutError(err: unknown): boolean {
  return err instanceof WaitTimeoutError || (err instanceof Error && err.name === 'TimeoutError');
}

// ── Polling ───────────────────────────────────────────────────

export interface PollOptions {
  timeoutMs: number;
  intervalMs?: number;
  /** Message of the WaitTimeoutError thrown on exhaustion. */
  message?: string;
}

/** A condition is satisfied by any value except false, null or undefined. */
export type Condition<T> = () => Promise<T | false | null | undefined>;

/** Least time one evaluation gets, even on the check after the deadline. */
const MIN_EVALUATION_MS = 50;

const EXPIRED = Symbol('expired');

/**
 * Evaluate `condition` until it yields a value or `timeoutMs` elapses.
 *
 * Fixed interval, no backoff. The condition always runs at least once,
 * and once more after the deadline so a late success is not lost.
 * A thrown error counts as "not yet" and becomes the timeout's cause.
 * An evaluation still pending when the window closes is abandoned.
 */
export async function pollUntil<T>(
  condition: Condition<T>,
  options: PollOptions,
): Promise<T> {
  const intervalMs = options.intervalMs ?? TIMEOUTS.POLL_INTERVAL;
  const deadline = Date.now() + options.timeoutMs;
  let lastError: unknown;

  for (;;) {
    try {
      const budget = Math.max(deadline - Date.now(), MIN_EVALUATION_MS);
      const value = await within(condition(), budget);
      if (value !== EXPIRED && value !== false && value !== null && value !== undefined) {
        return value;
      }
    } catch (err) {
      lastError = err;
    }

    const remaining = deadline - Date.now();
    if (remaining <= 0) break;
    await sleep(Math.min(intervalMs, remaining));
  }

  throw new WaitTimeoutError(
    options.message ?? `Condition not met within ${String(options.timeoutMs)}ms`,
    options.timeoutMs,
    lastError !== undefined ? { cause: lastError } : undefined,
  );
}

async function within<T>(pending: Promise<T>, ms: number): Promise<T | typeof EXPIRED> {
  const controller = new AbortController();
  const expiry = sleep<typeof EXPIRED>(ms, EXPIRED, { signal: controller.signal }).catch(
    (): typeof EXPIRED => EXPIRED,
  );
  try {
    return await Promise.race([pending, expiry]);
  } finally {
    controller.abort();
  }
}
