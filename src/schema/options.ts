import { z } from 'zod';

// ── Browser family ───────────────────────────────────────────

export const browserFamilySchema = z.enum(['chrome', 'firefox', 'edge']);

export type BrowserFamily = z.infer<typeof browserFamilySchema>;

// ── Window size ──────────────────────────────────────────────

export const windowSizeSchema = z.object({
  width: z.number().int().positive(),
  height: z.number().int().positive(),
});

export type WindowSize = z.infer<typeof windowSizeSchema>;

// ── Resolved session options ─────────────────────────────────

export const sessionOptionsSchema = z.object({
  browser: browserFamilySchema,
  /** Effective mode, after CI detection. */
  headless: z.boolean(),
  /** What the caller asked for, before CI detection. */
  headlessRequested: z.boolean(),
  windowSize: windowSizeSchema,
});

export type SessionOptions = z.infer<typeof sessionOptionsSchema>;
