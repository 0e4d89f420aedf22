import { z } from 'zod';

import { DIRECTORIES, TIMEOUTS } from '../config/defaults.js';

// ── Timeouts (milliseconds) ─────────────────────────────────

export const timeoutsSchema = z.object({
  pageLoad: z.number().int().positive().default(TIMEOUTS.PAGE_LOAD),
  element: z.number().int().positive().default(TIMEOUTS.ELEMENT),
  probe: z.number().int().positive().default(TIMEOUTS.PROBE),
  alert: z.number().int().positive().default(TIMEOUTS.ALERT),
  implicit: z.number().int().nonnegative().default(TIMEOUTS.IMPLICIT),
  pollInterval: z.number().int().positive().default(TIMEOUTS.POLL_INTERVAL),
});

export type Timeouts = z.infer<typeof timeoutsSchema>;

// ── Output directories ──────────────────────────────────────

export const directoriesSchema = z.object({
  screenshots: z.string().min(1).default(DIRECTORIES.SCREENSHOTS),
  reports: z.string().min(1).default(DIRECTORIES.REPORTS),
  allureResults: z.string().min(1).default(DIRECTORIES.ALLURE_RESULTS),
});

export type Directories = z.infer<typeof directoriesSchema>;

// ── Session defaults ────────────────────────────────────────
// Raw strings: validated later by resolveSessionOptions, so a bad value
// surfaces as the same ConfigurationError a bad flag would.

export const sessionDefaultsSchema = z.object({
  browser: z.string().min(1).optional(),
  headless: z.boolean().optional(),
  windowSize: z.string().min(1).optional(),
});

export type SessionDefaults = z.infer<typeof sessionDefaultsSchema>;

// ── Full harness file ───────────────────────────────────────

export const harnessConfigSchema = z.object({
  timeouts: timeoutsSchema.default({}),
  directories: directoriesSchema.default({}),
  session: sessionDefaultsSchema.default({}),
});

export type HarnessConfig = z.infer<typeof harnessConfigSchema>;
