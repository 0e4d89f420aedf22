import { z } from 'zod';

import { DEFAULT_BASE_URL } from '../config/defaults.js';

// Empty strings count as unset, matching how shells export blank variables.
const blankToUndefined = (value: unknown): unknown =>
  typeof value === 'string' && value.trim().length === 0 ? undefined : value;

export const settingsSchema = z.object({
  baseUrl: z.preprocess(blankToUndefined, z.string().default(DEFAULT_BASE_URL)),
  username: z.preprocess(blankToUndefined, z.string().optional()),
  password: z.preprocess(blankToUndefined, z.string().optional()),
});

export type Settings = Readonly<z.infer<typeof settingsSchema>>;
