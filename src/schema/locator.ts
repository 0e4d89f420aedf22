import { z } from 'zod';

// ── Locator ───────────────────────────────────────────────────

export const locatorStrategySchema = z.enum([
  'id',
  'css',
  'xpath',
  'name',
  'class',
  'tag',
  'text',
  'linkText',
  'testid',
]);

export type LocatorStrategy = z.infer<typeof locatorStrategySchema>;

export const locatorSchema = z
  .object({
    strategy: locatorStrategySchema,
    value: z.string().min(1),
  })
  .readonly();

export type Locator = z.infer<typeof locatorSchema>;

/** Shorthand constructors so page objects read like `by.id('login')`. */
export const by = {
  id: (value: string): Locator => ({ strategy: 'id', value }),
  css: (value: string): Locator => ({ strategy: 'css', value }),
  xpath: (value: string): Locator => ({ strategy: 'xpath', value }),
  name: (value: string): Locator => ({ strategy: 'name', value }),
  className: (value: string): Locator => ({ strategy: 'class', value }),
  tag: (value: string): Locator => ({ strategy: 'tag', value }),
  text: (value: string): Locator => ({ strategy: 'text', value }),
  linkText: (value: string): Locator => ({ strategy: 'linkText', value }),
  testId: (value: string): Locator => ({ strategy: 'testid', value }),
} as const;
