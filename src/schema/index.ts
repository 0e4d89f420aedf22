/**
 * Schema module — single source of truth for all data shapes.
 * Zod schemas + inferred TypeScript types.
 */

export * from './locator.js';
export * from './options.js';
export * from './settings.js';
export * from './harnessConfig.js';
