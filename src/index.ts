/**
 * ui-harness — page objects and session plumbing for Playwright UI tests.
 *
 * Playwright Test fixtures live in `ui-harness/harness`, kept apart so
 * that importing page objects does not pull in the test runner.
 */

export * from './schema/index.js';
export * from './config/index.js';
export * from './driver/index.js';
export * from './pages/index.js';
export * from './report/index.js';
export * from './session/index.js';
export { pollUntil } from './utils/wait.js';
export type { PollOptions, Condition } from './utils/wait.js';
export { timestamp, toFileName } from './utils/names.js';
