/**
 * Session module.
 * Browser launch, per-test lifecycle, output directory setup.
 */

export { launchSession, planLaunch, describeSession, familyLabel } from './launcher.js';
export type {
  BrowserSession,
  PlaywrightSession,
  LaunchPlan,
  LaunchConfig,
  Engine,
} from './launcher.js';
export { withBrowserSession, captureFailureScreenshot } from './lifecycle.js';
export type { SessionHooks, SessionState } from './lifecycle.js';
export { prepareTestEnvironment } from './environment.js';
export type { PreparedEnvironment } from './environment.js';
