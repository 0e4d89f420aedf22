/**
 * Report module.
 * Step/attachment protocol, screenshot capture, environment info.
 */

export { consoleReporter } from './sink.js';
export type { ReportSink, AttachmentType } from './sink.js';
export { ScreenshotCapture, attachFile } from './screenshots.js';
export type { ScreenshotOptions } from './screenshots.js';
export {
  formatEnvironmentProperties,
  writeEnvironmentProperties,
  ENVIRONMENT_FILE,
} from './environment.js';
export type { EnvironmentInfo } from './environment.js';
