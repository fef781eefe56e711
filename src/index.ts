/**
 * wg-resolution-tracker
 *
 * Files a tracking issue in a destination repository for every source issue
 * that records a working group resolution, and keeps it up to date.
 */

export * from './config/index.js';
export * from './github/index.js';
export * from './issues/index.js';
export * from './comments/index.js';
export * from './resolutions/index.js';
export * from './tracking/index.js';

export {
  runTracker,
  computeNextCursor,
  loadRepoConfig,
  type TrackerDependencies,
  type TrackerRunOptions,
  type TrackerRunResult,
} from './tracker.js';

export { createLogger, silentLogger, type Logger, type LogLevel, type LoggerOptions } from './utils/logger.js';
