/**
 * Tracking Module
 *
 * Keeps one tracking issue per resolution-bearing source issue: the persisted
 * TrackingRecord state, content fingerprints and the sync engine.
 */

// Types
export {
  STATE_VERSION,
  TrackingRecordSchema,
  TrackingStateSchema,
  StateFileError,
  SyncAbortedError,
} from './types.js';
export type {
  Resolution,
  SourceItem,
  TrackingRecord,
  TrackingState,
  DestinationLabel,
  TrackingIssue,
  TrackingDestination,
  SyncAction,
  SyncLogEntry,
  SyncSummary,
} from './types.js';

// State Management
export {
  STATE_FILE_NAME,
  getStatePath,
  getLockPath,
  createInitialState,
  tryAcquireLock,
  releaseLock,
  readTrackingState,
  writeTrackingState,
  getRecord,
  upsertRecord,
  withCursor,
  verifyStateIntegrity,
} from './state.js';

export { computeFingerprint } from './fingerprint.js';

// Destination
export {
  GitHubDestination,
  type DestinationIssueService,
  type DestinationCommentService,
} from './destination.js';

// Sync Engine
export {
  syncItems,
  formatSyncSummary,
  type SyncOptions,
  type SyncOutcome,
} from './engine.js';
