import * as fs from 'node:fs';
import * as path from 'node:path';
import * as crypto from 'node:crypto';
import {
  STATE_VERSION,
  StateFileError,
  TrackingRecord,
  TrackingState,
  TrackingStateSchema,
} from './types.js';

/**
 * Name of the state file inside the state directory
 */
export const STATE_FILE_NAME = 'state.json';

/**
 * Lock file extension
 */
const LOCK_EXTENSION = '.lock';

/**
 * Stale lock threshold in milliseconds (30 minutes).
 * A run that holds the lock longer than this is assumed to have crashed.
 */
const STALE_LOCK_THRESHOLD_MS = 30 * 60 * 1000;

/**
 * Path of the state file for a state directory
 */
export function getStatePath(stateDirectory: string): string {
  return path.resolve(stateDirectory, STATE_FILE_NAME);
}

/**
 * Create the state used before the first run: no records, cursor at the start date
 *
 * @param startDate - 'YYYY-MM-DD'
 */
export function createInitialState(startDate: string): TrackingState {
  return {
    version: STATE_VERSION,
    since: `${startDate}T00:00:00Z`,
    records: {},
    lastSyncAt: undefined,
  };
}

/**
 * Get the lock file path for a state file
 */
export function getLockPath(statePath: string): string {
  return path.resolve(statePath) + LOCK_EXTENSION;
}

/**
 * Check if a lock file is stale (older than threshold)
 */
function isLockStale(lockPath: string): boolean {
  try {
    const stats = fs.statSync(lockPath);
    const age = Date.now() - stats.mtimeMs;
    return age > STALE_LOCK_THRESHOLD_MS;
  } catch {
    return true; // If we can't stat it, consider it stale
  }
}

/**
 * Try once to acquire the lock for the state file.
 * Uses exclusive file creation to ensure atomicity.
 *
 * @returns The lock ID (for releasing), or null if another run holds the lock
 */
export function tryAcquireLock(statePath: string): string | null {
  const lockPath = getLockPath(statePath);
  const lockId = crypto.randomUUID();

  fs.mkdirSync(path.dirname(lockPath), { recursive: true });

  for (let attempt = 0; attempt < 2; attempt++) {
    try {
      fs.writeFileSync(lockPath, JSON.stringify({
        id: lockId,
        pid: process.pid,
        timestamp: new Date().toISOString(),
      }), { flag: 'wx' });
      return lockId;
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code !== 'EEXIST') {
        throw error;
      }
      if (!isLockStale(lockPath)) {
        return null;
      }
      try {
        fs.unlinkSync(lockPath);
      } catch (unlinkError) {
        // Another process removed it first; retry the create
        if ((unlinkError as NodeJS.ErrnoException).code !== 'ENOENT') {
          throw unlinkError;
        }
      }
    }
  }

  return null;
}

/**
 * Release a lock for the state file
 *
 * @param lockId - The lock ID from tryAcquireLock; a lock owned by someone else is left alone
 * @returns True if the lock file was removed
 */
export function releaseLock(statePath: string, lockId: string): boolean {
  const lockPath = getLockPath(statePath);

  let content: string;
  try {
    content = fs.readFileSync(lockPath, 'utf-8');
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
      return false;
    }
    throw error;
  }

  let lockData: unknown;
  try {
    lockData = JSON.parse(content);
  } catch {
    return false;
  }
  const ownerId = typeof lockData === 'object' && lockData !== null && 'id' in lockData ? lockData.id : undefined;
  if (ownerId !== lockId) {
    return false;
  }

  fs.unlinkSync(lockPath);
  return true;
}

/**
 * Read the state file
 *
 * @param statePath - Path to the state file
 * @param startDate - Start date used when no state file exists yet
 * @returns The stored state, or the initial state if the file doesn't exist
 * @throws StateFileError if the file exists but cannot be parsed
 */
export function readTrackingState(statePath: string, startDate: string): TrackingState {
  const absolutePath = path.resolve(statePath);

  if (!fs.existsSync(absolutePath)) {
    return createInitialState(startDate);
  }

  const content = fs.readFileSync(absolutePath, 'utf-8');

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    throw new StateFileError(
      `Could not parse state file ${absolutePath}: ${error instanceof Error ? error.message : String(error)}`,
      absolutePath
    );
  }

  const result = TrackingStateSchema.safeParse(parsed);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `  - ${issue.path.join('.')}: ${issue.message}`)
      .join('\n');
    throw new StateFileError(`Invalid state file ${absolutePath}:\n${issues}`, absolutePath);
  }

  return result.data;
}

/**
 * Write the state to file using atomic write (temp file + rename)
 *
 * @param now - Clock used for lastSyncAt
 */
export function writeTrackingState(
  state: TrackingState,
  statePath: string,
  now: () => Date = () => new Date()
): void {
  const absolutePath = path.resolve(statePath);

  fs.mkdirSync(path.dirname(absolutePath), { recursive: true });

  const stateToWrite: TrackingState = {
    ...state,
    lastSyncAt: now().toISOString(),
  };

  const tempPath = `${absolutePath}.${crypto.randomUUID()}.tmp`;

  try {
    fs.writeFileSync(tempPath, JSON.stringify(stateToWrite, null, 2) + '\n', 'utf-8');
    fs.renameSync(tempPath, absolutePath);
  } catch (error) {
    fs.rmSync(tempPath, { force: true });
    throw error;
  }
}

/**
 * Get the tracking record of a source issue
 */
export function getRecord(state: TrackingState, sourceNumber: number): TrackingRecord | undefined {
  return state.records[String(sourceNumber)];
}

/**
 * Add or replace a tracking record
 *
 * @returns A new state with the record set
 */
export function upsertRecord(state: TrackingState, record: TrackingRecord): TrackingState {
  return {
    ...state,
    records: {
      ...state.records,
      [String(record.sourceNumber)]: record,
    },
  };
}

/**
 * Move the source cursor
 *
 * @returns A new state with the cursor set
 */
export function withCursor(state: TrackingState, since: string): TrackingState {
  return { ...state, since };
}

/**
 * Verify state integrity - check for inconsistent entries
 */
export function verifyStateIntegrity(state: TrackingState): {
  valid: boolean;
  issues: string[];
} {
  const issues: string[] = [];

  for (const [key, record] of Object.entries(state.records)) {
    if (String(record.sourceNumber) !== key) {
      issues.push(`Record key '${key}' does not match source issue #${record.sourceNumber}`);
    }
    if (!record.destinationUrl.startsWith('http')) {
      issues.push(`Invalid destination URL for source issue #${key}: ${record.destinationUrl}`);
    }
  }

  // Two source issues must never share one tracking issue
  const destinations = new Map<number, string>();
  for (const [key, record] of Object.entries(state.records)) {
    const existing = destinations.get(record.destinationNumber);
    if (existing) {
      issues.push(`Destination issue #${record.destinationNumber} is shared by source issues #${existing} and #${key}`);
    } else {
      destinations.set(record.destinationNumber, key);
    }
  }

  return {
    valid: issues.length === 0,
    issues,
  };
}
