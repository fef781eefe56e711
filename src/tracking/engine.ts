/**
 * Resolution sync engine
 *
 * Files one tracking issue per resolution-bearing source issue and keeps a
 * TrackingRecord per filed issue. Running it again over the same items makes
 * no destination calls; a changed item gets an update comment instead of a
 * second issue. Items succeed or fail independently.
 */

import { isAuthError, isNotFoundError } from '../github/client.js';
import { formatTrackingIssue, formatUpdateComment } from '../resolutions/formatter.js';
import { selectLabels } from '../resolutions/labels.js';
import type { RepoConfig, RepoRef } from '../types/config.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import { computeFingerprint } from './fingerprint.js';
import { getRecord, upsertRecord } from './state.js';
import {
  SyncAbortedError,
  type SourceItem,
  type SyncLogEntry,
  type SyncSummary,
  type TrackingDestination,
  type TrackingRecord,
  type TrackingState,
} from './types.js';

/**
 * Options for a sync run
 */
export interface SyncOptions {
  /** Repository the items come from (used in issue bodies) */
  sourceRepo: RepoRef;
  /** Label mirroring rules of the destination repository */
  repoConfig: RepoConfig;
  /** Report what would happen without calling the destination */
  dryRun?: boolean;
  logger?: Logger;
  now?: () => Date;
  /** Called with the state after each record is created or changed */
  onProgress?: (state: TrackingState) => void;
}

/**
 * Result of a sync run
 */
export interface SyncOutcome {
  /** Updated state: every input record plus the new or refreshed ones */
  state: TrackingState;
  /** Destination issues created or updated during the run */
  log: SyncLogEntry[];
  summary: SyncSummary;
}

interface ItemContext {
  destination: TrackingDestination;
  options: SyncOptions;
  logger: Logger;
  timestamp: string;
}

interface ItemResult {
  entry: SyncLogEntry;
  record?: TrackingRecord;
}

const DESTINATION_ACTIONS = new Set(['created', 'updated', 'recreated']);

/**
 * Sync source items to the destination repository
 *
 * @throws SyncAbortedError on authentication/permission failures; the error carries the state reached so far
 */
export async function syncItems(
  items: SourceItem[],
  state: TrackingState,
  destination: TrackingDestination,
  options: SyncOptions
): Promise<SyncOutcome> {
  const logger = options.logger ?? silentLogger;
  const now = options.now ?? (() => new Date());

  const summary: SyncSummary = {
    totalItems: items.length,
    created: 0,
    updated: 0,
    unchanged: 0,
    failed: 0,
    results: [],
  };

  let current = state;

  for (const item of items) {
    const context: ItemContext = { destination, options, logger, timestamp: now().toISOString() };

    let result: ItemResult;
    try {
      result = await syncItem(item, current, context);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      if (isAuthError(error)) {
        throw new SyncAbortedError(
          `Sync aborted at source issue #${item.number}: ${message}`,
          current,
          summary,
          error
        );
      }
      logger.warn(`Could not sync source issue #${item.number}, will retry next run: ${message}`);
      result = { entry: { sourceNumber: item.number, action: 'failed', error: message } };
    }

    if (result.record) {
      current = upsertRecord(current, result.record);
      options.onProgress?.(current);
    }

    summary.results.push(result.entry);
    countResult(summary, result.entry);
  }

  return {
    state: current,
    log: summary.results.filter((entry) => DESTINATION_ACTIONS.has(entry.action)),
    summary,
  };
}

/**
 * Sync one item. Throws on any destination failure; the caller decides whether it is fatal.
 */
async function syncItem(item: SourceItem, state: TrackingState, context: ItemContext): Promise<ItemResult> {
  const { destination, options, logger } = context;
  const fingerprint = computeFingerprint(item);
  const record = getRecord(state, item.number);

  if (record && record.fingerprint === fingerprint) {
    return {
      entry: {
        sourceNumber: item.number,
        action: 'unchanged',
        destinationNumber: record.destinationNumber,
        destinationUrl: record.destinationUrl,
      },
    };
  }

  if (options.dryRun) {
    return {
      entry: {
        sourceNumber: item.number,
        action: record ? 'would-update' : 'would-create',
        destinationNumber: record?.destinationNumber,
        destinationUrl: record?.destinationUrl,
      },
    };
  }

  if (!record) {
    return fileTrackingIssue(item, fingerprint, context, 'created');
  }

  const handled = new Set(record.handledComments);
  const newResolutions = item.resolutions.filter((resolution) => !handled.has(resolution.commentUrl));

  try {
    await destination.commentOnIssue(
      record.destinationNumber,
      formatUpdateComment(item, newResolutions, options.sourceRepo)
    );
  } catch (error) {
    if (!isNotFoundError(error)) {
      throw error;
    }
    logger.warn(
      `Tracking issue #${record.destinationNumber} for source issue #${item.number} no longer exists; filing a new one`
    );
    return fileTrackingIssue(item, fingerprint, context, 'recreated');
  }

  logger.info(`Updated tracking issue #${record.destinationNumber} for source issue #${item.number}`);

  return {
    entry: {
      sourceNumber: item.number,
      action: 'updated',
      destinationNumber: record.destinationNumber,
      destinationUrl: record.destinationUrl,
    },
    record: {
      ...record,
      fingerprint,
      handledComments: mergeCommentUrls(record.handledComments, item),
      updatedAt: context.timestamp,
    },
  };
}

/**
 * Create a tracking issue (with its labels) and the record pointing at it
 */
async function fileTrackingIssue(
  item: SourceItem,
  fingerprint: string,
  context: ItemContext,
  action: 'created' | 'recreated'
): Promise<ItemResult> {
  const { destination, options, logger, timestamp } = context;

  const labels = selectLabels(item.labels, options.repoConfig);
  await destination.ensureLabels(labels);

  const formatted = formatTrackingIssue(item, options.sourceRepo);
  const issue = await destination.createIssue({
    title: formatted.title,
    body: formatted.body,
    labels: labels.map((label) => label.name),
  });

  logger.info(`Filed tracking issue #${issue.number} for source issue #${item.number}`);

  return {
    entry: {
      sourceNumber: item.number,
      action,
      destinationNumber: issue.number,
      destinationUrl: issue.url,
    },
    record: {
      sourceNumber: item.number,
      destinationNumber: issue.number,
      destinationUrl: issue.url,
      fingerprint,
      handledComments: mergeCommentUrls([], item),
      createdAt: timestamp,
      updatedAt: timestamp,
    },
  };
}

function mergeCommentUrls(existing: string[], item: SourceItem): string[] {
  const urls = [...existing];
  for (const resolution of item.resolutions) {
    if (!urls.includes(resolution.commentUrl)) {
      urls.push(resolution.commentUrl);
    }
  }
  return urls;
}

function countResult(summary: SyncSummary, entry: SyncLogEntry): void {
  switch (entry.action) {
    case 'created':
    case 'recreated':
    case 'would-create':
      summary.created++;
      break;
    case 'updated':
    case 'would-update':
      summary.updated++;
      break;
    case 'unchanged':
      summary.unchanged++;
      break;
    case 'failed':
      summary.failed++;
      break;
  }
}

/**
 * Format a sync summary for console output
 */
export function formatSyncSummary(summary: SyncSummary): string {
  const lines: string[] = [];

  lines.push('Sync Summary');
  lines.push('============');
  lines.push(`Resolution issues: ${summary.totalItems}`);
  lines.push(`Created: ${summary.created}`);
  lines.push(`Updated: ${summary.updated}`);
  lines.push(`Unchanged: ${summary.unchanged}`);
  lines.push(`Failed: ${summary.failed}`);

  const changes = summary.results.filter((result) => result.action !== 'unchanged');
  if (changes.length > 0) {
    lines.push('');
    lines.push('Results:');
    for (const result of changes) {
      if (result.action === 'failed') {
        lines.push(`  [FAIL] #${result.sourceNumber}: ${result.error ?? 'unknown error'}`);
      } else {
        const target = result.destinationUrl ? ` -> ${result.destinationUrl}` : '';
        lines.push(`  [${result.action.toUpperCase()}] #${result.sourceNumber}${target}`);
      }
    }
  }

  return lines.join('\n');
}
