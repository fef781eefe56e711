/**
 * One batch run of the resolution tracker:
 * lock -> load state and repo config -> read source -> sync (saving each record) -> save cursor -> unlock
 */

import { createGitHubClient } from './github/client.js';
import { createIssueService, type IssueService } from './issues/service.js';
import { createCommentService } from './comments/service.js';
import { defaultRepoConfig, parseRepoConfigString } from './config/parser.js';
import { ResolutionSource, type SourceClient } from './resolutions/source.js';
import {
  GitHubDestination,
  type DestinationCommentService,
  type DestinationIssueService,
} from './tracking/destination.js';
import { syncItems, type SyncOutcome } from './tracking/engine.js';
import {
  getStatePath,
  readTrackingState,
  releaseLock,
  tryAcquireLock,
  verifyStateIntegrity,
  withCursor,
  writeTrackingState,
} from './tracking/state.js';
import { SyncAbortedError, type SyncSummary, type TrackingState } from './tracking/types.js';
import type { NormalizedConfig, RepoConfig, RepoRef } from './types/config.js';
import { silentLogger, type Logger } from './utils/logger.js';

/**
 * Services a run talks to; defaults are the real GitHub clients built from the config token
 */
export interface TrackerDependencies {
  source?: SourceClient;
  issueService?: DestinationIssueService & Pick<IssueService, 'getFileContent'>;
  commentService?: DestinationCommentService;
}

export interface TrackerRunOptions {
  dryRun?: boolean;
  logger?: Logger;
  now?: () => Date;
  dependencies?: TrackerDependencies;
}

export type TrackerRunResult =
  | { status: 'locked' }
  | { status: 'completed'; summary: SyncSummary; state: TrackingState };

/**
 * Run the tracker once.
 * Returns `locked` without doing anything when another run holds the state lock.
 */
export async function runTracker(
  config: NormalizedConfig,
  options: TrackerRunOptions = {}
): Promise<TrackerRunResult> {
  const { dryRun = false, now = () => new Date() } = options;
  const logger = options.logger ?? silentLogger;
  const deps = options.dependencies ?? {};
  const statePath = getStatePath(config.stateDirectory);

  const lockId = dryRun ? null : tryAcquireLock(statePath);
  if (!dryRun && lockId === null) {
    logger.info('Another tracker run holds the lock; exiting');
    return { status: 'locked' };
  }

  try {
    const state = readTrackingState(statePath, config.startDate);
    for (const issue of verifyStateIntegrity(state).issues) {
      logger.warn(`State file: ${issue}`);
    }

    const sourceClient = deps.source ?? createGitHubClient(config.github.token);
    const issueService = deps.issueService ?? createIssueService(config.github.token);
    const commentService = deps.commentService ?? createCommentService(config.github.token);

    const repoConfig = await loadRepoConfig(issueService, config.destinationRepo, config.repoConfigPath, logger);

    const source = new ResolutionSource(sourceClient, {
      repo: config.sourceRepo,
      labels: config.source.labels,
      states: config.source.states,
      resolutionPrefix: config.source.resolutionPrefix,
      logger,
    });
    const fetched = await source.fetchItems(state.since);
    logger.info(`${fetched.items.length} resolution issue(s) to check since ${state.since}`);

    const destination = new GitHubDestination(config.destinationRepo, issueService, commentService);

    let outcome: SyncOutcome;
    try {
      outcome = await syncItems(fetched.items, state, destination, {
        sourceRepo: config.sourceRepo,
        repoConfig,
        dryRun,
        logger,
        now,
        // Records are saved as they are made; the cursor only moves in the final write
        onProgress: dryRun ? undefined : (progress) => writeTrackingState(progress, statePath, now),
      });
    } catch (error) {
      if (error instanceof SyncAbortedError && !dryRun) {
        writeTrackingState(error.state, statePath, now);
      }
      throw error;
    }

    const failedNumbers = new Set(
      outcome.summary.results.filter((result) => result.action === 'failed').map((result) => result.sourceNumber)
    );
    const failedUpdates = [
      ...fetched.failed.map((issue) => issue.updatedAt),
      ...fetched.items.filter((item) => failedNumbers.has(item.number)).map((item) => item.updatedAt),
    ];

    if (dryRun) {
      return { status: 'completed', summary: outcome.summary, state: outcome.state };
    }

    const nextState = withCursor(
      outcome.state,
      computeNextCursor(state.since, fetched.issues.map((issue) => issue.updatedAt), failedUpdates)
    );
    writeTrackingState(nextState, statePath, now);

    return { status: 'completed', summary: outcome.summary, state: nextState };
  } finally {
    if (lockId !== null) {
      releaseLock(statePath, lockId);
    }
  }
}

/**
 * Where the next run starts reading source issues.
 * Moves to the newest fetched update, but never past an issue that failed this run.
 */
export function computeNextCursor(current: string, fetchedUpdates: string[], failedUpdates: string[]): string {
  if (failedUpdates.length > 0) {
    return failedUpdates.reduce((earliest, value) => (Date.parse(value) < Date.parse(earliest) ? value : earliest));
  }

  return fetchedUpdates.reduce(
    (latest, value) => (Date.parse(value) > Date.parse(latest) ? value : latest),
    current
  );
}

/**
 * Load the label rules kept in the destination repository; a missing file means no rules
 */
export async function loadRepoConfig(
  issueService: Pick<IssueService, 'getFileContent'>,
  repo: RepoRef,
  filePath: string,
  logger: Logger = silentLogger
): Promise<RepoConfig> {
  const content = await issueService.getFileContent(repo.owner, repo.name, filePath);
  if (content === null) {
    logger.debug(`No ${filePath} in ${repo.owner}/${repo.name}; labels will not be mirrored`);
    return defaultRepoConfig();
  }
  return parseRepoConfigString(content);
}
