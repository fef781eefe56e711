import type { GitHubClient } from '../github/client.js';
import { isAuthError } from '../github/client.js';
import type { IssueState, RepoRef } from '../types/config.js';
import type { UpdatedIssue } from '../github/types.js';
import type { SourceItem } from '../tracking/types.js';
import { buildSourceItem, DEFAULT_RESOLUTION_PREFIX } from './extractor.js';
import { silentLogger, type Logger } from '../utils/logger.js';

/**
 * Read operations needed from the source repository
 */
export type SourceClient = Pick<GitHubClient, 'getUpdatedIssues' | 'getIssueComments'>;

export interface ResolutionSourceOptions {
  repo: RepoRef;
  /** Only issues with one of these labels (no filter when empty) */
  labels?: string[];
  states?: IssueState[];
  resolutionPrefix?: string;
  logger?: Logger;
}

/**
 * Result of reading the source repository
 */
export interface SourceFetchResult {
  /** Resolution-bearing issues */
  items: SourceItem[];
  /** Every issue returned by the updated-issues query, with or without resolutions */
  issues: UpdatedIssue[];
  /** Issues whose comments could not be read this run */
  failed: UpdatedIssue[];
}

/**
 * Reads resolution-bearing issues from the source repository
 */
export class ResolutionSource {
  private client: SourceClient;
  private options: ResolutionSourceOptions;
  private logger: Logger;

  constructor(client: SourceClient, options: ResolutionSourceOptions) {
    this.client = client;
    this.options = options;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Fetch issues updated since `since` and turn those carrying resolutions into source items.
   * A failure to read one issue's comments skips that issue; auth failures propagate.
   */
  async fetchItems(since: string): Promise<SourceFetchResult> {
    const { repo, labels, states } = this.options;
    const prefix = this.options.resolutionPrefix ?? DEFAULT_RESOLUTION_PREFIX;

    const issues = await this.client.getUpdatedIssues(repo, { since, labels, states });
    this.logger.debug(`Found ${issues.length} issue(s) in ${repo.owner}/${repo.name} updated since ${since}`);

    const items: SourceItem[] = [];
    const failed: UpdatedIssue[] = [];

    for (const issue of issues) {
      if (issue.labelCount !== undefined && issue.labelCount > issue.labels.length) {
        this.logger.debug(
          `Issue #${issue.number} has ${issue.labelCount} labels; only the first ${issue.labels.length} are mirrored`
        );
      }

      try {
        const comments = await this.client.getIssueComments(repo, issue.number);
        const item = buildSourceItem(issue, comments, prefix);
        if (item) {
          items.push(item);
        }
      } catch (error) {
        if (isAuthError(error)) {
          throw error;
        }
        failed.push(issue);
        this.logger.warn(
          `Could not read comments of ${repo.owner}/${repo.name}#${issue.number}: ${error instanceof Error ? error.message : String(error)}`
        );
      }
    }

    return { items, issues, failed };
  }
}
