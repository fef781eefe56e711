import { GraphQLClient, ClientError } from 'graphql-request';
import type {
  IssueComment,
  IssueFilter,
  UpdatedIssue,
  GetIssueCommentsResponse,
  GetUpdatedIssuesResponse,
} from './types.js';
import { GET_ISSUE_COMMENTS, GET_UPDATED_ISSUES } from './queries.js';
import type { RepoRef } from '../types/config.js';

export const GITHUB_GRAPHQL_ENDPOINT = 'https://api.github.com/graphql';
export const GITHUB_REST_ENDPOINT = 'https://api.github.com';
const MAX_RETRIES = 3;
const BASE_DELAY_MS = 1000;
const PAGE_SIZE = 100;

export interface GitHubClientOptions {
  token: string;
  /** Base delay for exponential backoff between retries */
  retryDelayMs?: number;
}

export class GitHubClientError extends Error {
  constructor(
    message: string,
    public readonly statusCode?: number,
    public readonly isRetryable: boolean = false
  ) {
    super(message);
    this.name = 'GitHubClientError';
  }
}

/**
 * True when the token is missing, invalid or lacks permission.
 * A 403 caused by rate limiting is not an auth error.
 */
export function isAuthError(error: unknown): boolean {
  if (!(error instanceof GitHubClientError)) {
    return false;
  }
  return error.statusCode === 401 || (error.statusCode === 403 && !error.isRetryable);
}

/**
 * True when the requested resource does not exist (or was deleted)
 */
export function isNotFoundError(error: unknown): boolean {
  return error instanceof GitHubClientError && (error.statusCode === 404 || error.statusCode === 410);
}

/**
 * GitHub GraphQL client for reading issues and comments of the source repository
 */
export class GitHubClient {
  private client: GraphQLClient;
  private token: string;
  private retryDelayMs: number;

  constructor(options: GitHubClientOptions) {
    this.token = options.token;
    this.retryDelayMs = options.retryDelayMs ?? BASE_DELAY_MS;
    this.client = new GraphQLClient(GITHUB_GRAPHQL_ENDPOINT, {
      headers: {
        authorization: `Bearer ${this.token}`,
      },
    });
  }

  /**
   * Get every issue of a repository updated since `filter.since`, oldest update first
   */
  async getUpdatedIssues(repo: RepoRef, filter: IssueFilter): Promise<UpdatedIssue[]> {
    const issues: UpdatedIssue[] = [];
    let cursor: string | undefined = undefined;

    // eslint-disable-next-line no-constant-condition
    while (true) {
      const response: GetUpdatedIssuesResponse = await this.executeWithRetry<GetUpdatedIssuesResponse>(
        GET_UPDATED_ISSUES,
        {
          owner: repo.owner,
          name: repo.name,
          since: filter.since,
          labels: filter.labels && filter.labels.length > 0 ? filter.labels : undefined,
          states: filter.states && filter.states.length > 0 ? filter.states : undefined,
          first: PAGE_SIZE,
          after: cursor,
        }
      );

      if (!response.repository) {
        throw new GitHubClientError(`Repository ${repo.owner}/${repo.name} not found`, 404);
      }

      const page = response.repository.issues;
      for (const node of page.nodes ?? []) {
        if (!node) continue;
        issues.push({
          number: node.number,
          title: node.title,
          url: node.url,
          updatedAt: node.updatedAt,
          labels: node.labels?.nodes ?? [],
          labelCount: node.labels?.totalCount,
        });
      }

      if (!page.pageInfo.hasNextPage || !page.pageInfo.endCursor) {
        break;
      }
      cursor = page.pageInfo.endCursor;
    }

    return issues;
  }

  /**
   * Get all comments of an issue, in creation order
   */
  async getIssueComments(repo: RepoRef, issueNumber: number): Promise<IssueComment[]> {
    const comments: IssueComment[] = [];
    let cursor: string | undefined = undefined;

    // eslint-disable-next-line no-constant-condition
    while (true) {
      const response: GetIssueCommentsResponse = await this.executeWithRetry<GetIssueCommentsResponse>(
        GET_ISSUE_COMMENTS,
        { owner: repo.owner, name: repo.name, number: issueNumber, first: PAGE_SIZE, after: cursor }
      );

      const issue = response.repository?.issue;
      if (!issue) {
        throw new GitHubClientError(`Issue #${issueNumber} not found in ${repo.owner}/${repo.name}`, 404);
      }

      for (const node of issue.comments.nodes ?? []) {
        if (node) {
          comments.push({ url: node.url, createdAt: node.createdAt, bodyText: node.bodyText });
        }
      }

      if (!issue.comments.pageInfo.hasNextPage || !issue.comments.pageInfo.endCursor) {
        break;
      }
      cursor = issue.comments.pageInfo.endCursor;
    }

    return comments;
  }

  /**
   * Execute a GraphQL query with retry logic
   */
  private async executeWithRetry<T>(
    query: string,
    variables: Record<string, unknown>
  ): Promise<T> {
    let lastError: unknown = null;

    for (let attempt = 0; attempt < MAX_RETRIES; attempt++) {
      try {
        return await this.client.request<T>(query, variables);
      } catch (error) {
        lastError = error;

        if (!this.isRetryableError(error)) {
          throw this.wrapError(error);
        }

        // Exponential backoff
        if (attempt < MAX_RETRIES - 1) {
          await this.sleep(this.retryDelayMs * Math.pow(2, attempt));
        }
      }
    }

    throw this.wrapError(lastError);
  }

  /**
   * Check if an error is retryable
   */
  private isRetryableError(error: unknown): boolean {
    if (error instanceof ClientError) {
      const status = error.response?.status;
      return status === 502 || status === 503 || status === 429 || isRateLimitedResponse(error);
    }
    return false;
  }

  /**
   * Wrap errors in GitHubClientError
   */
  private wrapError(error: unknown): GitHubClientError {
    if (error instanceof GitHubClientError) {
      return error;
    }

    if (error instanceof ClientError) {
      const status = error.response?.status;
      const first: unknown = error.response?.errors?.[0];
      const message = firstErrorMessage(first) ?? error.message;

      if (status === 401) {
        return new GitHubClientError('Authentication failed. Check your GitHub token.', 401);
      }
      if (status === 403 && isRateLimitedResponse(error)) {
        return new GitHubClientError('Rate limited. Please wait and try again.', 403, true);
      }
      if (status === 403) {
        return new GitHubClientError(
          'Access denied. Ensure your token has the required scopes.',
          403
        );
      }
      if (status === 429) {
        return new GitHubClientError('Rate limited. Please wait and try again.', 429, true);
      }
      if (hasErrorType(first, 'RATE_LIMITED')) {
        return new GitHubClientError(message, 429, true);
      }
      if (hasErrorType(first, 'NOT_FOUND')) {
        return new GitHubClientError(message, 404);
      }
      if (status === 502 || status === 503) {
        return new GitHubClientError(message, status, true);
      }

      return new GitHubClientError(message, status);
    }

    if (error instanceof Error) {
      return new GitHubClientError(error.message);
    }

    return new GitHubClientError('Unknown error occurred');
  }

  /**
   * Sleep for the specified duration
   */
  private sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }
}

function firstErrorMessage(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string') {
    return error.message;
  }
  return undefined;
}

// Secondary rate limits come back as 403 with rate-limit headers
function isRateLimitedResponse(error: ClientError): boolean {
  if (error.response?.status !== 403) {
    return false;
  }
  return readHeader(error.response.headers, 'x-ratelimit-remaining') === '0'
    || readHeader(error.response.headers, 'retry-after') !== null;
}

function readHeader(headers: unknown, name: string): string | null {
  if (headers instanceof Headers) {
    return headers.get(name);
  }
  if (typeof headers === 'object' && headers !== null) {
    const value: unknown = Object.entries(headers).find(([key]) => key.toLowerCase() === name)?.[1];
    return typeof value === 'string' ? value : null;
  }
  return null;
}

// GitHub reports GraphQL error kinds in a non-standard `type` field
function hasErrorType(error: unknown, type: string): boolean {
  return typeof error === 'object' && error !== null && 'type' in error && error.type === type;
}

/**
 * Create a GitHub client with the provided token
 */
export function createGitHubClient(token: string, options: Omit<GitHubClientOptions, 'token'> = {}): GitHubClient {
  if (!token) {
    throw new GitHubClientError('GitHub token is required');
  }
  return new GitHubClient({ token, ...options });
}
