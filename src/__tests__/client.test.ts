import { describe, it, expect, vi, beforeEach } from 'vitest';
import { ClientError } from 'graphql-request';
import { GraphQLError } from 'graphql';

const mockRequest = vi.fn();

// Mock the GraphQL transport
vi.mock('graphql-request', async () => {
  const actual = await vi.importActual<typeof import('graphql-request')>('graphql-request');
  return {
    ...actual,
    GraphQLClient: class MockGraphQLClient {
      request = mockRequest;
    },
  };
});

// Import after mocking
import {
  GitHubClient,
  GitHubClientError,
  createGitHubClient,
  isAuthError,
  isNotFoundError,
} from '../github/client.js';
import { ResolutionSource } from '../resolutions/source.js';

const repo = { owner: 'example-wg', name: 'proposals' };

function createClientError(status: number, errors?: GraphQLError[], headers?: Headers): ClientError {
  const response = { status, errors, headers };
  return new ClientError(response, { query: 'query' });
}

function rateLimitHeaders(): Headers {
  return new Headers({ 'retry-after': '60', 'x-ratelimit-remaining': '0' });
}

function githubError(message: string, type: string): GraphQLError {
  return Object.assign(new GraphQLError(message), { type });
}

function issueNode(number: number) {
  return {
    number,
    title: `Issue ${number}`,
    url: `https://github.com/example-wg/proposals/issues/${number}`,
    updatedAt: `2024-03-0${number}T10:00:00Z`,
    labels: { totalCount: 1, nodes: [{ name: 'agenda+', color: 'd4c5f9' }] },
  };
}

describe('GitHubClient', () => {
  let client: GitHubClient;

  beforeEach(() => {
    vi.resetAllMocks();
    client = new GitHubClient({ token: 'test-token', retryDelayMs: 0 });
  });

  describe('getUpdatedIssues', () => {
    it('follows pagination and maps nodes', async () => {
      mockRequest
        .mockResolvedValueOnce({
          repository: {
            issues: {
              pageInfo: { hasNextPage: true, endCursor: 'cursor-1' },
              nodes: [issueNode(1), null],
            },
          },
        })
        .mockResolvedValueOnce({
          repository: {
            issues: {
              pageInfo: { hasNextPage: false, endCursor: null },
              nodes: [issueNode(2)],
            },
          },
        });

      const issues = await client.getUpdatedIssues(repo, { since: '2024-01-01T00:00:00Z', labels: [], states: ['OPEN'] });

      expect(issues).toEqual([
        {
          number: 1,
          title: 'Issue 1',
          url: 'https://github.com/example-wg/proposals/issues/1',
          updatedAt: '2024-03-01T10:00:00Z',
          labels: [{ name: 'agenda+', color: 'd4c5f9' }],
          labelCount: 1,
        },
        {
          number: 2,
          title: 'Issue 2',
          url: 'https://github.com/example-wg/proposals/issues/2',
          updatedAt: '2024-03-02T10:00:00Z',
          labels: [{ name: 'agenda+', color: 'd4c5f9' }],
          labelCount: 1,
        },
      ]);
      expect(mockRequest).toHaveBeenCalledTimes(2);
      expect(mockRequest.mock.calls[0][1]).toEqual({
        owner: 'example-wg',
        name: 'proposals',
        since: '2024-01-01T00:00:00Z',
        labels: undefined,
        states: ['OPEN'],
        first: 100,
        after: undefined,
      });
      expect(mockRequest.mock.calls[1][1]).toMatchObject({ after: 'cursor-1' });
    });

    it('throws a not-found error for a missing repository', async () => {
      mockRequest.mockResolvedValueOnce({ repository: null });

      const error = await client.getUpdatedIssues(repo, { since: '2024-01-01T00:00:00Z' }).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(GitHubClientError);
      expect(isNotFoundError(error)).toBe(true);
      expect(error instanceof Error && error.message).toBe('Repository example-wg/proposals not found');
    });
  });

  describe('getIssueComments', () => {
    it('returns comments in order across pages', async () => {
      mockRequest
        .mockResolvedValueOnce({
          repository: {
            issue: {
              comments: {
                pageInfo: { hasNextPage: true, endCursor: 'cursor-1' },
                nodes: [{ url: 'https://example.test/c1', createdAt: '2024-02-01T10:00:00Z', bodyText: 'First' }],
              },
            },
          },
        })
        .mockResolvedValueOnce({
          repository: {
            issue: {
              comments: {
                pageInfo: { hasNextPage: false, endCursor: null },
                nodes: [{ url: 'https://example.test/c2', createdAt: '2024-02-02T10:00:00Z', bodyText: 'RESOLVED: Second' }],
              },
            },
          },
        });

      const comments = await client.getIssueComments(repo, 7);

      expect(comments.map((comment) => comment.bodyText)).toEqual(['First', 'RESOLVED: Second']);
      expect(mockRequest.mock.calls[0][1]).toMatchObject({ owner: 'example-wg', name: 'proposals', number: 7 });
    });

    it('throws a not-found error for a missing issue', async () => {
      mockRequest.mockResolvedValueOnce({ repository: { issue: null } });

      await expect(client.getIssueComments(repo, 7)).rejects.toThrow('Issue #7 not found in example-wg/proposals');
    });
  });

  describe('error handling', () => {
    it('retries server errors and succeeds', async () => {
      mockRequest
        .mockRejectedValueOnce(createClientError(502))
        .mockRejectedValueOnce(createClientError(503))
        .mockResolvedValueOnce({ repository: { issue: { comments: { pageInfo: { hasNextPage: false, endCursor: null }, nodes: [] } } } });

      await expect(client.getIssueComments(repo, 7)).resolves.toEqual([]);
      expect(mockRequest).toHaveBeenCalledTimes(3);
    });

    it('gives up after three attempts', async () => {
      mockRequest.mockRejectedValue(createClientError(503));

      const error = await client.getIssueComments(repo, 7).catch((e: unknown) => e);

      expect(mockRequest).toHaveBeenCalledTimes(3);
      expect(error).toBeInstanceOf(GitHubClientError);
      if (!(error instanceof GitHubClientError)) return;
      expect(error.statusCode).toBe(503);
      expect(error.isRetryable).toBe(true);
    });

    it('does not retry authentication failures', async () => {
      mockRequest.mockRejectedValueOnce(createClientError(401));

      const error = await client.getIssueComments(repo, 7).catch((e: unknown) => e);

      expect(mockRequest).toHaveBeenCalledTimes(1);
      expect(isAuthError(error)).toBe(true);
      expect(error instanceof Error && error.message).toBe('Authentication failed. Check your GitHub token.');
    });

    it('retries a 403 secondary rate limit and reports it as retryable', async () => {
      mockRequest.mockRejectedValue(createClientError(403, undefined, rateLimitHeaders()));

      const error = await client.getIssueComments(repo, 7).catch((e: unknown) => e);

      expect(mockRequest).toHaveBeenCalledTimes(3);
      expect(error).toMatchObject({
        statusCode: 403,
        isRetryable: true,
        message: 'Rate limited. Please wait and try again.',
      });
      expect(isAuthError(error)).toBe(false);
    });

    it('reads rate-limit headers given as a plain object', async () => {
      const response = { status: 403, headers: { 'X-RateLimit-Remaining': '0' } };
      mockRequest.mockRejectedValue(new ClientError(response, { query: 'query' }));

      const error = await client.getIssueComments(repo, 7).catch((e: unknown) => e);

      expect(error).toMatchObject({ statusCode: 403, isRetryable: true });
    });

    it('treats a 403 without rate-limit headers as an auth failure', async () => {
      mockRequest.mockRejectedValueOnce(createClientError(403, undefined, new Headers({ 'x-ratelimit-remaining': '4999' })));

      const error = await client.getIssueComments(repo, 7).catch((e: unknown) => e);

      expect(mockRequest).toHaveBeenCalledTimes(1);
      expect(isAuthError(error)).toBe(true);
      expect(error instanceof Error && error.message).toBe('Access denied. Ensure your token has the required scopes.');
    });

    it('maps GitHub error types', async () => {
      mockRequest
        .mockRejectedValueOnce(createClientError(200, [githubError('API rate limit exceeded', 'RATE_LIMITED')]))
        .mockRejectedValueOnce(createClientError(200, [githubError('Could not resolve to an Issue', 'NOT_FOUND')]));

      const rateLimited = await client.getIssueComments(repo, 7).catch((e: unknown) => e);
      const notFound = await client.getIssueComments(repo, 8).catch((e: unknown) => e);

      expect(rateLimited).toMatchObject({ statusCode: 429, isRetryable: true, message: 'API rate limit exceeded' });
      expect(isAuthError(rateLimited)).toBe(false);
      expect(notFound).toMatchObject({ statusCode: 404, message: 'Could not resolve to an Issue' });
      expect(isNotFoundError(notFound)).toBe(true);
    });
  });

  it('requires a token', () => {
    expect(() => createGitHubClient('')).toThrow('GitHub token is required');
  });

  it('lets a source run continue past a rate-limited comment read', async () => {
    mockRequest
      .mockResolvedValueOnce({
        repository: {
          issues: {
            pageInfo: { hasNextPage: false, endCursor: null },
            nodes: [issueNode(1)],
          },
        },
      })
      .mockRejectedValue(createClientError(403, undefined, rateLimitHeaders()));

    const source = new ResolutionSource(client, { repo });
    const result = await source.fetchItems('2024-01-01T00:00:00Z');

    expect(result.items).toEqual([]);
    expect(result.failed.map((issue) => issue.number)).toEqual([1]);
    expect(mockRequest).toHaveBeenCalledTimes(4);
  });
});

describe('error classification', () => {
  it('treats 401 and non-rate-limit 403 as auth errors', () => {
    expect(isAuthError(new GitHubClientError('x', 401))).toBe(true);
    expect(isAuthError(new GitHubClientError('x', 403))).toBe(true);
    expect(isAuthError(new GitHubClientError('x', 403, true))).toBe(false);
    expect(isAuthError(new GitHubClientError('x', 500, true))).toBe(false);
    expect(isAuthError(new Error('x'))).toBe(false);
  });

  it('treats 404 and 410 as not found', () => {
    expect(isNotFoundError(new GitHubClientError('x', 404))).toBe(true);
    expect(isNotFoundError(new GitHubClientError('x', 410))).toBe(true);
    expect(isNotFoundError(new GitHubClientError('x', 422))).toBe(false);
  });
});
