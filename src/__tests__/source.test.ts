import { describe, it, expect, vi, beforeEach } from 'vitest';
import { GitHubClientError } from '../github/client.js';
import { ResolutionSource, type SourceClient } from '../resolutions/source.js';
import type { IssueComment, IssueFilter, UpdatedIssue } from '../github/types.js';
import type { RepoRef } from '../types/config.js';

const repo = { owner: 'example-wg', name: 'proposals' };

function createIssue(number: number): UpdatedIssue {
  return {
    number,
    title: `Issue ${number}`,
    url: `https://github.com/example-wg/proposals/issues/${number}`,
    updatedAt: `2024-03-0${number}T10:00:00Z`,
    labels: [],
  };
}

function createComment(issueNumber: number, bodyText: string): IssueComment {
  return {
    url: `https://github.com/example-wg/proposals/issues/${issueNumber}#issuecomment-${issueNumber}1`,
    createdAt: '2024-02-15T10:00:00Z',
    bodyText,
  };
}

describe('ResolutionSource', () => {
  const getUpdatedIssues = vi.fn(async (_repo: RepoRef, _filter: IssueFilter): Promise<UpdatedIssue[]> => []);
  const getIssueComments = vi.fn(async (_repo: RepoRef, _number: number): Promise<IssueComment[]> => []);
  const client: SourceClient = { getUpdatedIssues, getIssueComments };

  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('queries with the configured filter and keeps resolution-bearing issues', async () => {
    getUpdatedIssues.mockResolvedValueOnce([createIssue(1), createIssue(2)]);
    getIssueComments
      .mockResolvedValueOnce([createComment(1, 'Discussed, no decision')])
      .mockResolvedValueOnce([createComment(2, 'RESOLVED: Adopt the proposal')]);

    const source = new ResolutionSource(client, { repo, labels: ['agenda+'], states: ['OPEN'] });
    const result = await source.fetchItems('2024-01-01T00:00:00Z');

    expect(getUpdatedIssues).toHaveBeenCalledWith(repo, {
      since: '2024-01-01T00:00:00Z',
      labels: ['agenda+'],
      states: ['OPEN'],
    });
    expect(getIssueComments).toHaveBeenNthCalledWith(1, repo, 1);
    expect(getIssueComments).toHaveBeenNthCalledWith(2, repo, 2);
    expect(result.issues.map((issue) => issue.number)).toEqual([1, 2]);
    expect(result.failed).toEqual([]);
    expect(result.items).toHaveLength(1);
    expect(result.items[0]).toMatchObject({
      number: 2,
      title: 'Issue 2',
      body: 'Adopt the proposal',
      updatedAt: '2024-03-02T10:00:00Z',
    });
  });

  it('uses a custom resolution prefix', async () => {
    getUpdatedIssues.mockResolvedValueOnce([createIssue(1)]);
    getIssueComments.mockResolvedValueOnce([createComment(1, 'DECISION: Keep it\nRESOLVED: Ignored')]);

    const source = new ResolutionSource(client, { repo, resolutionPrefix: 'DECISION: ' });
    const result = await source.fetchItems('2024-01-01T00:00:00Z');

    expect(result.items[0].body).toBe('Keep it');
  });

  it('skips an issue whose comments cannot be read', async () => {
    getUpdatedIssues.mockResolvedValueOnce([createIssue(1), createIssue(2)]);
    getIssueComments
      .mockRejectedValueOnce(new GitHubClientError('Bad gateway', 502, true))
      .mockResolvedValueOnce([createComment(2, 'RESOLVED: Adopt it')]);
    const logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };

    const source = new ResolutionSource(client, { repo, logger });
    const result = await source.fetchItems('2024-01-01T00:00:00Z');

    expect(result.failed.map((issue) => issue.number)).toEqual([1]);
    expect(result.items.map((item) => item.number)).toEqual([2]);
    expect(logger.warn).toHaveBeenCalledWith('Could not read comments of example-wg/proposals#1: Bad gateway');
  });

  it('skips an issue whose comment read hit a 403 rate limit', async () => {
    getUpdatedIssues.mockResolvedValueOnce([createIssue(1), createIssue(2)]);
    getIssueComments
      .mockRejectedValueOnce(new GitHubClientError('Rate limited. Please wait and try again.', 403, true))
      .mockResolvedValueOnce([createComment(2, 'RESOLVED: Adopt it')]);

    const source = new ResolutionSource(client, { repo });
    const result = await source.fetchItems('2024-01-01T00:00:00Z');

    expect(result.failed.map((issue) => issue.number)).toEqual([1]);
    expect(result.items.map((item) => item.number)).toEqual([2]);
  });

  it('notes issues with more labels than were fetched', async () => {
    getUpdatedIssues.mockResolvedValueOnce([
      { ...createIssue(1), labels: [{ name: 'agenda+', color: 'd4c5f9' }], labelCount: 60 },
      { ...createIssue(2), labels: [{ name: 'agenda+', color: 'd4c5f9' }], labelCount: 1 },
    ]);
    const logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };

    const source = new ResolutionSource(client, { repo, logger });
    await source.fetchItems('2024-01-01T00:00:00Z');

    expect(logger.debug).toHaveBeenCalledWith('Issue #1 has 60 labels; only the first 1 are mirrored');
    expect(logger.debug).not.toHaveBeenCalledWith(expect.stringContaining('Issue #2 has'));
  });

  it('propagates authentication failures', async () => {
    getUpdatedIssues.mockResolvedValueOnce([createIssue(1)]);
    getIssueComments.mockRejectedValueOnce(
      new GitHubClientError('Authentication failed. Check your GitHub token.', 401)
    );

    const source = new ResolutionSource(client, { repo });

    await expect(source.fetchItems('2024-01-01T00:00:00Z')).rejects.toThrow(
      'Authentication failed. Check your GitHub token.'
    );
  });
});
