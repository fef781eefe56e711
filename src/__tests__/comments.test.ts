import { describe, it, expect, vi, beforeEach } from 'vitest';
import { isNotFoundError } from '../github/client.js';
import { createCommentService, CommentService } from '../comments/service.js';

// Mock fetch for REST API calls
const mockFetch = vi.fn();
global.fetch = mockFetch;

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

describe('CommentService', () => {
  let service: CommentService;

  beforeEach(() => {
    vi.clearAllMocks();
    service = createCommentService('test-token');
  });

  it('posts a comment and maps the response', async () => {
    mockFetch.mockResolvedValueOnce(
      jsonResponse(
        {
          id: 555,
          node_id: 'IC_555',
          url: 'https://api.github.com/repos/example-org/spec/issues/comments/555',
          html_url: 'https://github.com/example-org/spec/issues/12#issuecomment-555',
          body: 'A new resolution was made.',
          user: { id: 1, login: 'tracker-bot' },
          created_at: '2024-03-05T09:00:00Z',
          updated_at: '2024-03-05T09:00:00Z',
          issue_url: 'https://api.github.com/repos/example-org/spec/issues/12',
        },
        201
      )
    );

    const comment = await service.addComment({
      owner: 'example-org',
      repo: 'spec',
      issueNumber: 12,
      body: 'A new resolution was made.',
    });

    expect(mockFetch).toHaveBeenCalledWith(
      'https://api.github.com/repos/example-org/spec/issues/12/comments',
      expect.objectContaining({
        method: 'POST',
        body: JSON.stringify({ body: 'A new resolution was made.' }),
      })
    );
    expect(comment).toEqual({
      id: 555,
      nodeId: 'IC_555',
      body: 'A new resolution was made.',
      author: 'tracker-bot',
      url: 'https://github.com/example-org/spec/issues/12#issuecomment-555',
      createdAt: '2024-03-05T09:00:00Z',
      updatedAt: '2024-03-05T09:00:00Z',
    });
  });

  it('reports a deleted issue as not found', async () => {
    mockFetch.mockResolvedValueOnce(jsonResponse({ message: 'This issue was deleted' }, 410));

    const error = await service
      .addComment({ owner: 'example-org', repo: 'spec', issueNumber: 12, body: 'Update' })
      .catch((e: unknown) => e);

    expect(isNotFoundError(error)).toBe(true);
    expect(error instanceof Error && error.message).toBe('Gone: issue #12 in example-org/spec was deleted.');
  });

  it('reports a missing issue as not found', async () => {
    mockFetch.mockResolvedValueOnce(jsonResponse({ message: 'Not Found' }, 404));

    const error = await service
      .addComment({ owner: 'example-org', repo: 'spec', issueNumber: 99, body: 'Update' })
      .catch((e: unknown) => e);

    expect(isNotFoundError(error)).toBe(true);
    expect(error instanceof Error && error.message).toBe('Not found: issue #99 in example-org/spec.');
  });

  it('requires a token', () => {
    expect(() => createCommentService('')).toThrow('GitHub token is required');
  });
});
