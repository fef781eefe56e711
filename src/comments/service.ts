/**
 * Comment service for posting updates on existing GitHub issues
 * Uses the GitHub REST API for comment operations
 */

import { GitHubClientError } from '../github/client.js';
import { restRequest } from '../github/rest.js';
import type {
  AddCommentInput,
  GitHubCommentResponse,
  Comment,
  CommentServiceOptions,
} from './types.js';

/**
 * Comment service for adding comments to GitHub issues
 */
export class CommentService {
  private token: string;

  constructor(options: CommentServiceOptions) {
    this.token = options.token;
  }

  /**
   * Add a comment to an issue using the REST API
   *
   * @throws GitHubClientError with status 404/410 when the issue no longer exists
   */
  async addComment(input: AddCommentInput): Promise<Comment> {
    const { owner, repo, issueNumber, body } = input;

    const response = await restRequest(
      this.token,
      `/repos/${owner}/${repo}/issues/${issueNumber}/comments`,
      {
        method: 'POST',
        body: { body },
        subject: `issue #${issueNumber} in ${owner}/${repo}`,
      }
    );

    const commentResponse = (await response.json()) as GitHubCommentResponse;
    return this.mapToComment(commentResponse);
  }

  /**
   * Map GitHub API response to simplified Comment type
   */
  private mapToComment(response: GitHubCommentResponse): Comment {
    return {
      id: response.id,
      nodeId: response.node_id,
      body: response.body,
      author: response.user.login,
      url: response.html_url,
      createdAt: response.created_at,
      updatedAt: response.updated_at,
    };
  }
}

/**
 * Create a comment service instance
 */
export function createCommentService(token: string): CommentService {
  if (!token) {
    throw new GitHubClientError('GitHub token is required');
  }
  return new CommentService({ token });
}
