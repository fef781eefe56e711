/**
 * Issue service for the destination repository.
 * Uses the GitHub REST API for issue, label and file operations.
 */

import { GitHubClientError } from '../github/client.js';
import { restRequest } from '../github/rest.js';
import type {
  CreateIssueInput,
  EnsureLabelInput,
  EnsureLabelResult,
  GitHubIssueResponse,
  Issue,
  IssueServiceOptions,
} from './types.js';

/**
 * Issue service for creating issues and their labels
 */
export class IssueService {
  private token: string;

  constructor(options: IssueServiceOptions) {
    this.token = options.token;
  }

  /**
   * Create a new issue in a repository
   */
  async createIssue(input: CreateIssueInput): Promise<Issue> {
    const { owner, repo, title, body, labels } = input;

    const response = await restRequest(this.token, `/repos/${owner}/${repo}/issues`, {
      method: 'POST',
      body: {
        title,
        body,
        labels: labels && labels.length > 0 ? labels : undefined,
      },
      subject: `new issue in ${owner}/${repo}`,
    });

    const issueResponse = (await response.json()) as GitHubIssueResponse;
    return this.mapToIssue(issueResponse);
  }

  /**
   * Create a label unless one with the same name already exists
   */
  async ensureLabel(input: EnsureLabelInput): Promise<EnsureLabelResult> {
    const { owner, repo, name, color } = input;

    try {
      await restRequest(this.token, `/repos/${owner}/${repo}/labels`, {
        method: 'POST',
        body: { name, color },
        subject: `label "${name}" in ${owner}/${repo}`,
      });
      return 'created';
    } catch (error) {
      if (error instanceof GitHubClientError && error.statusCode === 422 && error.message.includes('already_exists')) {
        return 'exists';
      }
      throw error;
    }
  }

  /**
   * Read a file from the default branch of a repository
   *
   * @returns The file content, or null if the file does not exist
   */
  async getFileContent(owner: string, repo: string, filePath: string): Promise<string | null> {
    try {
      const response = await restRequest(
        this.token,
        `/repos/${owner}/${repo}/contents/${filePath.split('/').map(encodeURIComponent).join('/')}`,
        {
          accept: 'application/vnd.github.raw+json',
          subject: `${filePath} in ${owner}/${repo}`,
        }
      );
      return await response.text();
    } catch (error) {
      if (error instanceof GitHubClientError && error.statusCode === 404) {
        return null;
      }
      throw error;
    }
  }

  /**
   * Map GitHub API response to simplified Issue type
   */
  private mapToIssue(response: GitHubIssueResponse): Issue {
    return {
      id: response.id,
      nodeId: response.node_id,
      number: response.number,
      title: response.title,
      body: response.body,
      state: response.state,
      url: response.html_url,
      labels: response.labels.map((label) => label.name),
    };
  }
}

/**
 * Create an issue service instance
 */
export function createIssueService(token: string): IssueService {
  if (!token) {
    throw new GitHubClientError('GitHub token is required');
  }
  return new IssueService({ token });
}
