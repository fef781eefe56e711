import type { IssueService } from '../issues/service.js';
import type { CommentService } from '../comments/service.js';
import type { RepoRef } from '../types/config.js';
import type { DestinationLabel, TrackingDestination, TrackingIssue } from './types.js';

export type DestinationIssueService = Pick<IssueService, 'createIssue' | 'ensureLabel'>;
export type DestinationCommentService = Pick<CommentService, 'addComment'>;

/**
 * Destination repository backed by the GitHub REST services.
 * Labels are ensured at most once per instance (i.e. per run).
 */
export class GitHubDestination implements TrackingDestination {
  private ensuredLabels = new Set<string>();

  constructor(
    private readonly repo: RepoRef,
    private readonly issueService: DestinationIssueService,
    private readonly commentService: DestinationCommentService
  ) {}

  async ensureLabels(labels: DestinationLabel[]): Promise<void> {
    for (const label of labels) {
      if (this.ensuredLabels.has(label.name)) continue;
      await this.issueService.ensureLabel({
        owner: this.repo.owner,
        repo: this.repo.name,
        name: label.name,
        color: label.color,
      });
      this.ensuredLabels.add(label.name);
    }
  }

  async createIssue(input: { title: string; body: string; labels: string[] }): Promise<TrackingIssue> {
    const issue = await this.issueService.createIssue({
      owner: this.repo.owner,
      repo: this.repo.name,
      title: input.title,
      body: input.body,
      labels: input.labels,
    });
    return { number: issue.number, url: issue.url };
  }

  async commentOnIssue(issueNumber: number, body: string): Promise<void> {
    await this.commentService.addComment({
      owner: this.repo.owner,
      repo: this.repo.name,
      issueNumber,
      body,
    });
  }
}
