/**
 * GitHub API response types for the source repository queries
 */

// Page info for pagination
export interface PageInfo {
  hasNextPage: boolean;
  endCursor: string | null;
}

// Label attached to a source issue
export interface IssueLabel {
  name: string;
  color: string;
}

// Issue returned by the updated-issues query
export interface UpdatedIssueNode {
  number: number;
  title: string;
  url: string;
  updatedAt: string;
  labels: { totalCount: number; nodes: IssueLabel[] } | null;
}

// Comment returned by the issue-comments query
export interface IssueCommentNode {
  url: string;
  createdAt: string;
  bodyText: string;
}

// Simplified source issue
export interface UpdatedIssue {
  number: number;
  title: string;
  url: string;
  updatedAt: string;
  /** First page of labels only (see GET_UPDATED_ISSUES) */
  labels: IssueLabel[];
  /** Number of labels on the issue, which may exceed labels.length */
  labelCount?: number;
}

// Simplified issue comment
export interface IssueComment {
  url: string;
  createdAt: string;
  bodyText: string;
}

// Filter applied to the updated-issues query
export interface IssueFilter {
  /** Only issues updated at or after this ISO timestamp */
  since: string;
  /** Only issues carrying one of these labels (no filter when empty) */
  labels?: string[];
  /** Only issues in these states */
  states?: Array<'OPEN' | 'CLOSED'>;
}

// API response types
export interface GetUpdatedIssuesResponse {
  repository: {
    issues: {
      pageInfo: PageInfo;
      nodes: Array<UpdatedIssueNode | null> | null;
    };
  } | null;
}

export interface GetIssueCommentsResponse {
  repository: {
    issue: {
      comments: {
        pageInfo: PageInfo;
        nodes: Array<IssueCommentNode | null> | null;
      };
    } | null;
  } | null;
}
