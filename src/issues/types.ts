/**
 * Issue management types for GitHub REST API
 */

/**
 * Input for creating a new issue
 */
export interface CreateIssueInput {
  owner: string;
  repo: string;
  title: string;
  body?: string;
  labels?: string[];
}

/**
 * Response from GitHub REST API when creating an issue
 */
export interface GitHubIssueResponse {
  id: number;
  node_id: string;
  number: number;
  title: string;
  body: string | null;
  state: 'open' | 'closed';
  html_url: string;
  url: string;
  labels: Array<{
    id: number;
    name: string;
    color: string;
    description: string | null;
  }>;
  created_at: string;
  updated_at: string;
  closed_at: string | null;
}

/**
 * Simplified issue representation for internal use
 */
export interface Issue {
  id: number;
  nodeId: string;
  number: number;
  title: string;
  body: string | null;
  state: 'open' | 'closed';
  url: string;
  labels: string[];
}

/**
 * Input for making sure a label exists in a repository
 */
export interface EnsureLabelInput {
  owner: string;
  repo: string;
  name: string;
  /** 6-digit hex color without the leading '#' */
  color: string;
}

export type EnsureLabelResult = 'created' | 'exists';

/**
 * Options for issue service operations
 */
export interface IssueServiceOptions {
  token: string;
}
