/**
 * Comment types for GitHub REST API
 */

/**
 * Input for adding a comment to an issue
 */
export interface AddCommentInput {
  owner: string;
  repo: string;
  issueNumber: number;
  body: string;
}

/**
 * Response from GitHub REST API when creating a comment
 */
export interface GitHubCommentResponse {
  id: number;
  node_id: string;
  url: string;
  html_url: string;
  body: string;
  user: {
    id: number;
    login: string;
  };
  created_at: string;
  updated_at: string;
  issue_url: string;
}

/**
 * Simplified comment representation for internal use
 */
export interface Comment {
  id: number;
  nodeId: string;
  body: string;
  author: string;
  url: string;
  createdAt: string;
  updatedAt: string;
}

/**
 * Options for comment service operations
 */
export interface CommentServiceOptions {
  token: string;
}
