export {
  GitHubClient,
  GitHubClientError,
  createGitHubClient,
  isAuthError,
  isNotFoundError,
  GITHUB_GRAPHQL_ENDPOINT,
  GITHUB_REST_ENDPOINT,
} from './client.js';
export type { GitHubClientOptions } from './client.js';

export { restRequest, toRestError, GITHUB_API_VERSION } from './rest.js';
export type { RestRequestOptions } from './rest.js';

export type {
  PageInfo,
  IssueLabel,
  IssueComment,
  IssueFilter,
  UpdatedIssue,
} from './types.js';

export { GET_UPDATED_ISSUES, GET_ISSUE_COMMENTS } from './queries.js';
