/**
 * Issue management module exports
 */

export { IssueService, createIssueService } from './service.js';

export type {
  CreateIssueInput,
  GitHubIssueResponse,
  Issue,
  EnsureLabelInput,
  EnsureLabelResult,
  IssueServiceOptions,
} from './types.js';
