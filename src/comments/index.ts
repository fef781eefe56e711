/**
 * Comment management module exports
 */

export { CommentService, createCommentService } from './service.js';

export type {
  AddCommentInput,
  GitHubCommentResponse,
  Comment,
  CommentServiceOptions,
} from './types.js';
