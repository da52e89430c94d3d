export {
  GitHubClient,
  createGitHubClient,
  type GitHubApi,
  type GitHubClientOptions,
  type CreateCommentParams,
} from './client.js';
export { createCommentManager, type CommentManager } from './comments.js';
