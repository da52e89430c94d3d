import type { GitHubClient } from './client.js';
import { logger } from '../utils/logger.js';

export interface CommentManager {
  addComment(prNumber: number, body: string): Promise<void>;
}

export function createCommentManager(client: GitHubClient): CommentManager {
  const { owner, repo } = client;

  return {
    async addComment(prNumber: number, body: string): Promise<void> {
      await client.execute(
        async () => {
          await client.client.issues.createComment({
            owner,
            repo,
            issue_number: prNumber,
            body,
          });
        },
        `POST /repos/${owner}/${repo}/issues/${prNumber}/comments`,
        { operation: 'addComment', prNumber }
      );
      logger.debug(`Added comment to pull request #${prNumber}`);
    },
  };
}
