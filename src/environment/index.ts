import type { Config } from '../config/index.js';
import { createCommentManager, createGitHubClient } from '../github/index.js';
import { EnvironmentError } from '../utils/errors.js';
import type { Environment } from './types.js';
import { createLocalEnvironment } from './local.js';
import { createGitHubEnvironment } from './github.js';

export type { Delivery, Environment, EnvironmentKind } from './types.js';
export { LocalDelivery, createLocalEnvironment } from './local.js';
export {
  GitHubDelivery,
  createGitHubEnvironment,
  formatResultsComment,
  formatErrorComment,
  type WorkspaceGit,
} from './github.js';

/**
 * GitHub Actions when a pull request number is configured, local otherwise
 */
export async function createEnvironment(config: Config, cwd: string): Promise<Environment> {
  const { prNumber, owner, repo, token, workspace } = config.github;
  if (prNumber === undefined) {
    return createLocalEnvironment(cwd);
  }

  if (!owner || !repo || !token) {
    throw new EnvironmentError('Pull request mode needs a repository owner, name and GITHUB_TOKEN', {
      context: { prNumber, owner, repo },
    });
  }

  const client = createGitHubClient({ token, owner, repo });
  return createGitHubEnvironment({
    owner,
    repo,
    prNumber,
    workspace,
    comments: createCommentManager(client),
    dryRun: config.dryRun,
  });
}
