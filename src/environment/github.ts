import { join } from 'path';
import type { ComparisonReport } from '../compare/types.js';
import {
  checkoutPullRequest,
  cloneRepository,
  createGitRepository,
} from '../git/repository.js';
import type { CommentManager } from '../github/comments.js';
import { toMarkdownTable } from '../report/markdown.js';
import { renderExcluded, renderPlain } from '../report/render.js';
import { DeliveryError, EnvironmentError } from '../utils/errors.js';
import { logger as rootLogger, type Logger } from '../utils/logger.js';
import type { Delivery, Environment } from './types.js';

export function formatResultsComment(report: ComparisonReport): string {
  let body = `### Benchmark comparison: ${report.label}\n\n${toMarkdownTable(renderPlain(report)).trimEnd()}`;

  const excluded = renderExcluded(report);
  if (excluded.length > 0) {
    body += '\n\n**Excluded:**\n' + excluded.map((line) => `- ${line}`).join('\n');
  }
  return body;
}

export function formatErrorComment(message: string): string {
  return `${message}. Benchmark did not complete, please check action logs.`;
}

export interface GitHubDeliveryOptions {
  /** Log comments instead of posting them */
  dryRun?: boolean;
  logger?: Logger;
}

/**
 * Posts results and failures as pull request comments
 */
export class GitHubDelivery implements Delivery {
  private readonly dryRun: boolean;
  private readonly log: Logger;

  constructor(
    private readonly comments: CommentManager,
    private readonly prNumber: number,
    options: GitHubDeliveryOptions = {}
  ) {
    this.dryRun = options.dryRun ?? false;
    this.log = options.logger ?? rootLogger.child('GitHub');
  }

  async postResults(report: ComparisonReport): Promise<void> {
    await this.post(formatResultsComment(report), 'results');
  }

  async postError(message: string): Promise<void> {
    await this.post(formatErrorComment(message), 'error');
  }

  private async post(body: string, kind: 'results' | 'error'): Promise<void> {
    if (this.dryRun) {
      this.log.info(`[DRY RUN] Would comment on pull request #${this.prNumber}:\n${body}`);
      return;
    }

    try {
      await this.comments.addComment(this.prNumber, body);
      this.log.info(`Posted ${kind} comment on pull request #${this.prNumber}`);
    } catch (error) {
      throw new DeliveryError(`Failed to post ${kind} comment on pull request #${this.prNumber}`, {
        context: { prNumber: this.prNumber, kind },
        cause: error instanceof Error ? error : undefined,
      });
    }
  }
}

/**
 * Git operations used to prepare the Actions workspace
 */
export interface WorkspaceGit {
  clone(url: string, destination: string): Promise<void>;
  checkoutPullRequest(repoDir: string, prNumber: number): Promise<void>;
}

const defaultWorkspaceGit: WorkspaceGit = {
  clone: cloneRepository,
  checkoutPullRequest,
};

export interface GitHubEnvironmentOptions {
  owner: string;
  repo: string;
  prNumber: number;
  /** GITHUB_WORKSPACE of the Actions runner */
  workspace?: string;
  comments: CommentManager;
  dryRun?: boolean;
  git?: WorkspaceGit;
  logger?: Logger;
}

/**
 * Clone the repository into the Actions workspace and check out the pull
 * request head. Setup failures are reported on the pull request before the
 * EnvironmentError is thrown.
 */
export async function createGitHubEnvironment(options: GitHubEnvironmentOptions): Promise<Environment> {
  const { owner, repo, prNumber, workspace, comments, git = defaultWorkspaceGit } = options;
  const log = options.logger ?? rootLogger.child('GitHub');
  const delivery = new GitHubDelivery(comments, prNumber, { dryRun: options.dryRun, logger: log });

  if (!workspace) {
    throw new EnvironmentError('GITHUB_WORKSPACE is not set; not running inside GitHub Actions', {
      context: { owner, repo, prNumber },
    });
  }

  const repoDir = join(workspace, repo);

  const fail = async (summary: string, error: unknown): Promise<never> => {
    try {
      await delivery.postError(summary);
    } catch (postError) {
      log.warn(`Could not report setup failure: ${postError instanceof Error ? postError.message : String(postError)}`);
    }
    throw new EnvironmentError(`${summary}: ${error instanceof Error ? error.message : String(error)}`, {
      context: { owner, repo, prNumber, repoDir },
      cause: error instanceof Error ? error : undefined,
    });
  };

  const url = `https://github.com/${owner}/${repo}.git`;
  log.info(`Cloning ${url} into ${repoDir}`);
  try {
    await git.clone(url, repoDir);
  } catch (error) {
    return fail('Cloning the repository failed', error);
  }

  log.info(`Checking out pull request #${prNumber}`);
  try {
    await git.checkoutPullRequest(repoDir, prNumber);
  } catch (error) {
    return fail('Switch to a pull request branch failed', error);
  }

  return {
    kind: 'github',
    repository: createGitRepository(repoDir),
    delivery,
  };
}
