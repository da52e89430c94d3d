import { simpleGit, type SimpleGit } from 'simple-git';
import { logger } from '../utils/logger.js';

/**
 * An immutable commit reference. `ref` is the name the user gave, when it was a branch.
 */
export interface Revision {
  readonly hash: string;
  readonly ref?: string;
}

export interface HeadInfo {
  hash: string;
  /** Branch name without refs/heads/; absent on a detached HEAD */
  branch?: string;
}

/**
 * A secondary checkout of the repository at a fixed revision.
 */
export interface WorkspaceHandle {
  readonly path: string;
  readonly revision: Revision;
}

/**
 * The git operations the comparison pipeline needs. Production code uses
 * simple-git; tests substitute an in-memory fake.
 */
export interface Repository {
  /** Absolute path of the primary checkout */
  readonly root: string;
  head(): Promise<HeadInfo>;
  /** Hash of refs/heads/<name>, or undefined when no such branch exists */
  resolveBranch(name: string): Promise<string | undefined>;
  /** Full hash of a commit-ish, or undefined when it does not resolve */
  resolveCommit(ref: string): Promise<string | undefined>;
  /** Tracked files with staged or unstaged changes. Untracked files are not included. */
  changedFiles(): Promise<string[]>;
  addWorktree(path: string, hash: string): Promise<void>;
  removeWorktree(path: string): Promise<void>;
}

const log = logger.child('Git');

class GitRepository implements Repository {
  private readonly git: SimpleGit;

  constructor(readonly root: string) {
    this.git = simpleGit(root);
  }

  async head(): Promise<HeadInfo> {
    const hash = (await this.git.revparse(['HEAD'])).trim();
    const abbrev = (await this.git.revparse(['--abbrev-ref', 'HEAD'])).trim();
    return abbrev === 'HEAD' ? { hash } : { hash, branch: abbrev.replace(/^refs\/heads\//, '') };
  }

  async resolveBranch(name: string): Promise<string | undefined> {
    return this.verify(`refs/heads/${name}^{commit}`);
  }

  async resolveCommit(ref: string): Promise<string | undefined> {
    return this.verify(`${ref}^{commit}`);
  }

  private async verify(spec: string): Promise<string | undefined> {
    try {
      const hash = (await this.git.raw(['rev-parse', '--verify', '--quiet', spec])).trim();
      return hash.length > 0 ? hash : undefined;
    } catch (error) {
      // rev-parse --verify exits non-zero for unknown names
      log.debug(`${spec} did not resolve`, { error: error instanceof Error ? error.message : String(error) });
      return undefined;
    }
  }

  async changedFiles(): Promise<string[]> {
    const status = await this.git.status();
    return status.files
      .filter((file) => !(file.index === '?' && file.working_dir === '?'))
      .filter((file) => !(file.index === '!' && file.working_dir === '!'))
      .map((file) => file.path);
  }

  async addWorktree(path: string, hash: string): Promise<void> {
    await this.git.raw(['worktree', 'add', '-f', path, hash]);
  }

  async removeWorktree(path: string): Promise<void> {
    await this.git.raw(['worktree', 'remove', '--force', path]);
  }
}

export function createGitRepository(root: string): Repository {
  return new GitRepository(root);
}

/**
 * Top-level directory of the repository that contains `cwd`
 */
export async function findRepositoryRoot(cwd: string): Promise<string> {
  return (await simpleGit(cwd).revparse(['--show-toplevel'])).trim();
}

export const PULL_REQUEST_BRANCH = 'pullrequest';

/**
 * Shallow clone with every branch available, so the pull request ref and
 * its base can both be fetched later.
 */
export async function cloneRepository(url: string, destination: string): Promise<void> {
  await simpleGit().clone(url, destination, ['--depth', '1', '--no-single-branch']);
}

/**
 * Fetch the head of pull request `prNumber` into a local branch and check it out.
 */
export async function checkoutPullRequest(repoDir: string, prNumber: number): Promise<void> {
  const git = simpleGit(repoDir);
  await git.raw(['fetch', 'origin', `+refs/pull/${prNumber}/head:refs/heads/${PULL_REQUEST_BRANCH}`]);
  await git.checkout(PULL_REQUEST_BRANCH);
}
