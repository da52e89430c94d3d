import { join } from 'path';
import type { Repository, Revision, WorkspaceHandle } from './repository.js';
import { WorkspaceDirtyError, WorktreeCreationError } from '../utils/errors.js';
import { logger, type Logger } from '../utils/logger.js';

/**
 * Owns the secondary checkout used to run the target revision's benchmarks.
 * At most one worktree is live per manager.
 */
export class WorktreeManager {
  private handle: WorkspaceHandle | undefined;
  private readonly log: Logger;

  constructor(
    private readonly repository: Repository,
    options: { logger?: Logger } = {}
  ) {
    this.log = options.logger ?? logger.child('Worktree');
  }

  /** Default location of the secondary checkout, inside the repository root */
  pathFor(dirName: string): string {
    return join(this.repository.root, dirName);
  }

  /**
   * Fail when tracked files have staged or unstaged changes.
   */
  async ensureClean(): Promise<void> {
    const files = await this.repository.changedFiles();
    if (files.length > 0) {
      throw new WorkspaceDirtyError(files, { context: { root: this.repository.root } });
    }
    this.log.debug('Working tree is clean');
  }

  /**
   * Check out `revision` at `path`, replacing a leftover worktree from an earlier run.
   */
  async prepare(path: string, revision: Revision): Promise<WorkspaceHandle> {
    try {
      await this.repository.removeWorktree(path);
      this.log.debug(`Removed stale worktree ${path}`);
    } catch (error) {
      // Usually means there was nothing to remove
      this.log.debug(`No stale worktree removed at ${path}`, {
        error: error instanceof Error ? error.message : String(error),
      });
    }

    try {
      await this.repository.addWorktree(path, revision.hash);
    } catch (error) {
      throw new WorktreeCreationError(path, revision.ref ?? revision.hash, {
        cause: error instanceof Error ? error : new Error(String(error)),
      });
    }

    this.handle = { path, revision };
    this.log.info(`Checked out ${revision.ref ?? revision.hash.slice(0, 12)} in ${path}`);
    return this.handle;
  }

  /**
   * Remove the live worktree. Never throws; failures are logged.
   */
  async cleanup(): Promise<void> {
    const handle = this.handle;
    if (!handle) return;

    try {
      await this.repository.removeWorktree(handle.path);
      this.handle = undefined;
      this.log.debug(`Removed worktree ${handle.path}`);
    } catch (error) {
      this.log.warn(`Failed to remove worktree ${handle.path}`, {
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }
}
