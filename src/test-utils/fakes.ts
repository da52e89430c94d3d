/**
 * In-memory stand-ins for git and result delivery, shared by tests.
 */

import type { ComparisonReport } from '../compare/types.js';
import type { Delivery, Environment } from '../environment/types.js';
import type { HeadInfo, Repository } from '../git/repository.js';

export interface FakeRepositoryOptions {
  root?: string;
  head?: HeadInfo;
  /** Branch name to commit hash */
  branches?: Record<string, string>;
  /** Commit hashes that resolve, keyed by any accepted abbreviation */
  commits?: Record<string, string>;
  changedFiles?: string[];
}

export class FakeRepository implements Repository {
  readonly root: string;
  headInfo: HeadInfo;
  branches: Map<string, string>;
  commits: Map<string, string>;
  dirtyFiles: string[];
  /** Paths with a registered worktree */
  worktrees = new Set<string>();
  /** Every mutating call, in order, e.g. "add /repo/_cmp abc123" */
  calls: string[] = [];
  addError: Error | undefined;
  removeError: Error | undefined;

  constructor(options: FakeRepositoryOptions = {}) {
    this.root = options.root ?? '/repo';
    this.headInfo = options.head ?? { hash: 'a'.repeat(40), branch: 'feature' };
    this.branches = new Map(Object.entries(options.branches ?? {}));
    this.commits = new Map(Object.entries(options.commits ?? {}));
    this.dirtyFiles = options.changedFiles ?? [];
  }

  async head(): Promise<HeadInfo> {
    return this.headInfo;
  }

  async resolveBranch(name: string): Promise<string | undefined> {
    return this.branches.get(name);
  }

  async resolveCommit(ref: string): Promise<string | undefined> {
    return this.commits.get(ref);
  }

  async changedFiles(): Promise<string[]> {
    return this.dirtyFiles;
  }

  async addWorktree(path: string, hash: string): Promise<void> {
    this.calls.push(`add ${path} ${hash}`);
    if (this.addError) throw this.addError;
    this.worktrees.add(path);
  }

  async removeWorktree(path: string): Promise<void> {
    this.calls.push(`remove ${path}`);
    if (this.removeError) throw this.removeError;
    if (!this.worktrees.has(path)) {
      throw new Error(`fatal: '${path}' is not a working tree`);
    }
    this.worktrees.delete(path);
  }
}

export class RecordingDelivery implements Delivery {
  results: ComparisonReport[] = [];
  errors: string[] = [];
  resultsError: Error | undefined;
  errorsError: Error | undefined;

  async postResults(report: ComparisonReport): Promise<void> {
    if (this.resultsError) throw this.resultsError;
    this.results.push(report);
  }

  async postError(message: string): Promise<void> {
    this.errors.push(message);
    if (this.errorsError) throw this.errorsError;
  }
}

export function createFakeEnvironment(
  repository: Repository = new FakeRepository(),
  delivery: Delivery = new RecordingDelivery()
): Environment {
  return { kind: 'local', repository, delivery };
}

/**
 * Benchmark result line in the format the benchmark tool prints
 */
export function benchLine(name: string, iterations: number, nsPerOp: number, bytesPerOp?: number, allocsPerOp?: number): string {
  let line = `${name}\t${iterations}\t${nsPerOp} ns/op`;
  if (bytesPerOp !== undefined) line += `\t${bytesPerOp} B/op`;
  if (allocsPerOp !== undefined) line += `\t${allocsPerOp} allocs/op`;
  return line;
}
