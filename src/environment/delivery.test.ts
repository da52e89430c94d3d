import { describe, it, beforeEach, afterEach, mock } from 'node:test';
import assert from 'node:assert';
import { mkdirSync, mkdtempSync, rmSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { LocalDelivery } from './local.js';
import {
  GitHubDelivery,
  createGitHubEnvironment,
  formatErrorComment,
  formatResultsComment,
  type WorkspaceGit,
} from './github.js';
import type { CommentManager } from '../github/comments.js';
import type { ComparisonReport } from '../compare/types.js';
import { DeliveryError, EnvironmentError } from '../utils/errors.js';
import { Logger } from '../utils/logger.js';

const silent = (..._args: unknown[]): void => {};

const report: ComparisonReport = {
  label: 'main',
  mode: 'cross-revision',
  metrics: [
    {
      name: 'BenchmarkA-8',
      comparisons: [{ unit: 'ns/op', old: 200, new: 150, delta: { defined: true, percent: -25 } }],
    },
  ],
  excluded: [{ name: 'BenchmarkAdded-8', side: 'new', reason: 'not present in the target run' }],
};

class RecordingComments implements CommentManager {
  posted: Array<{ prNumber: number; body: string }> = [];
  failure: Error | undefined;

  async addComment(prNumber: number, body: string): Promise<void> {
    if (this.failure) throw this.failure;
    this.posted.push({ prNumber, body });
  }
}

describe('LocalDelivery', () => {
  afterEach(() => {
    mock.restoreAll();
  });

  it('should print the table followed by excluded benchmarks', async () => {
    const lines: string[] = [];
    const delivery = new LocalDelivery({ print: (line) => lines.push(line) });

    await delivery.postResults(report);

    assert.deepStrictEqual(lines, [
      'Results:',
      'benchmark        old ns/op     new ns/op     delta\nBenchmarkA-8     200           150           -25.00%',
      '',
      'Excluded:',
      '  BenchmarkAdded-8 (current): not present in the target run',
    ]);
  });

  it('should leave failure output to the caller', async () => {
    const log = mock.method(console, 'log', silent);
    const error = mock.method(console, 'error', silent);
    const lines: string[] = [];
    const delivery = new LocalDelivery({
      print: (line) => lines.push(line),
      logger: new Logger({ format: 'json', includeTimestamp: false }),
    });

    await delivery.postError('benchmark run timed out');

    assert.deepStrictEqual(lines, []);
    assert.strictEqual(log.mock.callCount(), 0);
    assert.strictEqual(error.mock.callCount(), 0);
  });

  it('should record failures at debug level', async () => {
    const spy = mock.method(console, 'log', silent);
    const delivery = new LocalDelivery({
      logger: new Logger({ level: 'debug', format: 'json', includeTimestamp: false }),
    });

    await delivery.postError('benchmark run timed out');

    assert.deepStrictEqual(JSON.parse(String(spy.mock.calls[0].arguments[0])), {
      level: 'debug',
      message: 'Benchmark did not complete: benchmark run timed out',
    });
  });
});

describe('comment formatting', () => {
  it('should render results as a markdown table under a heading', () => {
    assert.strictEqual(
      formatResultsComment(report),
      [
        '### Benchmark comparison: main',
        '',
        '| Benchmark | Old ns/op | New ns/op | Delta |',
        '|-|-|-|-|',
        'BenchmarkA-8|200|150|-25.00%',
        '',
        '**Excluded:**',
        '- BenchmarkAdded-8 (current): not present in the target run',
      ].join('\n')
    );
  });

  it('should leave out the excluded list when empty', () => {
    assert.ok(formatResultsComment({ ...report, excluded: [] }).endsWith('BenchmarkA-8|200|150|-25.00%'));
  });

  it('should point failures at the action logs', () => {
    assert.strictEqual(
      formatErrorComment('Cloning the repository failed'),
      'Cloning the repository failed. Benchmark did not complete, please check action logs.'
    );
  });
});

describe('GitHubDelivery', () => {
  const quiet = new Logger({ level: 'error' });

  it('should post results and errors on the pull request', async () => {
    const comments = new RecordingComments();
    const delivery = new GitHubDelivery(comments, 42, { logger: quiet });

    await delivery.postResults(report);
    await delivery.postError('Benchmark timed out');

    assert.deepStrictEqual(
      comments.posted.map((comment) => comment.prNumber),
      [42, 42]
    );
    assert.strictEqual(comments.posted[0].body, formatResultsComment(report));
    assert.strictEqual(
      comments.posted[1].body,
      'Benchmark timed out. Benchmark did not complete, please check action logs.'
    );
  });

  it('should only log under dry-run', async () => {
    const spy = mock.method(console, 'log', silent);
    const comments = new RecordingComments();
    const delivery = new GitHubDelivery(comments, 7, {
      dryRun: true,
      logger: new Logger({ format: 'json', includeTimestamp: false }),
    });

    await delivery.postError('Benchmark timed out');
    mock.restoreAll();

    assert.deepStrictEqual(comments.posted, []);
    assert.strictEqual(
      JSON.parse(String(spy.mock.calls[0].arguments[0])).message,
      '[DRY RUN] Would comment on pull request #7:\nBenchmark timed out. Benchmark did not complete, please check action logs.'
    );
  });

  it('should wrap API failures in a DeliveryError', async () => {
    const comments = new RecordingComments();
    comments.failure = new Error('Bad credentials');
    const delivery = new GitHubDelivery(comments, 42, { logger: quiet });

    await assert.rejects(delivery.postResults(report), (error: unknown) => {
      assert.ok(error instanceof DeliveryError);
      assert.strictEqual(error.message, 'Failed to post results comment on pull request #42');
      assert.strictEqual(error.cause, comments.failure);
      return true;
    });
  });
});

describe('createGitHubEnvironment', () => {
  const quiet = new Logger({ level: 'error' });
  let workspace: string;

  beforeEach(() => {
    workspace = mkdtempSync(join(tmpdir(), 'revbench-workspace-'));
  });

  afterEach(() => {
    rmSync(workspace, { recursive: true, force: true });
  });

  function recordingGit(calls: string[], failures: { clone?: Error; checkout?: Error } = {}): WorkspaceGit {
    return {
      async clone(url, destination) {
        calls.push(`clone ${url} ${destination}`);
        if (failures.clone) throw failures.clone;
        mkdirSync(destination);
      },
      async checkoutPullRequest(repoDir, prNumber) {
        calls.push(`checkout ${repoDir} ${prNumber}`);
        if (failures.checkout) throw failures.checkout;
      },
    };
  }

  it('should clone the repository and check out the pull request', async () => {
    const calls: string[] = [];
    const comments = new RecordingComments();

    const environment = await createGitHubEnvironment({
      owner: 'acme',
      repo: 'store',
      prNumber: 12,
      workspace,
      comments,
      git: recordingGit(calls),
      logger: quiet,
    });

    const repoDir = join(workspace, 'store');
    assert.strictEqual(environment.kind, 'github');
    assert.strictEqual(environment.repository.root, repoDir);
    assert.deepStrictEqual(calls, [`clone https://github.com/acme/store.git ${repoDir}`, `checkout ${repoDir} 12`]);
    assert.deepStrictEqual(comments.posted, []);
  });

  it('should require the Actions workspace', async () => {
    await assert.rejects(
      createGitHubEnvironment({
        owner: 'acme',
        repo: 'store',
        prNumber: 12,
        comments: new RecordingComments(),
        git: recordingGit([]),
        logger: quiet,
      }),
      EnvironmentError
    );
  });

  it('should report a failed clone on the pull request', async () => {
    const comments = new RecordingComments();

    await assert.rejects(
      createGitHubEnvironment({
        owner: 'acme',
        repo: 'store',
        prNumber: 12,
        workspace,
        comments,
        git: recordingGit([], { clone: new Error('repository not found') }),
        logger: quiet,
      }),
      (error: unknown) =>
        error instanceof EnvironmentError && error.message === 'Cloning the repository failed: repository not found'
    );
    assert.deepStrictEqual(comments.posted, [
      { prNumber: 12, body: 'Cloning the repository failed. Benchmark did not complete, please check action logs.' },
    ]);
  });

  it('should report a failed checkout even when the comment cannot be posted', async () => {
    const comments = new RecordingComments();
    comments.failure = new Error('Bad credentials');
    const calls: string[] = [];

    await assert.rejects(
      createGitHubEnvironment({
        owner: 'acme',
        repo: 'store',
        prNumber: 12,
        workspace,
        comments,
        git: recordingGit(calls, { checkout: new Error("couldn't find remote ref refs/pull/12/head") }),
        logger: quiet,
      }),
      (error: unknown) =>
        error instanceof EnvironmentError &&
        error.message === "Switch to a pull request branch failed: couldn't find remote ref refs/pull/12/head"
    );
    assert.strictEqual(calls.length, 2);
  });
});
