import { describe, it, before, after, mock } from 'node:test';
import assert from 'node:assert';
import { GitHubClient, type CreateCommentParams } from './client.js';
import { createCommentManager } from './comments.js';
import { ErrorCode, GitHubError } from '../utils/errors.js';
import { logger, type LogLevel } from '../utils/logger.js';

function httpError(status: number, message: string): Error {
  return Object.assign(new Error(message), { status });
}

function createApi() {
  const createComment = mock.fn(async (_params: CreateCommentParams): Promise<unknown> => ({ data: { id: 1 } }));
  return { api: { issues: { createComment } }, createComment };
}

describe('createCommentManager', () => {
  let previousLevel: LogLevel;

  before(() => {
    previousLevel = logger.getLevel();
    logger.setLevel('error');
  });

  after(() => {
    logger.setLevel(previousLevel);
  });

  it('should post the comment on the pull request issue', async () => {
    const { api, createComment } = createApi();
    const client = new GitHubClient({ token: 'test-token', owner: 'acme', repo: 'store', api });

    await createCommentManager(client).addComment(12, 'hello');

    assert.strictEqual(createComment.mock.callCount(), 1);
    assert.deepStrictEqual(createComment.mock.calls[0].arguments, [
      { owner: 'acme', repo: 'store', issue_number: 12, body: 'hello' },
    ]);
  });

  it('should retry server errors', async () => {
    const { api, createComment } = createApi();
    createComment.mock.mockImplementationOnce(async () => {
      throw httpError(502, 'Bad Gateway');
    });
    const client = new GitHubClient({
      token: 'test-token',
      owner: 'acme',
      repo: 'store',
      api,
      retryConfig: { baseDelayMs: 1, maxDelayMs: 5 },
    });

    await createCommentManager(client).addComment(12, 'hello');

    assert.strictEqual(createComment.mock.callCount(), 2);
  });

  it('should surface client errors as GitHubError without retrying', async () => {
    const { api, createComment } = createApi();
    createComment.mock.mockImplementation(async () => {
      throw httpError(404, 'Not Found');
    });
    const client = new GitHubClient({
      token: 'test-token',
      owner: 'acme',
      repo: 'store',
      api,
      retryConfig: { baseDelayMs: 1, maxDelayMs: 5 },
    });

    await assert.rejects(createCommentManager(client).addComment(12, 'hello'), (error: unknown) => {
      assert.ok(error instanceof GitHubError);
      assert.strictEqual(error.code, ErrorCode.GITHUB_REPO_NOT_FOUND);
      assert.strictEqual(error.context.statusCode, 404);
      assert.strictEqual(error.context.endpoint, 'POST /repos/acme/store/issues/12/comments');
      return true;
    });
    assert.strictEqual(createComment.mock.callCount(), 1);
  });

  it('should give up after the configured retries', async () => {
    const { api, createComment } = createApi();
    createComment.mock.mockImplementation(async () => {
      throw httpError(503, 'Service Unavailable');
    });
    const client = new GitHubClient({
      token: 'test-token',
      owner: 'acme',
      repo: 'store',
      api,
      retryConfig: { maxRetries: 2, baseDelayMs: 1, maxDelayMs: 5 },
    });

    await assert.rejects(
      createCommentManager(client).addComment(12, 'hello'),
      (error: unknown) => error instanceof GitHubError && error.isRetryable
    );
    assert.strictEqual(createComment.mock.callCount(), 3);
  });
});
