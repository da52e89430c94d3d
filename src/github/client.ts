import { Octokit } from '@octokit/rest';
import { logger } from '../utils/logger.js';
import {
  createGitHubErrorFromResponse,
  withRetry,
  type RetryConfig,
  type ErrorContext,
} from '../utils/errors.js';

export type CreateCommentParams = {
  owner: string;
  repo: string;
  issue_number: number;
  body: string;
};

/**
 * The part of the Octokit REST API this tool calls
 */
export interface GitHubApi {
  issues: {
    createComment(params: CreateCommentParams): Promise<unknown>;
  };
}

export interface GitHubClientOptions {
  token: string;
  owner: string;
  repo: string;
  retryConfig?: Partial<RetryConfig>;
  /** Preconfigured API client; defaults to an Octokit authenticated with `token` */
  api?: GitHubApi;
}

const DEFAULT_GITHUB_RETRY_CONFIG: Partial<RetryConfig> = {
  maxRetries: 3,
  baseDelayMs: 1000,
  maxDelayMs: 30000,
};

export class GitHubClient {
  public readonly owner: string;
  public readonly repo: string;
  public readonly client: GitHubApi;
  private readonly retryConfig: Partial<RetryConfig>;
  private log = logger.child('GitHub');

  constructor(options: GitHubClientOptions) {
    this.client = options.api ?? new Octokit({ auth: options.token });
    this.owner = options.owner;
    this.repo = options.repo;
    this.retryConfig = { ...DEFAULT_GITHUB_RETRY_CONFIG, ...options.retryConfig };
  }

  /**
   * Execute a GitHub API request, retrying rate limits, 5xx responses and
   * network failures with exponential backoff. Failures surface as GitHubError.
   */
  async execute<T>(operation: () => Promise<T>, endpoint: string, context?: ErrorContext): Promise<T> {
    const attempt = async (): Promise<T> => {
      try {
        return await operation();
      } catch (error) {
        throw createGitHubErrorFromResponse(error, endpoint, context);
      }
    };

    const start = Date.now();
    const result = await withRetry(attempt, {
      config: this.retryConfig,
      onRetry: (error, attemptNumber, delay) => {
        this.log.warn(`${endpoint} failed, retrying (attempt ${attemptNumber}) in ${Math.round(delay)}ms`, {
          error: error.message,
        });
      },
    });
    this.log.debug(`${endpoint} succeeded`, { durationMs: Date.now() - start });
    return result;
  }
}

export function createGitHubClient(options: GitHubClientOptions): GitHubClient {
  return new GitHubClient(options);
}
