/**
 * Structured error handling system with error codes, severity levels, and recovery suggestions.
 */

/**
 * Error severity levels
 */
export type ErrorSeverity = 'critical' | 'error' | 'warning' | 'transient';

/**
 * Error codes for all known error types
 */
export enum ErrorCode {
  // Workspace and revision errors
  WORKSPACE_DIRTY = 'WORKSPACE_DIRTY',
  TARGET_AMBIGUOUS = 'TARGET_AMBIGUOUS',
  REVISION_UNRESOLVED = 'REVISION_UNRESOLVED',
  WORKTREE_CREATE_FAILED = 'WORKTREE_CREATE_FAILED',

  // Execution errors
  EXEC_COMMAND_FAILED = 'EXEC_COMMAND_FAILED',
  EXEC_TIMEOUT = 'EXEC_TIMEOUT',

  // Comparison errors
  NO_SUB_BENCHMARKS = 'NO_SUB_BENCHMARKS',
  NO_COMPARABLE_BENCHMARKS = 'NO_COMPARABLE_BENCHMARKS',

  // Delivery and environment errors
  DELIVERY_FAILED = 'DELIVERY_FAILED',
  ENV_SETUP_FAILED = 'ENV_SETUP_FAILED',

  // GitHub errors
  GITHUB_AUTH_FAILED = 'GITHUB_AUTH_FAILED',
  GITHUB_RATE_LIMITED = 'GITHUB_RATE_LIMITED',
  GITHUB_REPO_NOT_FOUND = 'GITHUB_REPO_NOT_FOUND',
  GITHUB_PERMISSION_DENIED = 'GITHUB_PERMISSION_DENIED',
  GITHUB_API_ERROR = 'GITHUB_API_ERROR',
  GITHUB_NETWORK_ERROR = 'GITHUB_NETWORK_ERROR',

  // Configuration errors
  CONFIG_FILE_NOT_FOUND = 'CONFIG_FILE_NOT_FOUND',
  CONFIG_PARSE_ERROR = 'CONFIG_PARSE_ERROR',
  CONFIG_VALIDATION_FAILED = 'CONFIG_VALIDATION_FAILED',

  // General errors
  PIPELINE_CANCELLED = 'PIPELINE_CANCELLED',
}

/**
 * Recovery action that can be taken for an error
 */
export interface RecoveryAction {
  description: string;
  automatic: boolean;
}

/**
 * Context information for debugging
 */
export interface ErrorContext {
  operation?: string;
  component?: string;
  timestamp?: string;
  [key: string]: unknown;
}

interface StructuredErrorOptions {
  severity?: ErrorSeverity;
  recoveryActions?: RecoveryAction[];
  context?: ErrorContext;
  cause?: Error;
  isRetryable?: boolean;
}

/**
 * Base structured error class
 */
export class StructuredError extends Error {
  public readonly code: ErrorCode;
  public readonly severity: ErrorSeverity;
  public readonly recoveryActions: RecoveryAction[];
  public readonly context: ErrorContext;
  public readonly cause?: Error;
  public readonly isRetryable: boolean;
  public readonly timestamp: string;

  constructor(code: ErrorCode, message: string, options: StructuredErrorOptions = {}) {
    super(message);
    this.name = 'StructuredError';
    this.code = code;
    this.severity = options.severity ?? this.inferSeverity(code);
    this.recoveryActions = options.recoveryActions ?? [];
    this.context = {
      ...options.context,
      timestamp: new Date().toISOString(),
    };
    this.cause = options.cause;
    this.isRetryable = options.isRetryable ?? this.inferRetryable(code);
    this.timestamp = new Date().toISOString();

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, StructuredError);
    }
  }

  private inferSeverity(code: ErrorCode): ErrorSeverity {
    const transientCodes = [
      ErrorCode.GITHUB_RATE_LIMITED,
      ErrorCode.GITHUB_NETWORK_ERROR,
    ];
    if (transientCodes.includes(code)) return 'transient';

    const criticalCodes = [
      ErrorCode.GITHUB_AUTH_FAILED,
      ErrorCode.CONFIG_VALIDATION_FAILED,
      ErrorCode.ENV_SETUP_FAILED,
    ];
    if (criticalCodes.includes(code)) return 'critical';

    if (code === ErrorCode.PIPELINE_CANCELLED) return 'warning';

    return 'error';
  }

  private inferRetryable(code: ErrorCode): boolean {
    const retryableCodes = [
      ErrorCode.GITHUB_RATE_LIMITED,
      ErrorCode.GITHUB_NETWORK_ERROR,
    ];
    return retryableCodes.includes(code);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      severity: this.severity,
      isRetryable: this.isRetryable,
      recoveryActions: this.recoveryActions.map((a) => ({
        description: a.description,
        automatic: a.automatic,
      })),
      context: this.context,
      timestamp: this.timestamp,
      stack: this.stack,
      cause: this.cause?.message,
    };
  }

  getRecoverySuggestions(): string[] {
    return this.recoveryActions.map((a) => a.description);
  }
}

/**
 * The primary checkout has staged or unstaged changes to tracked files.
 */
export class WorkspaceDirtyError extends StructuredError {
  public readonly files: string[];

  constructor(files: string[], options: { context?: ErrorContext } = {}) {
    const listed = files.slice(0, 10).join(', ');
    const more = files.length > 10 ? ` and ${files.length - 10} more` : '';
    super(
      ErrorCode.WORKSPACE_DIRTY,
      `Working tree is not clean: ${files.length} changed file(s): ${listed}${more}`,
      {
        recoveryActions: [
          { description: 'Commit or stash your changes before benchmarking', automatic: false },
          { description: 'Run "git status" to see what changed', automatic: false },
        ],
        context: { ...options.context, files },
        isRetryable: false,
      }
    );
    this.name = 'WorkspaceDirtyError';
    this.files = files;
  }
}

/**
 * The comparison target names the revision that is already checked out.
 */
export class AmbiguousTargetError extends StructuredError {
  constructor(target: string, head: { hash: string; branch?: string }) {
    super(
      ErrorCode.TARGET_AMBIGUOUS,
      `Target "${target}" is identical to the current revision ${head.branch ?? head.hash}; no difference would be observed`,
      {
        recoveryActions: [
          { description: 'Use "." to compare sub-benchmarks of a single run', automatic: false },
          { description: 'Pass a different branch (for example the base branch of your change)', automatic: false },
        ],
        context: { target, headHash: head.hash, headBranch: head.branch },
        isRetryable: false,
      }
    );
    this.name = 'AmbiguousTargetError';
  }
}

export class RevisionResolutionError extends StructuredError {
  constructor(target: string, options: { cause?: Error } = {}) {
    super(ErrorCode.REVISION_UNRESOLVED, `Could not resolve target "${target}" to a branch or commit`, {
      recoveryActions: [
        { description: 'Check that the branch exists locally ("git branch --list")', automatic: false },
        { description: 'Fetch the branch from the remote before running', automatic: false },
      ],
      context: { target },
      cause: options.cause,
      isRetryable: false,
    });
    this.name = 'RevisionResolutionError';
  }
}

export class WorktreeCreationError extends StructuredError {
  public readonly path: string;
  public readonly revision: string;

  constructor(path: string, revision: string, options: { cause?: Error } = {}) {
    super(
      ErrorCode.WORKTREE_CREATE_FAILED,
      `Failed to check out ${revision} in worktree ${path}${options.cause ? `: ${options.cause.message}` : ''}`,
      {
        recoveryActions: [
          { description: `Remove ${path} manually and run "git worktree prune"`, automatic: false },
        ],
        context: { path, revision },
        cause: options.cause,
        isRetryable: false,
      }
    );
    this.name = 'WorktreeCreationError';
    this.path = path;
    this.revision = revision;
  }
}

/**
 * A benchmark command failed or exceeded its wall-clock limit.
 */
export class ExecutionError extends StructuredError {
  public readonly elapsedMs: number;
  public readonly timedOut: boolean;
  public readonly exitCode: number | null;
  public readonly output?: string;

  constructor(
    message: string,
    options: {
      elapsedMs: number;
      timedOut: boolean;
      exitCode?: number | null;
      output?: string;
      context?: ErrorContext;
      cause?: Error;
    }
  ) {
    const code = options.timedOut ? ErrorCode.EXEC_TIMEOUT : ErrorCode.EXEC_COMMAND_FAILED;
    const withOutput = options.output ? `${message}; command output:\n${options.output}` : message;
    super(code, withOutput, {
      recoveryActions: getExecutionRecoveryActions(code),
      context: {
        ...options.context,
        elapsedMs: options.elapsedMs,
        timedOut: options.timedOut,
        exitCode: options.exitCode ?? null,
      },
      cause: options.cause,
      isRetryable: false,
    });
    this.name = 'ExecutionError';
    this.elapsedMs = options.elapsedMs;
    this.timedOut = options.timedOut;
    this.exitCode = options.exitCode ?? null;
    this.output = options.output;
  }
}

function getExecutionRecoveryActions(code: ErrorCode): RecoveryAction[] {
  switch (code) {
    case ErrorCode.EXEC_TIMEOUT:
      return [
        { description: 'Increase the timeout with --timeout', automatic: false },
        { description: 'Narrow the benchmark filter to fewer functions', automatic: false },
      ];
    default:
      return [
        { description: 'Run with --verbose to stream the benchmark output', automatic: false },
        { description: 'Check that the benchmarks build on both revisions', automatic: false },
      ];
  }
}

export class NoSubBenchmarksError extends StructuredError {
  constructor(benchmarkCount: number) {
    super(
      ErrorCode.NO_SUB_BENCHMARKS,
      `No sub-benchmarks to compare: none of the ${benchmarkCount} benchmark(s) has a sibling or a repeated sample`,
      {
        recoveryActions: [
          { description: 'Select benchmarks that define sub-benchmarks (b.Run)', automatic: false },
          { description: 'Compare against a branch instead of "."', automatic: false },
        ],
        context: { benchmarkCount },
        isRetryable: false,
      }
    );
    this.name = 'NoSubBenchmarksError';
  }
}

export class NoComparableBenchmarksError extends StructuredError {
  constructor(oldCount: number, newCount: number) {
    super(
      ErrorCode.NO_COMPARABLE_BENCHMARKS,
      `No benchmark names match between the target (${oldCount}) and current (${newCount}) runs`,
      {
        recoveryActions: [
          { description: 'Check that the benchmark filter matches benchmarks on both revisions', automatic: false },
        ],
        context: { oldCount, newCount },
        isRetryable: false,
      }
    );
    this.name = 'NoComparableBenchmarksError';
  }
}

export class DeliveryError extends StructuredError {
  constructor(message: string, options: { context?: ErrorContext; cause?: Error } = {}) {
    super(ErrorCode.DELIVERY_FAILED, message, {
      severity: 'warning',
      context: options.context,
      cause: options.cause,
      isRetryable: false,
    });
    this.name = 'DeliveryError';
  }
}

export class EnvironmentError extends StructuredError {
  constructor(message: string, options: { context?: ErrorContext; cause?: Error } = {}) {
    super(ErrorCode.ENV_SETUP_FAILED, message, {
      recoveryActions: [
        { description: 'Check that GITHUB_WORKSPACE and GITHUB_TOKEN are set', automatic: false },
        { description: 'Verify the pull request number and repository', automatic: false },
      ],
      context: options.context,
      cause: options.cause,
    });
    this.name = 'EnvironmentError';
  }
}

export class CancelledError extends StructuredError {
  constructor(phase: string) {
    super(ErrorCode.PIPELINE_CANCELLED, `Cancelled before ${phase}`, {
      context: { phase },
      isRetryable: false,
    });
    this.name = 'CancelledError';
  }
}

/**
 * GitHub-specific error
 */
export class GitHubError extends StructuredError {
  constructor(
    code: ErrorCode,
    message: string,
    options: {
      statusCode?: number;
      endpoint?: string;
      context?: ErrorContext;
      cause?: Error;
    } = {}
  ) {
    super(code, message, {
      severity: getGitHubSeverity(options.statusCode),
      recoveryActions: getGitHubRecoveryActions(code),
      context: {
        ...options.context,
        statusCode: options.statusCode,
        endpoint: options.endpoint,
      },
      cause: options.cause,
      isRetryable: isGitHubRetryable(code, options.statusCode),
    });
    this.name = 'GitHubError';
  }
}

function getGitHubSeverity(statusCode?: number): ErrorSeverity {
  if (statusCode === 429) return 'transient';
  if (statusCode === 401 || statusCode === 403) return 'critical';
  if (statusCode && statusCode >= 500) return 'transient';
  return 'error';
}

function isGitHubRetryable(code: ErrorCode, statusCode?: number): boolean {
  if (statusCode === 429) return true;
  if (statusCode && statusCode >= 500) return true;
  if (code === ErrorCode.GITHUB_NETWORK_ERROR || code === ErrorCode.GITHUB_RATE_LIMITED) return true;
  return false;
}

function getGitHubRecoveryActions(code: ErrorCode): RecoveryAction[] {
  switch (code) {
    case ErrorCode.GITHUB_AUTH_FAILED:
      return [
        { description: 'Verify GITHUB_TOKEN is valid and not expired', automatic: false },
        { description: 'Ensure the token can write pull request comments', automatic: false },
      ];
    case ErrorCode.GITHUB_RATE_LIMITED:
      return [{ description: 'Wait for rate limit reset', automatic: true }];
    case ErrorCode.GITHUB_REPO_NOT_FOUND:
      return [
        { description: 'Verify the repository owner, name and pull request number', automatic: false },
      ];
    case ErrorCode.GITHUB_PERMISSION_DENIED:
      return [{ description: 'Verify your token has the required permissions', automatic: false }];
    case ErrorCode.GITHUB_NETWORK_ERROR:
      return [
        { description: 'Check your network connection', automatic: false },
        { description: 'Retry the operation', automatic: true },
      ];
    default:
      return [];
  }
}

/**
 * Configuration-specific error
 */
export class ConfigError extends StructuredError {
  constructor(
    code: ErrorCode,
    message: string,
    options: {
      field?: string;
      value?: unknown;
      recoveryActions?: RecoveryAction[];
      context?: ErrorContext;
      cause?: Error;
    } = {}
  ) {
    const recoveryActions = options.recoveryActions ?? [
      { description: 'Run "revbench --help" for the available options', automatic: false },
      ...(options.field
        ? [{ description: `Check the value of "${options.field}" in your configuration`, automatic: false }]
        : []),
    ];
    super(code, message, {
      severity: 'critical',
      recoveryActions,
      context: {
        ...options.context,
        field: options.field,
        invalidValue: options.value,
      },
      cause: options.cause,
      isRetryable: false,
    });
    this.name = 'ConfigError';
  }
}

/**
 * Retry configuration for exponential backoff
 */
export interface RetryConfig {
  maxRetries: number;
  baseDelayMs: number;
  maxDelayMs: number;
  backoffMultiplier: number;
}

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxRetries: 3,
  baseDelayMs: 1000,
  maxDelayMs: 30000,
  backoffMultiplier: 2,
};

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function calculateBackoffDelay(attempt: number, config: RetryConfig): number {
  const delay = config.baseDelayMs * Math.pow(config.backoffMultiplier, attempt);
  // ±10% jitter
  const jitter = delay * 0.1 * (Math.random() * 2 - 1);
  return Math.min(delay + jitter, config.maxDelayMs);
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Execute a function with automatic retry and exponential backoff
 */
export async function withRetry<T>(
  operation: () => Promise<T>,
  options: {
    config?: Partial<RetryConfig>;
    onRetry?: (error: Error, attempt: number, delay: number) => void;
    shouldRetry?: (error: Error) => boolean;
  } = {}
): Promise<T> {
  const config = { ...DEFAULT_RETRY_CONFIG, ...options.config };

  let lastError: Error = new Error('Operation was not attempted');

  for (let attempt = 0; attempt <= config.maxRetries; attempt++) {
    try {
      return await operation();
    } catch (error) {
      lastError = toError(error);

      const isRetryable =
        options.shouldRetry?.(lastError) ??
        (lastError instanceof StructuredError && lastError.isRetryable);

      if (!isRetryable || attempt >= config.maxRetries) {
        throw lastError;
      }

      const delay = calculateBackoffDelay(attempt, config);
      options.onRetry?.(lastError, attempt + 1, delay);
      await sleep(delay);
    }
  }

  throw lastError;
}

interface OctokitLikeError {
  status?: number;
  message?: string;
  code?: string;
  response?: { status?: number; data?: unknown };
}

function readField(value: unknown, key: string): unknown {
  return typeof value === 'object' && value !== null && key in value
    ? Reflect.get(value, key)
    : undefined;
}

function asOctokitError(error: unknown): OctokitLikeError {
  if (typeof error !== 'object' || error === null) {
    return { message: String(error) };
  }

  const status = readField(error, 'status');
  const message = readField(error, 'message');
  const code = readField(error, 'code');
  const response = readField(error, 'response');
  const responseStatus = readField(response, 'status');

  return {
    status: typeof status === 'number' ? status : undefined,
    message: typeof message === 'string' ? message : undefined,
    code: typeof code === 'string' ? code : undefined,
    response:
      response === undefined
        ? undefined
        : {
            status: typeof responseStatus === 'number' ? responseStatus : undefined,
            data: readField(response, 'data'),
          },
  };
}

/**
 * Create a GitHub error from an Octokit error response
 */
export function createGitHubErrorFromResponse(
  error: unknown,
  endpoint?: string,
  context?: ErrorContext
): GitHubError {
  const details = asOctokitError(error);
  const statusCode = details.status ?? details.response?.status;
  const message = details.message ?? 'GitHub API request failed';

  let code: ErrorCode;

  switch (statusCode) {
    case 401:
      code = ErrorCode.GITHUB_AUTH_FAILED;
      break;
    case 403:
      code = message.toLowerCase().includes('rate limit')
        ? ErrorCode.GITHUB_RATE_LIMITED
        : ErrorCode.GITHUB_PERMISSION_DENIED;
      break;
    case 404:
      code = ErrorCode.GITHUB_REPO_NOT_FOUND;
      break;
    case 429:
      code = ErrorCode.GITHUB_RATE_LIMITED;
      break;
    default:
      if (details.code === 'ENOTFOUND' || details.code === 'ETIMEDOUT' || details.code === 'ECONNRESET') {
        code = ErrorCode.GITHUB_NETWORK_ERROR;
      } else {
        code = ErrorCode.GITHUB_API_ERROR;
      }
  }

  return new GitHubError(code, message, {
    statusCode,
    endpoint,
    context: {
      ...context,
      responseData: details.response?.data,
    },
    cause: error instanceof Error ? error : undefined,
  });
}
