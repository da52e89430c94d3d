/**
 * Centralized error handling module.
 *
 * Re-exports the error classes from utils/errors for convenient importing.
 *
 * Error Class Hierarchy:
 *   StructuredError (base class)
 *   ├── WorkspaceDirtyError - uncommitted changes in the primary checkout
 *   ├── AmbiguousTargetError - target is the current revision
 *   ├── RevisionResolutionError - target does not resolve
 *   ├── WorktreeCreationError - secondary checkout failed
 *   ├── ExecutionError - benchmark command failed or timed out
 *   ├── NoSubBenchmarksError / NoComparableBenchmarksError - nothing to compare
 *   ├── DeliveryError - posting a result or error failed
 *   ├── EnvironmentError - GitHub Actions workspace setup failed
 *   ├── CancelledError - interrupted between phases
 *   ├── GitHubError - GitHub API errors
 *   └── ConfigError - configuration errors
 */

export {
  type ErrorSeverity,
  ErrorCode,
  type RecoveryAction,
  type ErrorContext,
  StructuredError,
  WorkspaceDirtyError,
  AmbiguousTargetError,
  RevisionResolutionError,
  WorktreeCreationError,
  ExecutionError,
  NoSubBenchmarksError,
  NoComparableBenchmarksError,
  DeliveryError,
  EnvironmentError,
  CancelledError,
  GitHubError,
  ConfigError,
  type RetryConfig,
  DEFAULT_RETRY_CONFIG,
  withRetry,
  createGitHubErrorFromResponse,
} from '../utils/errors.js';

import { StructuredError } from '../utils/errors.js';

/**
 * Type guard to check if an error is a StructuredError
 */
export function isStructuredError(error: unknown): error is StructuredError {
  return error instanceof StructuredError;
}

/**
 * Extract error message safely from any error type
 */
export function getErrorMessage(error: unknown): string {
  if (isStructuredError(error)) {
    return `[${error.code}] ${error.message}`;
  }
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
