/**
 * Input validation helpers for configuration values.
 */

export interface ValidationResult {
  valid: boolean;
  error?: string;
}

const DURATION_UNITS_MS: Record<string, number> = {
  ns: 1e-6,
  us: 1e-3,
  'µs': 1e-3,
  ms: 1,
  s: 1000,
  m: 60 * 1000,
  h: 60 * 60 * 1000,
};

const DURATION_PART = /(\d+(?:\.\d+)?)(ns|us|µs|ms|s|m|h)/g;
const DURATION_FULL = /^(?:\d+(?:\.\d+)?(?:ns|us|µs|ms|s|m|h))+$/;

/**
 * Parse a duration string such as "2h", "1h30m", "90s" or "500ms" into
 * milliseconds. A bare "0" is accepted and means zero. Returns undefined when
 * the string is not a valid duration.
 */
export function parseDuration(value: string): number | undefined {
  const trimmed = value.trim();
  if (trimmed === '0') return 0;
  if (!DURATION_FULL.test(trimmed)) return undefined;

  let total = 0;
  for (const match of trimmed.matchAll(DURATION_PART)) {
    const amount = Number(match[1]);
    const unit = DURATION_UNITS_MS[match[2]];
    if (unit === undefined) return undefined;
    total += amount * unit;
  }
  return Math.round(total);
}

/**
 * Validate a -benchtime value: a duration or an iteration count such as "100x".
 */
export function validateBenchTime(value: string): ValidationResult {
  if (/^\d+x$/.test(value)) {
    return value === '0x' ? { valid: false, error: 'Iteration count must be positive' } : { valid: true };
  }
  const ms = parseDuration(value);
  if (ms === undefined) {
    return { valid: false, error: `Invalid bench time "${value}" (expected e.g. "1s", "500ms" or "100x")` };
  }
  if (ms <= 0) {
    return { valid: false, error: 'Bench time must be greater than zero' };
  }
  return { valid: true };
}

/**
 * Validate a GitHub repository owner name
 */
export function validateRepoOwner(owner: string): ValidationResult {
  if (!/^[a-zA-Z0-9](?:[a-zA-Z0-9-]{0,37}[a-zA-Z0-9])?$/.test(owner)) {
    return {
      valid: false,
      error: 'Repository owner may only contain alphanumeric characters or single hyphens, and cannot begin or end with a hyphen',
    };
  }
  if (owner.includes('--')) {
    return { valid: false, error: 'Repository owner cannot contain consecutive hyphens' };
  }
  return { valid: true };
}

/**
 * Validate a GitHub repository name
 */
export function validateRepoName(name: string): ValidationResult {
  if (name === '.' || name === '..') {
    return { valid: false, error: 'Repository name cannot be "." or ".."' };
  }
  if (!/^[a-zA-Z0-9._-]{1,100}$/.test(name)) {
    return {
      valid: false,
      error: 'Repository name may only contain alphanumeric characters, hyphens, underscores and periods',
    };
  }
  return { valid: true };
}

/**
 * Validate the worktree directory name; it is created inside the repository root.
 */
export function validateWorktreeDir(dir: string): ValidationResult {
  if (dir.length === 0) {
    return { valid: false, error: 'Worktree directory is required' };
  }
  if (dir.includes('/') || dir.includes('\\') || dir === '.' || dir === '..') {
    return { valid: false, error: 'Worktree directory must be a single path segment' };
  }
  if (dir.includes('\0')) {
    return { valid: false, error: 'Worktree directory cannot contain null bytes' };
  }
  return { valid: true };
}
