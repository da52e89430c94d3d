import { z } from 'zod';
import {
  parseDuration,
  validateBenchTime,
  validateRepoOwner,
  validateRepoName,
  validateWorktreeDir,
} from './validation.js';

/**
 * Default values, shared with the CLI help text
 */
export const defaultConfig = {
  bench: {
    filter: '.',
    benchTime: '1s',
    timeout: '2h',
    command: 'go',
    packages: ['./...'],
  },
  worktreeDir: '_revbench-cmp',
  verbose: false,
  dryRun: false,
  logging: {
    level: 'info',
    format: 'pretty',
  },
} as const;

/** Accepts milliseconds or a duration string such as "1h30m" */
const durationMsSchema = z.union([
  z.number().int().nonnegative(),
  z.string().transform((val, ctx) => {
    const ms = parseDuration(val);
    if (ms === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Invalid duration "${val}" (expected e.g. "2h", "1h30m" or "90s")`,
      });
      return z.NEVER;
    }
    return ms;
  }),
]);

const benchTimeSchema = z.string().refine(
  (val) => validateBenchTime(val).valid,
  (val) => ({ message: validateBenchTime(val).error || 'Invalid bench time' })
);

const repoOwnerSchema = z.string()
  .min(1, 'Repository owner is required')
  .max(39, 'Repository owner cannot exceed 39 characters')
  .refine(
    (val) => validateRepoOwner(val).valid,
    (val) => ({ message: validateRepoOwner(val).error || 'Invalid repository owner' })
  );

const repoNameSchema = z.string()
  .min(1, 'Repository name is required')
  .max(100, 'Repository name cannot exceed 100 characters')
  .refine(
    (val) => validateRepoName(val).valid,
    (val) => ({ message: validateRepoName(val).error || 'Invalid repository name' })
  );

const worktreeDirSchema = z.string().refine(
  (val) => validateWorktreeDir(val).valid,
  (val) => ({ message: validateWorktreeDir(val).error || 'Invalid worktree directory' })
);

const BenchSchema = z.object({
  /** Benchmark selection pattern, passed to the tool verbatim */
  filter: z.string().transform((val) => (val.trim() === '' ? '.' : val)).default(defaultConfig.bench.filter),
  benchTime: benchTimeSchema.default(defaultConfig.bench.benchTime),
  /** Wall-clock limit per benchmark run; 0 disables it */
  timeoutMs: durationMsSchema.default(defaultConfig.bench.timeout),
  command: z.string().min(1, 'Benchmark command is required').default(defaultConfig.bench.command),
  packages: z.array(z.string().min(1)).min(1, 'At least one package pattern is required')
    .default([...defaultConfig.bench.packages]),
});

const GitHubSchema = z.object({
  owner: repoOwnerSchema.optional(),
  repo: repoNameSchema.optional(),
  prNumber: z.number().int().positive('Pull request number must be positive').optional(),
  token: z.string().min(1).optional(),
  workspace: z.string().min(1).optional(),
});

const LoggingSchema = z.object({
  level: z.enum(['debug', 'info', 'warn', 'error']).default(defaultConfig.logging.level),
  format: z.enum(['pretty', 'json']).default(defaultConfig.logging.format),
});

/**
 * Configuration schema for revbench.
 *
 * Sources are merged before validation: defaults < config file < environment < CLI.
 */
export const ConfigSchema = z.object({
  /** Branch or commit to compare against, or "." for sub-benchmark comparison */
  target: z.string({ required_error: 'A comparison target is required' }).min(1, 'A comparison target is required'),
  bench: BenchSchema.default({}),
  worktreeDir: worktreeDirSchema.default(defaultConfig.worktreeDir),
  verbose: z.boolean().default(defaultConfig.verbose),
  dryRun: z.boolean().default(defaultConfig.dryRun),
  github: GitHubSchema.default({}),
  logging: LoggingSchema.default({}),
}).superRefine((config, ctx) => {
  if (config.github.prNumber === undefined) return;
  const required = ['owner', 'repo', 'token'] as const;
  for (const field of required) {
    if (!config.github[field]) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['github', field],
        message: `github.${field} is required when a pull request number is set`,
      });
    }
  }
});

export type Config = z.infer<typeof ConfigSchema>;
export type ConfigInput = z.input<typeof ConfigSchema>;
