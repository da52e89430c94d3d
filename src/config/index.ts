import { readFileSync, existsSync } from 'fs';
import { resolve } from 'path';
import { config as loadEnv } from 'dotenv';
import { ZodError, type ZodIssue } from 'zod';
import { ConfigSchema, defaultConfig, type Config } from './schema.js';
import { logger } from '../utils/logger.js';
import { ConfigError, ErrorCode, type RecoveryAction } from '../utils/errors.js';

// Load .env file
loadEnv();

export const CONFIG_FILE_NAMES = ['./revbench.config.json', './.revbench.json'];

/**
 * Environment variable for each configuration field, used in suggestions
 */
const configEnvVars: Record<string, string> = {
  'target': 'REVBENCH_TARGET',
  'bench.filter': 'REVBENCH_FILTER',
  'bench.benchTime': 'REVBENCH_BENCH_TIME',
  'bench.timeoutMs': 'REVBENCH_TIMEOUT',
  'bench.command': 'REVBENCH_COMMAND',
  'bench.packages': 'REVBENCH_PACKAGES',
  'worktreeDir': 'REVBENCH_WORKTREE_DIR',
  'github.owner': 'GITHUB_REPOSITORY',
  'github.repo': 'GITHUB_REPOSITORY',
  'github.prNumber': 'REVBENCH_PR',
  'github.token': 'GITHUB_TOKEN',
  'github.workspace': 'GITHUB_WORKSPACE',
  'logging.level': 'LOG_LEVEL',
  'logging.format': 'LOG_FORMAT',
};

/**
 * Values given on the command line; they take precedence over every other source
 */
export interface ConfigOverrides {
  target?: string;
  filter?: string;
  benchTime?: string;
  timeout?: string;
  worktreeDir?: string;
  prNumber?: number;
  owner?: string;
  repo?: string;
  verbose?: boolean;
  dryRun?: boolean;
}

export interface LoadConfigOptions {
  /** Explicit config file; when missing, the default names are searched in `cwd` */
  configPath?: string;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}

type RawConfig = Record<string, unknown>;

function isRecord(value: unknown): value is RawConfig {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function deepMerge(target: RawConfig, source: RawConfig): RawConfig {
  const result: RawConfig = { ...target };
  for (const [key, value] of Object.entries(source)) {
    if (value === undefined) continue;
    const existing = result[key];
    result[key] = isRecord(value) && isRecord(existing) ? deepMerge(existing, value) : value;
  }
  return result;
}

function parseBoolean(value: string | undefined): boolean | undefined {
  if (value === undefined || value === '') return undefined;
  return value === 'true' || value === '1';
}

function parseList(value: string | undefined): string[] | undefined {
  if (!value) return undefined;
  const items = value.split(',').map((item) => item.trim()).filter((item) => item.length > 0);
  return items.length > 0 ? items : undefined;
}

function readConfigFile(configPath: string | undefined, cwd: string): { config: RawConfig; path?: string } {
  const candidates = configPath ? [configPath] : CONFIG_FILE_NAMES;

  for (const candidate of candidates) {
    const fullPath = resolve(cwd, candidate);
    if (!existsSync(fullPath)) continue;

    let parsed: unknown;
    try {
      parsed = JSON.parse(readFileSync(fullPath, 'utf-8'));
    } catch (error) {
      throw new ConfigError(
        ErrorCode.CONFIG_PARSE_ERROR,
        `Failed to parse config file ${fullPath}: ${error instanceof Error ? error.message : String(error)}`,
        {
          context: { configPath: fullPath },
          recoveryActions: [
            { description: 'Verify your config file is valid JSON', automatic: false },
            { description: 'Use a JSON validator to check for syntax errors', automatic: false },
          ],
          cause: error instanceof Error ? error : undefined,
        }
      );
    }

    if (!isRecord(parsed)) {
      throw new ConfigError(ErrorCode.CONFIG_PARSE_ERROR, `Config file ${fullPath} must contain a JSON object`, {
        context: { configPath: fullPath },
      });
    }

    logger.debug(`Loaded config from ${fullPath}`);
    return { config: parsed, path: fullPath };
  }

  if (configPath) {
    throw new ConfigError(ErrorCode.CONFIG_FILE_NOT_FOUND, `Config file not found: ${resolve(cwd, configPath)}`, {
      field: 'config',
      value: configPath,
    });
  }

  return { config: {} };
}

/**
 * Credentials are only read from the environment. A token in the file is dropped with a warning.
 */
function stripFileCredentials(fileConfig: RawConfig): RawConfig {
  const github = fileConfig.github;
  if (!isRecord(github) || github.token === undefined) {
    return fileConfig;
  }
  logger.warn('Ignoring github.token from the config file; set GITHUB_TOKEN in the environment instead');
  const { token: _ignored, ...rest } = github;
  return { ...fileConfig, github: rest };
}

function configFromEnv(env: NodeJS.ProcessEnv): RawConfig {
  const [owner, repo] = env.GITHUB_REPOSITORY?.split('/') ?? [];

  return {
    target: env.REVBENCH_TARGET || undefined,
    bench: {
      filter: env.REVBENCH_FILTER || undefined,
      benchTime: env.REVBENCH_BENCH_TIME || undefined,
      timeoutMs: env.REVBENCH_TIMEOUT || undefined,
      command: env.REVBENCH_COMMAND || undefined,
      packages: parseList(env.REVBENCH_PACKAGES),
    },
    worktreeDir: env.REVBENCH_WORKTREE_DIR || undefined,
    verbose: parseBoolean(env.REVBENCH_VERBOSE),
    dryRun: parseBoolean(env.REVBENCH_DRY_RUN),
    github: {
      owner: owner || undefined,
      repo: repo || undefined,
      prNumber: env.REVBENCH_PR ? Number(env.REVBENCH_PR) : undefined,
      token: env.GITHUB_TOKEN || undefined,
      workspace: env.GITHUB_WORKSPACE || undefined,
    },
    logging: {
      level: env.LOG_LEVEL || undefined,
      format: env.LOG_FORMAT || undefined,
    },
  };
}

function configFromOverrides(overrides: ConfigOverrides): RawConfig {
  return {
    target: overrides.target,
    bench: {
      filter: overrides.filter,
      benchTime: overrides.benchTime,
      timeoutMs: overrides.timeout,
    },
    worktreeDir: overrides.worktreeDir,
    verbose: overrides.verbose,
    dryRun: overrides.dryRun,
    github: {
      owner: overrides.owner,
      repo: overrides.repo,
      prNumber: overrides.prNumber,
    },
  };
}

function buildRecoveryActionsFromValidation(issues: ZodIssue[]): RecoveryAction[] {
  const actions: RecoveryAction[] = [];
  const seen = new Set<string>();

  for (const issue of issues) {
    const envVar = configEnvVars[issue.path.join('.')];
    if (envVar && !seen.has(envVar)) {
      seen.add(envVar);
      actions.push({ description: `Set the ${envVar} environment variable`, automatic: false });
    }
  }

  actions.push({ description: 'Run "revbench --help" for the available options', automatic: false });
  actions.push({ description: 'Verify your config file is valid JSON', automatic: false });

  return actions;
}

function createConfigValidationError(zodError: ZodError, configPath?: string): ConfigError {
  const messages = zodError.errors.map((e) => `${e.path.join('.') || 'root'}: ${e.message}`);
  const field = zodError.errors[0]?.path.join('.') || undefined;

  return new ConfigError(
    ErrorCode.CONFIG_VALIDATION_FAILED,
    `Configuration validation failed: ${messages.join('; ')}`,
    {
      field,
      recoveryActions: buildRecoveryActionsFromValidation(zodError.errors),
      context: {
        validationErrors: zodError.errors.map((e) => ({
          path: e.path.join('.'),
          message: e.message,
          code: e.code,
        })),
        configPath,
        configSourcesChecked: CONFIG_FILE_NAMES,
      },
    }
  );
}

/**
 * Load and validate configuration.
 *
 * Precedence (highest first): CLI overrides, environment, config file, defaults.
 */
export function loadConfig(overrides: ConfigOverrides = {}, options: LoadConfigOptions = {}): Config {
  const { cwd = process.cwd(), env = process.env } = options;

  const { config: rawFileConfig, path } = readConfigFile(options.configPath, cwd);
  const fileConfig = stripFileCredentials(rawFileConfig);

  const merged = deepMerge(deepMerge(fileConfig, configFromEnv(env)), configFromOverrides(overrides));

  const result = ConfigSchema.safeParse(merged);
  if (!result.success) {
    throw createConfigValidationError(result.error, path);
  }
  return result.data;
}

/**
 * Help text describing configuration sources, appended to the CLI help
 */
export function getConfigHelp(): string {
  const lines = [
    'Configuration (highest precedence first):',
    '  1. Command line options',
    '  2. Environment variables',
    `  3. Config file (-c/--config, else ${CONFIG_FILE_NAMES.join(' or ')})`,
    '  4. Defaults',
    '',
    'Environment variables:',
  ];
  for (const [field, envVar] of Object.entries(configEnvVars)) {
    lines.push(`  ${envVar.padEnd(24)}${field}`);
  }
  lines.push('');
  lines.push(
    `Defaults: filter "${defaultConfig.bench.filter}", bench time ${defaultConfig.bench.benchTime}, ` +
      `timeout ${defaultConfig.bench.timeout}, packages ${defaultConfig.bench.packages.join(' ')}`
  );
  return lines.join('\n');
}

export type { Config, ConfigInput } from './schema.js';
export { ConfigSchema, defaultConfig } from './schema.js';
