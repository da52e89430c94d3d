import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert';
import { writeFileSync, mkdirSync, rmSync, existsSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { loadConfig, getConfigHelp } from './index.js';
import { parseDuration, validateBenchTime, validateWorktreeDir } from './validation.js';
import { ConfigError, ErrorCode } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

function expectConfigError(fn: () => unknown, code: ErrorCode): ConfigError {
  try {
    fn();
  } catch (error) {
    assert.ok(error instanceof ConfigError, `expected ConfigError, got ${String(error)}`);
    assert.strictEqual(error.code, code);
    return error;
  }
  assert.fail('expected loadConfig to throw');
}

describe('Config Module', () => {
  let testDir: string;

  beforeEach(() => {
    testDir = join(tmpdir(), `revbench-config-test-${Date.now()}-${Math.random().toString(36).slice(2)}`);
    mkdirSync(testDir, { recursive: true });
    logger.setLevel('error');
  });

  afterEach(() => {
    logger.setLevel('info');
    if (existsSync(testDir)) {
      rmSync(testDir, { recursive: true, force: true });
    }
  });

  describe('loadConfig', () => {
    it('should apply defaults for everything except the target', () => {
      const config = loadConfig({ target: 'main' }, { cwd: testDir, env: {} });

      assert.strictEqual(config.target, 'main');
      assert.strictEqual(config.bench.filter, '.');
      assert.strictEqual(config.bench.benchTime, '1s');
      assert.strictEqual(config.bench.timeoutMs, 2 * 60 * 60 * 1000);
      assert.strictEqual(config.bench.command, 'go');
      assert.deepStrictEqual(config.bench.packages, ['./...']);
      assert.strictEqual(config.worktreeDir, '_revbench-cmp');
      assert.strictEqual(config.verbose, false);
      assert.strictEqual(config.dryRun, false);
      assert.strictEqual(config.logging.level, 'info');
      assert.strictEqual(config.logging.format, 'pretty');
      assert.strictEqual(config.github.prNumber, undefined);
    });

    it('should load config from revbench.config.json', () => {
      writeFileSync(
        join(testDir, 'revbench.config.json'),
        JSON.stringify({ target: 'develop', bench: { benchTime: '2s', packages: ['./pkg/...'] } })
      );

      const config = loadConfig({}, { cwd: testDir, env: {} });

      assert.strictEqual(config.target, 'develop');
      assert.strictEqual(config.bench.benchTime, '2s');
      assert.deepStrictEqual(config.bench.packages, ['./pkg/...']);
      assert.strictEqual(config.bench.command, 'go');
    });

    it('should load config from .revbench.json', () => {
      writeFileSync(join(testDir, '.revbench.json'), JSON.stringify({ target: 'release-1.0' }));

      const config = loadConfig({}, { cwd: testDir, env: {} });

      assert.strictEqual(config.target, 'release-1.0');
    });

    it('should load an explicit config path', () => {
      writeFileSync(join(testDir, 'custom.json'), JSON.stringify({ target: 'main', worktreeDir: 'cmp-tree' }));

      const config = loadConfig({}, { cwd: testDir, env: {}, configPath: 'custom.json' });

      assert.strictEqual(config.worktreeDir, 'cmp-tree');
    });

    it('should prioritize environment variables over the config file', () => {
      writeFileSync(
        join(testDir, 'revbench.config.json'),
        JSON.stringify({ target: 'develop', bench: { filter: 'BenchmarkFile' } })
      );

      const config = loadConfig({}, {
        cwd: testDir,
        env: { REVBENCH_TARGET: 'main', REVBENCH_FILTER: 'BenchmarkEnv' },
      });

      assert.strictEqual(config.target, 'main');
      assert.strictEqual(config.bench.filter, 'BenchmarkEnv');
    });

    it('should prioritize CLI overrides over environment variables', () => {
      const config = loadConfig(
        { target: 'feature', benchTime: '3s', verbose: true },
        { cwd: testDir, env: { REVBENCH_TARGET: 'main', REVBENCH_BENCH_TIME: '5s', REVBENCH_VERBOSE: 'false' } }
      );

      assert.strictEqual(config.target, 'feature');
      assert.strictEqual(config.bench.benchTime, '3s');
      assert.strictEqual(config.verbose, true);
    });

    it('should parse duration strings for the timeout', () => {
      const config = loadConfig({ target: 'main', timeout: '1h30m' }, { cwd: testDir, env: {} });
      assert.strictEqual(config.bench.timeoutMs, 90 * 60 * 1000);
    });

    it('should accept a numeric timeout from the config file', () => {
      writeFileSync(join(testDir, 'revbench.config.json'), JSON.stringify({ target: 'main', bench: { timeoutMs: 0 } }));

      const config = loadConfig({}, { cwd: testDir, env: {} });

      assert.strictEqual(config.bench.timeoutMs, 0);
    });

    it('should treat an empty filter as match-all', () => {
      const config = loadConfig({ target: 'main', filter: '  ' }, { cwd: testDir, env: {} });
      assert.strictEqual(config.bench.filter, '.');
    });

    it('should split package and repository variables', () => {
      const config = loadConfig({ target: 'main' }, {
        cwd: testDir,
        env: {
          REVBENCH_PACKAGES: './tsdb/..., ./promql/...',
          GITHUB_REPOSITORY: 'octo-org/widgets',
          REVBENCH_PR: '42',
          GITHUB_TOKEN: 'test-secret',
          GITHUB_WORKSPACE: '/tmp/workspace',
        },
      });

      assert.deepStrictEqual(config.bench.packages, ['./tsdb/...', './promql/...']);
      assert.strictEqual(config.github.owner, 'octo-org');
      assert.strictEqual(config.github.repo, 'widgets');
      assert.strictEqual(config.github.prNumber, 42);
      assert.strictEqual(config.github.token, 'test-secret');
      assert.strictEqual(config.github.workspace, '/tmp/workspace');
    });

    it('should ignore a token stored in the config file', () => {
      writeFileSync(
        join(testDir, 'revbench.config.json'),
        JSON.stringify({ target: 'main', github: { owner: 'octo-org', token: 'test-secret' } })
      );

      const config = loadConfig({}, { cwd: testDir, env: {} });

      assert.strictEqual(config.github.token, undefined);
      assert.strictEqual(config.github.owner, 'octo-org');
    });

    it('should fail validation when the target is missing', () => {
      const error = expectConfigError(
        () => loadConfig({}, { cwd: testDir, env: {} }),
        ErrorCode.CONFIG_VALIDATION_FAILED
      );
      assert.ok(error.message.includes('target: A comparison target is required'));
      assert.strictEqual(error.context.field, 'target');
    });

    it('should fail validation for an invalid duration', () => {
      const error = expectConfigError(
        () => loadConfig({ target: 'main', timeout: 'soon' }, { cwd: testDir, env: {} }),
        ErrorCode.CONFIG_VALIDATION_FAILED
      );
      assert.ok(error.message.includes('bench.timeoutMs: Invalid duration "soon"'));
    });

    it('should require owner, repo and token when a pull request is set', () => {
      const error = expectConfigError(
        () => loadConfig({ target: 'main', prNumber: 7 }, { cwd: testDir, env: { GITHUB_REPOSITORY: 'octo-org/widgets' } }),
        ErrorCode.CONFIG_VALIDATION_FAILED
      );
      assert.ok(error.message.includes('github.token: github.token is required when a pull request number is set'));
      assert.ok(!error.message.includes('github.owner'));
      assert.ok(error.getRecoverySuggestions().includes('Set the GITHUB_TOKEN environment variable'));
    });

    it('should reject an invalid log level', () => {
      expectConfigError(
        () => loadConfig({ target: 'main' }, { cwd: testDir, env: { LOG_LEVEL: 'loud' } }),
        ErrorCode.CONFIG_VALIDATION_FAILED
      );
    });

    it('should throw a parse error for malformed JSON', () => {
      writeFileSync(join(testDir, 'revbench.config.json'), '{ "target": ');

      expectConfigError(() => loadConfig({}, { cwd: testDir, env: {} }), ErrorCode.CONFIG_PARSE_ERROR);
    });

    it('should throw when an explicit config file does not exist', () => {
      expectConfigError(
        () => loadConfig({ target: 'main' }, { cwd: testDir, env: {}, configPath: 'missing.json' }),
        ErrorCode.CONFIG_FILE_NOT_FOUND
      );
    });
  });

  describe('getConfigHelp', () => {
    it('should list environment variables', () => {
      const help = getConfigHelp();
      assert.ok(help.includes('REVBENCH_TARGET'));
      assert.ok(help.includes('GITHUB_TOKEN'));
    });
  });
});

describe('Config validation', () => {
  describe('parseDuration', () => {
    it('should parse single and compound durations', () => {
      assert.strictEqual(parseDuration('500ms'), 500);
      assert.strictEqual(parseDuration('90s'), 90_000);
      assert.strictEqual(parseDuration('1.5s'), 1500);
      assert.strictEqual(parseDuration('2h'), 7_200_000);
      assert.strictEqual(parseDuration('1h30m'), 5_400_000);
      assert.strictEqual(parseDuration('0'), 0);
    });

    it('should reject values without a unit or with unknown units', () => {
      assert.strictEqual(parseDuration('10'), undefined);
      assert.strictEqual(parseDuration('5d'), undefined);
      assert.strictEqual(parseDuration(''), undefined);
    });
  });

  describe('validateBenchTime', () => {
    it('should accept durations and iteration counts', () => {
      assert.strictEqual(validateBenchTime('1s').valid, true);
      assert.strictEqual(validateBenchTime('100x').valid, true);
    });

    it('should reject zero and malformed values', () => {
      assert.strictEqual(validateBenchTime('0x').valid, false);
      assert.strictEqual(validateBenchTime('0s').valid, false);
      assert.strictEqual(validateBenchTime('fast').valid, false);
    });
  });

  describe('validateWorktreeDir', () => {
    it('should only accept a single path segment', () => {
      assert.strictEqual(validateWorktreeDir('_revbench-cmp').valid, true);
      assert.strictEqual(validateWorktreeDir('../outside').valid, false);
      assert.strictEqual(validateWorktreeDir('').valid, false);
    });
  });
});
