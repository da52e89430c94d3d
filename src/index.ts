#!/usr/bin/env node

import { Command, InvalidArgumentError } from 'commander';
import { loadConfig, getConfigHelp, type Config } from './config/index.js';
import { createEnvironment } from './environment/index.js';
import { BenchmarkExecutor, ProcessRunner } from './executor/index.js';
import { runPipeline } from './pipeline.js';
import { listenForInterrupts, terminateThenExit } from './utils/cancellation.js';
import { CancelledError, getErrorMessage, isStructuredError } from './errors/index.js';
import { logger, generateCorrelationId } from './utils/logger.js';

interface CliOptions {
  verbose?: boolean;
  dryRun?: boolean;
  benchTime?: string;
  timeout?: string;
  githubPr?: number;
  owner?: string;
  repo?: string;
  config?: string;
  worktreeDir?: string;
}

function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return parsed;
}

// Helper to format examples section
function formatExamples(examples: string[]): string {
  return '\n\nExamples:\n' + examples.map((ex) => `  $ ${ex}`).join('\n');
}

function configureLogger(config: Config): void {
  logger.setLevel(config.verbose ? 'debug' : config.logging.level);
  logger.setFormat(config.logging.format);
  logger.setIncludeStack(config.verbose);
  logger.setCorrelationId(generateCorrelationId());
}

const program = new Command();

program
  .name('revbench')
  .description(
    'Run benchmarks on the current checkout and on a target revision, then report the delta.\n\n' +
    'The target revision is checked out in a separate git worktree, so the\n' +
    'current checkout must have no uncommitted changes to tracked files.\n' +
    'Use "." as the target to compare the sub-benchmarks of a single run.' +
    formatExamples([
      'revbench main',
      'revbench main BenchmarkQuery',
      'revbench . BenchmarkEncode -t 2s',
      'revbench v2.3.0 --timeout 30m --verbose',
      'GITHUB_TOKEN=... revbench main --github-pr 42 --owner my-org --repo my-repo',
    ])
  )
  .version('0.1.0')
  .argument('<target>', 'branch or commit to compare against, or "." for sub-benchmarks')
  .argument('[filter]', 'benchmark pattern passed to the benchmark tool (default ".")')
  .option('-v, --verbose', 'Stream benchmark output and enable debug logging')
  .option('--dry-run', 'Log pull request comments instead of posting them')
  .option('-t, --bench-time <duration>', 'Run time per benchmark, e.g. "1s" or "100x"')
  .option('--timeout <duration>', 'Wall-clock limit per benchmark run, e.g. "2h" (0 disables)')
  .option('--github-pr <number>', 'Run inside GitHub Actions for this pull request', parsePositiveInt)
  .option('--owner <owner>', 'GitHub repository owner (default from GITHUB_REPOSITORY)')
  .option('--repo <repo>', 'GitHub repository name (default from GITHUB_REPOSITORY)')
  .option('-c, --config <path>', 'Path to configuration file (JSON format)')
  .option('--worktree-dir <name>', 'Directory name for the target worktree inside the repository')
  .addHelpText('after', '\n' + getConfigHelp() + '\n\nExit codes:\n  0    comparison reported\n  1    failed\n  130  interrupted')
  .action(async (target: string, filter: string | undefined, options: CliOptions) => {
    const controller = new AbortController();
    let runner: ProcessRunner | undefined;
    const dispose = listenForInterrupts(controller, {
      onForceExit: terminateThenExit({ terminate: () => runner?.terminate() ?? false }),
    });

    try {
      const config = loadConfig(
        {
          target,
          filter,
          benchTime: options.benchTime,
          timeout: options.timeout,
          prNumber: options.githubPr,
          owner: options.owner,
          repo: options.repo,
          worktreeDir: options.worktreeDir,
          verbose: options.verbose,
          dryRun: options.dryRun,
        },
        { configPath: options.config }
      );
      configureLogger(config);

      logger.header(`revbench: ${config.target === '.' ? 'sub-benchmarks' : `current vs ${config.target}`}`);

      const environment = await createEnvironment(config, process.cwd());
      logger.debug(`Environment: ${environment.kind}`, { root: environment.repository.root });

      runner = new ProcessRunner({ verbose: config.verbose });
      const executor = new BenchmarkExecutor(runner, config.bench);
      const outcome = await runPipeline({
        target: config.target,
        environment,
        executor,
        worktreeDir: config.worktreeDir,
        signal: controller.signal,
      });

      const seconds = (outcome.durationMs / 1000).toFixed(1);
      if (outcome.delivered) {
        logger.success(`Comparison finished in ${seconds}s`);
      } else {
        logger.warn(`Comparison finished in ${seconds}s but the results could not be delivered`);
      }
    } catch (error) {
      if (error instanceof CancelledError || controller.signal.aborted) {
        logger.warn(error instanceof Error ? error.message : String(error));
        process.exitCode = 130;
      } else if (isStructuredError(error)) {
        logger.structuredError(error);
        process.exitCode = 1;
      } else {
        logger.failure(getErrorMessage(error));
        process.exitCode = 1;
      }
    } finally {
      dispose();
    }
  });

await program.parseAsync(process.argv);
