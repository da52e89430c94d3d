import type { Revision } from '../git/repository.js';
import { ProcessRunner, type ExecutionResult } from './process.js';
import { logger, type Logger } from '../utils/logger.js';

export interface BenchmarkSettings {
  /** Benchmark selection pattern; the tool anchors it */
  filter: string;
  benchTime: string;
  timeoutMs: number;
  command: string;
  packages: string[];
}

/**
 * Arguments for a benchmark-only run: no tests (`-run ^$`), memory stats on,
 * and the tool's own deadline off so the runner timeout is the only bound.
 */
export function buildBenchmarkArgs(settings: Pick<BenchmarkSettings, 'filter' | 'benchTime' | 'packages'>): string[] {
  const filter = settings.filter.trim() === '' ? '.' : settings.filter;
  return [
    'test',
    '-run', '^$',
    '-bench', filter,
    '-benchmem',
    '-benchtime', settings.benchTime,
    '-timeout', '0',
    ...settings.packages,
  ];
}

export class BenchmarkExecutor {
  private readonly log: Logger;

  constructor(
    private readonly runner: ProcessRunner,
    private readonly settings: BenchmarkSettings,
    options: { logger?: Logger } = {}
  ) {
    this.log = options.logger ?? logger.child('Benchmark');
  }

  /**
   * Run the benchmarks in `workDir` and return the raw report text
   */
  async run(workDir: string, revision: Revision | 'current'): Promise<ExecutionResult> {
    const label = revision === 'current' ? 'current revision' : revision.ref ?? revision.hash.slice(0, 12);
    this.log.info(`Running benchmarks on ${label}`, { filter: this.settings.filter, workDir });

    const result = await this.runner.run(this.settings.command, buildBenchmarkArgs(this.settings), {
      cwd: workDir,
      timeoutMs: this.settings.timeoutMs,
    });

    this.log.info(`Benchmarks on ${label} finished in ${(result.elapsedMs / 1000).toFixed(1)}s`);
    return result;
  }
}
