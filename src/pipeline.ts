import {
  compareBenchmarks,
  compareSubBenchmarks,
  parseBenchmarkOutput,
  sampleCount,
  type ComparisonReport,
} from './compare/index.js';
import type { Environment } from './environment/types.js';
import type { BenchmarkExecutor } from './executor/benchmark.js';
import { resolveTarget } from './git/revision.js';
import { WorktreeManager } from './git/worktree.js';
import { throwIfCancelled } from './utils/cancellation.js';
import { DeliveryError } from './utils/errors.js';
import { logger, type Logger } from './utils/logger.js';

export interface PipelineDeps {
  /** Branch or commit to compare against, or "." */
  target: string;
  environment: Environment;
  executor: Pick<BenchmarkExecutor, 'run'>;
  /** Directory name of the secondary checkout, inside the repository root */
  worktreeDir: string;
  signal?: AbortSignal;
  logger?: Logger;
}

export interface PipelineOutcome {
  report: ComparisonReport;
  /** False when the report was built but could not be delivered */
  delivered: boolean;
  durationMs: number;
}

export const SELF_COMPARE_LABEL = 'sub-benchmarks of the current revision';

function toDeliveryError(error: unknown, message: string): DeliveryError {
  if (error instanceof DeliveryError) return error;
  return new DeliveryError(message, { cause: error instanceof Error ? error : undefined });
}

/** First line of an error message; command output stays in the logs */
function summarize(error: unknown): string {
  const message = error instanceof Error ? error.message : String(error);
  return message.split('\n')[0].replace(/; command output:$/, '').replace(/\.$/, '');
}

/**
 * Run one comparison: validate, resolve, benchmark one or both revisions,
 * compare and deliver. The secondary worktree is removed on every exit path.
 */
export async function runPipeline(deps: PipelineDeps): Promise<PipelineOutcome> {
  const { target, environment, executor, signal } = deps;
  const { repository, delivery } = environment;
  const log = deps.logger ?? logger.child('Pipeline');
  const worktrees = new WorktreeManager(repository, { logger: log });
  const start = Date.now();

  let report: ComparisonReport;
  try {
    throwIfCancelled(signal, 'workspace validation');
    await worktrees.ensureClean();

    throwIfCancelled(signal, 'target resolution');
    const comparison = await resolveTarget(target, repository, log);

    throwIfCancelled(signal, 'benchmarking the current revision');
    const current = await executor.run(repository.root, 'current');
    const newSet = parseBenchmarkOutput(current.output);
    log.debug(`Parsed ${sampleCount(newSet)} sample(s) from the current revision`);

    if (comparison.mode === 'self-compare') {
      throwIfCancelled(signal, 'comparison');
      report = compareSubBenchmarks(newSet, SELF_COMPARE_LABEL);
    } else {
      throwIfCancelled(signal, 'worktree preparation');
      const handle = await worktrees.prepare(worktrees.pathFor(deps.worktreeDir), comparison.revision);

      throwIfCancelled(signal, `benchmarking ${target}`);
      const previous = await executor.run(handle.path, handle.revision);
      const oldSet = parseBenchmarkOutput(previous.output);
      log.debug(`Parsed ${sampleCount(oldSet)} sample(s) from ${target}`);

      throwIfCancelled(signal, 'comparison');
      report = compareBenchmarks(oldSet, newSet, target);
    }
  } catch (error) {
    try {
      await delivery.postError(summarize(error));
    } catch (postError) {
      log.structuredError(toDeliveryError(postError, 'Failed to report the failure'));
    }
    throw error;
  } finally {
    await worktrees.cleanup();
  }

  log.info(`Compared ${report.metrics.length} benchmark(s), ${report.excluded.length} excluded`);

  let delivered = true;
  try {
    await delivery.postResults(report);
  } catch (error) {
    delivered = false;
    log.structuredError(toDeliveryError(error, 'Failed to deliver the results'));
  }

  return { report, delivered, durationMs: Date.now() - start };
}
