import type { ComparisonReport } from '../compare/types.js';
import { createGitRepository, findRepositoryRoot } from '../git/repository.js';
import { renderExcluded, renderPlain } from '../report/render.js';
import { EnvironmentError } from '../utils/errors.js';
import { logger as rootLogger, type Logger } from '../utils/logger.js';
import type { Delivery, Environment } from './types.js';

export interface LocalDeliveryOptions {
  /** Line sink for the results table; defaults to stdout */
  print?: (line: string) => void;
  logger?: Logger;
}

/**
 * Prints results to the terminal. Failures are printed once, in full, by the
 * CLI, so they are only recorded at debug level here.
 */
export class LocalDelivery implements Delivery {
  private readonly print: (line: string) => void;
  private readonly log: Logger;

  constructor(options: LocalDeliveryOptions = {}) {
    this.print = options.print ?? ((line) => console.log(line));
    this.log = options.logger ?? rootLogger;
  }

  async postResults(report: ComparisonReport): Promise<void> {
    this.print('Results:');
    this.print(renderPlain(report).trimEnd());

    const excluded = renderExcluded(report);
    if (excluded.length > 0) {
      this.print('');
      this.print('Excluded:');
      for (const line of excluded) {
        this.print(`  ${line}`);
      }
    }
  }

  async postError(message: string): Promise<void> {
    this.log.debug(`Benchmark did not complete: ${message}`);
  }
}

/**
 * Use the repository that contains `cwd`
 */
export async function createLocalEnvironment(cwd: string, options: LocalDeliveryOptions = {}): Promise<Environment> {
  let root: string;
  try {
    root = await findRepositoryRoot(cwd);
  } catch (error) {
    throw new EnvironmentError(`${cwd} is not inside a git repository`, {
      context: { cwd },
      cause: error instanceof Error ? error : undefined,
    });
  }

  return {
    kind: 'local',
    repository: createGitRepository(root),
    delivery: new LocalDelivery(options),
  };
}
