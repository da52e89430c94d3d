import type { ComparisonReport } from '../compare/types.js';
import type { Repository } from '../git/repository.js';

/**
 * Where results and failures are reported
 */
export interface Delivery {
  postResults(report: ComparisonReport): Promise<void>;
  postError(message: string): Promise<void>;
}

export type EnvironmentKind = 'local' | 'github';

/**
 * Selected once at startup. The repository root is fixed here and passed
 * explicitly everywhere else; the process working directory is never changed.
 */
export interface Environment {
  kind: EnvironmentKind;
  repository: Repository;
  delivery: Delivery;
}
