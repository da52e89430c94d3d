import type { Repository, Revision } from './repository.js';
import { AmbiguousTargetError, RevisionResolutionError } from '../utils/errors.js';
import { logger, type Logger } from '../utils/logger.js';

/** Target meaning "compare the sub-benchmarks of the current revision" */
export const SELF_COMPARE_TARGET = '.';

export type ComparisonTarget =
  | { mode: 'self-compare' }
  | { mode: 'cross-revision'; revision: Revision };

const COMMIT_HASH_PATTERN = /^[0-9a-f]{4,40}$/i;

/**
 * Resolve the user's target into a comparison mode.
 *
 * Branches are tried first; a string that looks like a commit hash is then
 * resolved as a commit. A target naming the current branch, or resolving to
 * the current commit, is rejected because no difference could be observed.
 */
export async function resolveTarget(
  target: string,
  repository: Repository,
  log: Logger = logger.child('Resolver')
): Promise<ComparisonTarget> {
  if (target === SELF_COMPARE_TARGET) {
    log.info('Target is the current revision; comparing sub-benchmarks');
    return { mode: 'self-compare' };
  }

  const head = await repository.head();
  if (target === head.branch || target === head.hash) {
    throw new AmbiguousTargetError(target, head);
  }

  let hash = await repository.resolveBranch(target);
  let ref: string | undefined = target;
  if (hash === undefined && COMMIT_HASH_PATTERN.test(target)) {
    hash = await repository.resolveCommit(target);
    ref = undefined;
  }
  if (hash === undefined) {
    throw new RevisionResolutionError(target);
  }

  if (hash === head.hash) {
    throw new AmbiguousTargetError(target, head);
  }

  log.info(`Comparing against ${target} (${hash.slice(0, 12)})`);
  return { mode: 'cross-revision', revision: ref === undefined ? { hash } : { hash, ref } };
}
