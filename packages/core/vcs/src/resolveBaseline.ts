import logger from '@version-sync/logger';
import type {Ref, VersionControl} from './types';
import {VcsError} from './VcsError';

export const DEFAULT_BASELINES: ReadonlyArray<Ref> = ['origin/main', 'origin/master'];

/**
 * Picks the revision to compare against. An explicit ref must resolve;
 * without one the default remote branches are tried in order.
 */
export async function resolveBaseline(
  vcs: VersionControl,
  base: Ref | null | undefined,
  candidates: ReadonlyArray<Ref> = DEFAULT_BASELINES,
): Promise<Ref> {
  if (base) {
    if ((await vcs.revParse(base)) == null) {
      throw new VcsError(
        'not-found',
        `Baseline ${base} does not resolve to a commit`,
        {meta: {ref: base}},
      );
    }
    return base;
  }

  logger.info({
    origin: '@version-sync/vcs',
    message: `No baseline provided, trying: ${candidates.join(', ')}`,
  });

  for (let candidate of candidates) {
    if ((await vcs.revParse(candidate)) != null) {
      logger.info({origin: '@version-sync/vcs', message: `Using ${candidate}`});
      return candidate;
    }
    logger.warn({
      origin: '@version-sync/vcs',
      message: `${candidate} not detected`,
    });
  }

  throw new VcsError(
    'not-found',
    'No baseline provided, and none of the default baselines exist',
    {
      hints: [
        'Pass --base <ref> or set VERSION_BASE, e.g. VERSION_BASE=origin/develop',
      ],
    },
  );
}
