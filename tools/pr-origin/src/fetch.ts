import { CannotResolveRevisionError, asHeadRef, asMergeRef } from 'pr-kit';
import type { GitHubHost, GitRepository, PullRequestRecord } from 'pr-kit';
import { noopLogger } from './logger.js';
import type { LoggerLike } from './logger.js';

/** Local slots the pull request refs are fetched into. */
export const LOCAL_PR_HEAD_REF = 'refs/PR_HEAD';
export const LOCAL_PR_MERGE_REF = 'refs/PR_MERGE';
export const LOCAL_PR_BASE_BRANCH = 'refs/PR_BASE_BRANCH';

export interface FetchPlan {
  refspecs: string[];
  /** Whether the merge ref is part of the plan */
  useMerge: boolean;
  /** Set when merge mode was requested but degraded to the head ref */
  warning: string | null;
}

export interface FetchOptions {
  useMerge: boolean;
  forceImport: boolean;
  partialFetch: boolean;
}

export interface FetchResult {
  /** Merge mode actually used, false when degraded */
  useMerge: boolean;
  headSha: string;
  baseSha: string;
  mergeSha: string | null;
}

/**
 * Decide which refs to fetch for `pr`.
 * @throws CannotResolveRevisionError when a merge ref is requested but unavailable
 */
export function planFetch(pr: PullRequestRecord, useMerge: boolean, forceImport: boolean): FetchPlan {
  const refspecs = [
    `${asHeadRef(pr.number)}:${LOCAL_PR_HEAD_REF}`,
    // Full ref name so every remote implementation finds it
    `refs/heads/${pr.base.ref}:${LOCAL_PR_BASE_BRANCH}`,
  ];
  if (!useMerge) {
    return { refspecs, useMerge: false, warning: null };
  }

  const mergeable = pr.mergeable;
  switch (mergeable) {
    case 'yes':
      refspecs.push(`${asMergeRef(pr.number)}:${LOCAL_PR_MERGE_REF}`);
      return { refspecs, useMerge: true, warning: null };
    case 'no':
    case 'unknown':
      if (forceImport) {
        return {
          refspecs,
          useMerge: false,
          warning: `PR ${pr.number} is not mergeable, but continuing with PR Head instead because of --force`,
        };
      }
      if (mergeable === 'unknown') {
        throw new CannotResolveRevisionError(
          `Cannot find a merge reference for Pull Request ${pr.number}. GitHub might still be generating it.`,
        );
      }
      throw new CannotResolveRevisionError(
        `Cannot find a merge reference for Pull Request ${pr.number}. It might have a conflict with head.`,
      );
    default: {
      const unreachable: never = mergeable;
      throw new Error(`Unknown mergeable state: ${String(unreachable)}`);
    }
  }
}

/**
 * Injectable dependencies for the fetch orchestrator.
 */
export interface FetchOrchestratorDeps {
  repo: GitRepository;
  host: GitHubHost;
  logger: LoggerLike;
}

export interface FetchOrchestrator {
  /** Callers must hold the repository's exclusive lock. */
  fetch(project: string, pr: PullRequestRecord, options: FetchOptions): Promise<FetchResult>;
}

export function createFetchOrchestrator(
  deps: Partial<FetchOrchestratorDeps> & Pick<FetchOrchestratorDeps, 'repo' | 'host'>,
): FetchOrchestrator {
  const { repo, host, logger = noopLogger } = deps;

  return {
    async fetch(project: string, pr: PullRequestRecord, options: FetchOptions): Promise<FetchResult> {
      const plan = planFetch(pr, options.useMerge, options.forceImport);
      if (plan.warning !== null) {
        logger.warn(plan.warning, { pr: pr.number, mergeable: pr.mergeable });
      }

      logger.info(`Fetching Pull Request ${pr.number} and branch '${pr.base.ref}'`);
      try {
        await repo.fetch(host.projectAsUrl(project), false, true, plan.refspecs, options.partialFetch);
      } catch (err) {
        if (!(err instanceof CannotResolveRevisionError)) throw err;
        if (plan.useMerge) {
          throw new CannotResolveRevisionError(
            `Cannot find a merge reference for Pull Request ${pr.number}, even though GitHub`
              + ' reported that this merge reference should exist.',
            { cause: err },
          );
        }
        throw new CannotResolveRevisionError(`Cannot find Pull Request ${pr.number}.`, { cause: err });
      }

      const headSha = await repo.parseRef(LOCAL_PR_HEAD_REF);
      const baseSha = await repo.parseRef(LOCAL_PR_BASE_BRANCH);
      const mergeSha = plan.useMerge ? await repo.parseRef(LOCAL_PR_MERGE_REF) : null;
      return { useMerge: plan.useMerge, headSha, baseSha, mergeSha };
    },
  };
}
