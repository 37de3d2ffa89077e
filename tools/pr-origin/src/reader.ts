import { CannotResolveRevisionError, RepoError, ValidationError, createRevision } from 'pr-kit';
import type { Baseline, Change, ChangesResponse, GitRepository, Reader, Revision } from 'pr-kit';
import { GITHUB_BASE_BRANCH_SHA1, GITHUB_PR_USE_MERGE } from './labels.js';

export interface PrReaderOptions {
  /** Generic reader the untouched operations delegate to */
  base: Reader;
  repo: GitRepository;
  /** Take the baseline from the base branch instead of a label search */
  baselineFromBranch: boolean;
}

/**
 * Reader for revisions resolved from pull requests.
 *
 * Wraps a generic reader and changes two behaviors: baselines can be walked
 * from the recorded base branch sha, and the change list of a merge revision
 * is computed against the pull request head (the merge's second parent).
 */
export function createPrReader(options: PrReaderOptions): Reader {
  const { base, repo, baselineFromBranch } = options;

  async function findBaselinesWithoutLabel(start: Revision, limit: number): Promise<Revision[]> {
    const baseSha = start.labels.last(GITHUB_BASE_BRANCH_SHA1);
    if (baseSha === undefined) {
      throw new ValidationError(`${GITHUB_BASE_BRANCH_SHA1} label should be present in ${start.sha}`);
    }
    // The base sha itself is already a baseline candidate
    const baseRevision = await repo.resolveReference(baseSha);
    return base.findBaselinesWithoutLabel(baseRevision, limit);
  }

  return {
    async findBaseline(start: Revision, label: string): Promise<Baseline | null> {
      if (!baselineFromBranch) {
        return base.findBaseline(start, label);
      }
      const [first] = await findBaselinesWithoutLabel(start, 1);
      return first ? { sha: first.sha, revision: first } : null;
    },

    findBaselinesWithoutLabel,

    async changes(from: Revision | null, to: Revision): Promise<ChangesResponse> {
      if (!to.labels.has(GITHUB_PR_USE_MERGE)) {
        throw new ValidationError("Cannot determine whether 'use_merge' was set.");
      }
      if (to.labels.get(GITHUB_PR_USE_MERGE).includes('false')) {
        return base.changes(from, to);
      }

      const [merge] = await repo.log(to.sha, { limit: 1 });
      if (!merge) {
        throw new CannotResolveRevisionError(`Cannot find commit ${to.sha}`);
      }
      // Fast-forward merge
      if (merge.parents.length < 2) {
        return base.changes(from, to);
      }

      const prHead = createRevision({ sha: merge.parents[1], url: to.url });
      const prChanges = await base.changes(from, prHead);
      // A merge that only brings in changes outside the path filter adds nothing
      if (prChanges.changes.length === 0) {
        return prChanges;
      }

      let mergeChange: Change;
      try {
        mergeChange = await base.change(merge.sha);
      } catch (err) {
        throw new RepoError(`Error getting the merge commit information: ${merge.sha}`, { cause: err });
      }
      return { changes: [...prChanges.changes, mergeChange] };
    },

    change(sha: string): Promise<Change> {
      return base.change(sha);
    },

    showDiff(from: Revision, to: Revision): Promise<string> {
      return base.showDiff(from, to);
    },

    checkout(revision: Revision, workdir: string): Promise<void> {
      return base.checkout(revision, workdir);
    },
  };
}
