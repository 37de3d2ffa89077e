import {
  CannotResolveRevisionError,
  HostingApiError,
  createGitReader,
  createRevision,
  roots,
} from 'pr-kit';
import type {
  Authoring,
  GitHubHost,
  GitRepository,
  HostingApi,
  PathFilter,
  PullRequestRecord,
  Reader,
  Revision,
} from 'pr-kit';
import { assembleRevision } from './assembler.js';
import { createFetchOrchestrator } from './fetch.js';
import { createGatingEngine } from './gating.js';
import type { GatingConfig } from './gating.js';
import { ORIGIN_REV_ID_LABEL } from './labels.js';
import { noopLogger } from './logger.js';
import type { LoggerLike } from './logger.js';
import type { Sleep } from './poll.js';
import { createPrReader } from './reader.js';
import { parseReference, selectPullRequestForCommit } from './reference.js';

export const ORIGIN_TYPE = 'git.github_pr_origin';

/**
 * Everything a pull request origin needs to know about its remote.
 */
export interface PrOriginConfig {
  /** Repository URL, e.g. `https://github.com/owner/repo` */
  url: string;
  /** Migrate the host-computed merge commit instead of the PR head */
  useMerge: boolean;
  gating: GatingConfig;
  baselineFromBranch: boolean;
  firstParent: boolean;
  partialFetch: boolean;
  describeVersion: boolean;
}

/**
 * Injectable dependencies for the origin.
 */
export interface PrOriginDeps {
  api: HostingApi;
  /** Shared handle for `config.url` */
  repo: GitRepository;
  host: GitHubHost;
  logger: LoggerLike;
  sleep: Sleep;
}

export interface PrOrigin {
  readonly type: string;
  /**
   * Turn a reference into an admitted, fully labeled revision.
   * @throws EmptyChangeError when the pull request is not eligible
   */
  resolve(reference: string): Promise<Revision>;
  newReader(pathFilter: PathFilter, authoring: Authoring): Reader;
  describe(pathFilter: PathFilter): Record<string, string[]>;
  /** Label carrying the origin revision id in migrated changes. */
  labelName(): string;
}

export function createPrOrigin(
  config: PrOriginConfig,
  deps: Partial<PrOriginDeps> & Pick<PrOriginDeps, 'api' | 'repo' | 'host'>,
): PrOrigin {
  const { api, repo, host, logger = noopLogger, sleep } = deps;
  const gating = createGatingEngine({ api, host, logger, sleep });
  const fetcher = createFetchOrchestrator({ repo, host, logger });
  const commitGating = config.gating.requiredStatusContexts.size > 0 || config.gating.requiredCheckRuns.size > 0;

  async function getPullRequest(project: string, number: number): Promise<PullRequestRecord> {
    try {
      return await api.getPullRequest(project, number);
    } catch (err) {
      if (err instanceof HostingApiError && err.status === 404) {
        throw new CannotResolveRevisionError(`Cannot find Pull Request ${number} in ${project}`, { cause: err });
      }
      throw err;
    }
  }

  async function revisionForPullRequest(project: string, pr: PullRequestRecord): Promise<Revision> {
    const admission = await gating.admit(project, pr, config.gating);

    // Fetches write fixed local refs: one fetch-and-assemble at a time per handle
    return repo.exclusive(async () => {
      const fetched = await fetcher.fetch(project, pr, {
        useMerge: config.useMerge,
        forceImport: config.gating.forceImport,
        partialFetch: config.partialFetch,
      });
      return assembleRevision({ repo, host }, {
        project,
        pr,
        fetched,
        admission,
        url: config.url,
        describeVersion: config.describeVersion,
      });
    });
  }

  return {
    type: ORIGIN_TYPE,

    async resolve(text: string): Promise<Revision> {
      logger.info(`Resolving reference ${text}`);
      const project = host.getProjectNameFromUrl(config.url);
      const reference = parseReference(text, { project, host, commitGating });

      switch (reference.kind) {
        case 'sha1': {
          const candidates = await api.listPullRequestsAssociatedWithCommit(project, reference.sha);
          const pr = selectPullRequestForCommit(candidates, reference.sha);
          return revisionForPullRequest(project, pr);
        }
        case 'number':
        case 'url':
        case 'head-ref':
          return revisionForPullRequest(project, await getPullRequest(project, reference.number));
        case 'baseline-commit': {
          // Only previously resolved baselines; the base branch was fetched with them
          const sha = await repo.parseRef(reference.sha);
          return createRevision({ sha });
        }
      }
    },

    newReader(pathFilter: PathFilter, authoring: Authoring): Reader {
      const base = createGitReader(repo, pathFilter, authoring, {
        firstParent: config.firstParent,
        url: config.url,
      });
      return createPrReader({ base, repo, baselineFromBranch: config.baselineFromBranch });
    },

    describe(pathFilter: PathFilter): Record<string, string[]> {
      const { gating: g } = config;
      const description: Record<string, string[]> = {
        type: [ORIGIN_TYPE],
        url: [config.url],
      };
      if (g.branch !== null) {
        description.branch = [g.branch];
      }
      const filterRoots = roots(pathFilter);
      if (filterRoots.length > 0 && !filterRoots.includes('')) {
        description.root = filterRoots;
      }
      if (g.reviewPolicy !== null) {
        description.review_state = [g.reviewPolicy];
        description.review_approvers = [...g.reviewApprovers];
      }
      if (g.requiredLabels.size > 0) {
        description.required_labels = [...g.requiredLabels];
      }
      if (g.requiredStatusContexts.size > 0) {
        description.required_status_context_names = [...g.requiredStatusContexts];
      }
      if (g.requiredCheckRuns.size > 0) {
        description.required_check_runs = [...g.requiredCheckRuns];
      }
      return description;
    },

    labelName(): string {
      return ORIGIN_REV_ID_LABEL;
    },
  };
}
