import { EmptyChangeError, isOpen } from 'pr-kit';
import type {
  AuthorAssociation,
  GitHubHost,
  HostingApi,
  PullRequestRecord,
  ReviewPolicy,
  StateFilter,
} from 'pr-kit';
import { noopLogger } from './logger.js';
import type { LoggerLike } from './logger.js';
import { defaultSleep, pollUntil } from './poll.js';
import type { Sleep } from './poll.js';
import { computeApproverState } from './review-policy.js';
import type { ApproverState } from './review-policy.js';

export const LABEL_POLL_ATTEMPTS = 3;
export const LABEL_POLL_DELAY_MS = 2000;

/**
 * Immutable per-origin admission policy.
 */
export interface GatingConfig {
  requiredLabels: ReadonlySet<string>;
  /** Subset of requiredLabels worth waiting for */
  retryableLabels: ReadonlySet<string>;
  requiredStatusContexts: ReadonlySet<string>;
  requiredCheckRuns: ReadonlySet<string>;
  /** Null disables the review check and reviewer labels */
  reviewPolicy: ReviewPolicy | null;
  reviewApprovers: ReadonlySet<AuthorAssociation>;
  /** Only migrate pull requests targeting this base branch */
  branch: string | null;
  state: StateFilter;
  forceImport: boolean;
}

export interface AdmissionResult {
  /** True when the checks were bypassed by force import */
  forced: boolean;
  /** Present whenever a review policy is configured, even when forced */
  approverState: ApproverState | null;
}

/**
 * Injectable dependencies for the gating engine.
 * Defaults to real implementations; tests can override.
 */
export interface GatingEngineDeps {
  api: HostingApi;
  host: GitHubHost;
  logger: LoggerLike;
  sleep: Sleep;
  labelPollAttempts: number;
  labelPollDelayMs: number;
}

export interface GatingEngine {
  /**
   * Decide whether `pr` may be migrated.
   * @throws EmptyChangeError naming the first failing check
   */
  admit(project: string, pr: PullRequestRecord, config: GatingConfig): Promise<AdmissionResult>;
}

/** Members of `required` missing from `present`, in configuration order. */
function missingFrom(required: ReadonlySet<string>, present: Iterable<string>): string[] {
  const found = new Set(present);
  return [...required].filter((name) => !found.has(name));
}

export function createGatingEngine(
  deps: Partial<GatingEngineDeps> & Pick<GatingEngineDeps, 'api' | 'host'>,
): GatingEngine {
  const {
    api,
    host,
    logger = noopLogger,
    sleep = defaultSleep,
    labelPollAttempts = LABEL_POLL_ATTEMPTS,
    labelPollDelayMs = LABEL_POLL_DELAY_MS,
  } = deps;

  async function checkLabels(project: string, pr: PullRequestRecord, config: GatingConfig, prUrl: string): Promise<void> {
    if (config.requiredLabels.size === 0) return;

    const result = await pollUntil({
      attempts: labelPollAttempts,
      delayMs: labelPollDelayMs,
      sleep,
      fetch: async (attempt) => {
        const issue = await api.getIssue(project, pr.number);
        const missing = missingFrom(config.requiredLabels, issue.labels);
        logger.debug('Fetched pull request labels', { attempt, labels: issue.labels, missing });
        return missing;
      },
      // Nothing more can show up once no retryable label is missing
      isDone: (missing) => missing.length === 0 || missing.every((l) => !config.retryableLabels.has(l)),
    });

    if (result.value.length > 0) {
      throw new EmptyChangeError(
        `Cannot migrate ${prUrl} because it is missing the following labels: ${result.value.join(', ')}`,
      );
    }
  }

  async function checkStatusContexts(project: string, pr: PullRequestRecord, config: GatingConfig, prUrl: string): Promise<void> {
    if (config.requiredStatusContexts.size === 0) return;

    const status = await api.getCombinedStatus(project, pr.head.sha);
    const passed = status.statuses.filter((s) => s.state === 'success').map((s) => s.context);
    const missing = missingFrom(config.requiredStatusContexts, passed);
    if (missing.length > 0) {
      throw new EmptyChangeError(
        `Cannot migrate ${prUrl} because the following status contexts have not been passed: ${missing.join(', ')}`,
      );
    }
  }

  async function checkCheckRuns(project: string, pr: PullRequestRecord, config: GatingConfig, prUrl: string): Promise<void> {
    if (config.requiredCheckRuns.size === 0) return;

    const runs = await api.getCheckRuns(project, pr.head.sha);
    const passed = runs.filter((r) => r.conclusion === 'success').map((r) => r.name);
    const missing = missingFrom(config.requiredCheckRuns, passed);
    if (missing.length > 0) {
      throw new EmptyChangeError(
        `Cannot migrate ${prUrl} because the following check runs have not been passed: ${missing.join(', ')}`,
      );
    }
  }

  function checkBranch(pr: PullRequestRecord, config: GatingConfig, prUrl: string): void {
    if (config.branch === null || pr.base.ref === config.branch) return;
    throw new EmptyChangeError(
      `Cannot migrate ${prUrl} because its base branch is '${pr.base.ref}', but the workflow`
        + ` is configured to only migrate changes for branch '${config.branch}'`,
    );
  }

  async function fetchApproverState(
    project: string,
    pr: PullRequestRecord,
    policy: ReviewPolicy,
    config: GatingConfig,
  ): Promise<ApproverState> {
    const reviews = await api.getReviews(project, pr.number);
    return computeApproverState(policy, reviews, config.reviewApprovers, pr.head.sha);
  }

  function checkReviews(state: ApproverState, policy: ReviewPolicy, config: GatingConfig, prUrl: string): void {
    if (state.shouldMigrate) return;

    let rejected = '';
    if (state.rejectedReviews.length > 0) {
      rejected = `\nThe following reviews were ignored because they don't meet the association requirement of ${[...config.reviewApprovers].join(', ')}:\n`
        + state.rejectedReviews.map((r) => `User ${r.login} - Association: ${r.association}`).join('\n');
    }
    throw new EmptyChangeError(
      `Cannot migrate ${prUrl} because it is missing the required approvals (origin is configured as ${policy}).${rejected}`,
    );
  }

  function checkState(pr: PullRequestRecord, config: GatingConfig): void {
    if (config.state === 'OPEN' && !isOpen(pr)) {
      throw new EmptyChangeError(`Pull Request ${pr.number} is not open`);
    }
    if (config.state === 'CLOSED' && isOpen(pr)) {
      throw new EmptyChangeError(`Pull Request ${pr.number} is open`);
    }
  }

  return {
    async admit(project: string, pr: PullRequestRecord, config: GatingConfig): Promise<AdmissionResult> {
      const policy = config.reviewPolicy;

      if (config.forceImport) {
        logger.debug('Force import: skipping admission checks', { pr: pr.number });
        // Reviews are still needed for the reviewer labels
        const approverState = policy === null ? null : await fetchApproverState(project, pr, policy, config);
        return { forced: true, approverState };
      }

      const prUrl = host.pullRequestUrl(project, pr.number);
      await checkLabels(project, pr, config, prUrl);
      await checkStatusContexts(project, pr, config, prUrl);
      await checkCheckRuns(project, pr, config, prUrl);
      checkBranch(pr, config, prUrl);

      let approverState: ApproverState | null = null;
      if (policy !== null) {
        approverState = await fetchApproverState(project, pr, policy, config);
        checkReviews(approverState, policy, config, prUrl);
      }

      checkState(pr, config);
      logger.debug('Pull request admitted', { pr: pr.number });
      return { forced: false, approverState };
    },
  };
}
