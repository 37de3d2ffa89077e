import { LabelMapBuilder, asHeadRef, asMergeRef, createRevision } from 'pr-kit';
import type { GitHubHost, GitRepository, PullRequestRecord, Revision } from 'pr-kit';
import { LOCAL_PR_BASE_BRANCH, LOCAL_PR_HEAD_REF, LOCAL_PR_MERGE_REF } from './fetch.js';
import type { FetchResult } from './fetch.js';
import type { AdmissionResult } from './gating.js';
import {
  GITHUB_BASE_BRANCH,
  GITHUB_BASE_BRANCH_SHA1,
  GITHUB_PR_ASSIGNEE,
  GITHUB_PR_BODY,
  GITHUB_PR_HEAD_SHA,
  GITHUB_PR_NUMBER_LABEL,
  GITHUB_PR_REQUESTED_REVIEWER,
  GITHUB_PR_REVIEWER_APPROVER,
  GITHUB_PR_REVIEWER_OTHER,
  GITHUB_PR_TITLE,
  GITHUB_PR_URL,
  GITHUB_PR_USER,
  GITHUB_PR_USE_MERGE,
  INTEGRATE_LABEL,
  REQUIRED_REVISION_LABELS,
  formatIntegrateLabel,
} from './labels.js';

export interface AssemblerDeps {
  repo: GitRepository;
  host: GitHubHost;
}

export interface AssembleInput {
  project: string;
  pr: PullRequestRecord;
  fetched: FetchResult;
  admission: AdmissionResult;
  /** Origin URL stamped on the revision */
  url: string;
  describeVersion: boolean;
}

/**
 * Build the revision for a fetched and admitted pull request.
 */
export async function assembleRevision(deps: AssemblerDeps, input: AssembleInput): Promise<Revision> {
  const { repo, host } = deps;
  const { project, pr, fetched, admission } = input;

  const refForMigration = fetched.useMerge ? LOCAL_PR_MERGE_REF : LOCAL_PR_HEAD_REF;
  // Integration metadata always points at the PR head, never the synthetic merge
  const sha = fetched.useMerge && fetched.mergeSha !== null ? fetched.mergeSha : fetched.headSha;
  const mergeBase = await repo.mergeBase(refForMigration, LOCAL_PR_BASE_BRANCH);

  const labels = new LabelMapBuilder()
    .put(GITHUB_PR_NUMBER_LABEL, String(pr.number))
    .put(INTEGRATE_LABEL, formatIntegrateLabel(host, project, pr.number, pr.head.label, fetched.headSha))
    .put(GITHUB_BASE_BRANCH, pr.base.ref)
    .put(GITHUB_BASE_BRANCH_SHA1, mergeBase)
    .put(GITHUB_PR_HEAD_SHA, fetched.headSha)
    .put(GITHUB_PR_USE_MERGE, String(fetched.useMerge))
    .put(GITHUB_PR_TITLE, pr.title)
    .put(GITHUB_PR_BODY, pr.body)
    .put(GITHUB_PR_URL, pr.htmlUrl)
    .put(GITHUB_PR_USER, pr.user.login)
    .putAll(GITHUB_PR_ASSIGNEE, pr.assignees.map((u) => u.login))
    .putAll(GITHUB_PR_REQUESTED_REVIEWER, pr.requestedReviewers.map((u) => u.login));

  if (admission.approverState !== null) {
    labels
      .putAll(GITHUB_PR_REVIEWER_APPROVER, admission.approverState.approvers)
      .putAll(GITHUB_PR_REVIEWER_OTHER, admission.approverState.others);
  }

  const built = labels.build();
  for (const key of REQUIRED_REVISION_LABELS) {
    if (!built.has(key)) {
      throw new Error(`Revision for Pull Request ${pr.number} is missing label ${key}`);
    }
  }

  const revision = createRevision({
    sha,
    reference: fetched.useMerge ? asMergeRef(pr.number) : asHeadRef(pr.number),
    labels: built,
    url: input.url,
  });
  return input.describeVersion ? repo.addDescribeVersion(revision) : revision;
}
