import type { GitHubHost } from 'pr-kit';

export const GITHUB_PR_NUMBER_LABEL = 'GITHUB_PR_NUMBER';
export const GITHUB_BASE_BRANCH = 'GITHUB_BASE_BRANCH';
export const GITHUB_BASE_BRANCH_SHA1 = 'GITHUB_BASE_BRANCH_SHA1';
export const GITHUB_PR_HEAD_SHA = 'GITHUB_PR_HEAD_SHA';
export const GITHUB_PR_USE_MERGE = 'GITHUB_PR_USE_MERGE';
export const GITHUB_PR_TITLE = 'GITHUB_PR_TITLE';
export const GITHUB_PR_BODY = 'GITHUB_PR_BODY';
export const GITHUB_PR_URL = 'GITHUB_PR_URL';
export const GITHUB_PR_USER = 'GITHUB_PR_USER';
export const GITHUB_PR_ASSIGNEE = 'GITHUB_PR_ASSIGNEE';
export const GITHUB_PR_REQUESTED_REVIEWER = 'GITHUB_PR_REQUESTED_REVIEWER';
export const GITHUB_PR_REVIEWER_APPROVER = 'GITHUB_PR_REVIEWER_APPROVER';
export const GITHUB_PR_REVIEWER_OTHER = 'GITHUB_PR_REVIEWER_OTHER';

/** Lets a destination write migration status back to the originating pull request. */
export const INTEGRATE_LABEL = 'INTEGRATE_REVIEW';

/** Label this origin uses to tag migrated revisions with their own identity. */
export const ORIGIN_REV_ID_LABEL = 'GitOrigin-RevId';

/** Keys every resolved pull request revision must carry. */
export const REQUIRED_REVISION_LABELS = [
  GITHUB_PR_NUMBER_LABEL,
  GITHUB_PR_HEAD_SHA,
  GITHUB_BASE_BRANCH,
  GITHUB_BASE_BRANCH_SHA1,
  GITHUB_PR_USE_MERGE,
] as const;

/**
 * Integrate label text: `https://github.com/<project>/pull/<n> from <head-label> <head-sha>`.
 */
export function formatIntegrateLabel(
  host: GitHubHost,
  project: string,
  prNumber: number,
  headLabel: string,
  headSha: string,
): string {
  return `${host.pullRequestUrl(project, prNumber)} from ${headLabel} ${headSha}`;
}
