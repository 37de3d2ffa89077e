import type {
  CheckRun,
  CombinedStatus,
  Issue,
  PullRequestRecord,
  Review,
} from '../types/pull-request.js';

/**
 * Adapter for the version-control hosting API.
 * Implementations can shell out to `gh` or call the REST API directly.
 * `project` is always `owner/repo`.
 */
export interface HostingApi {
  getPullRequest(project: string, number: number): Promise<PullRequestRecord>;

  /** Issue view of a pull request; used for its current labels. */
  getIssue(project: string, number: number): Promise<Issue>;

  getReviews(project: string, number: number): Promise<Review[]>;

  getCombinedStatus(project: string, sha: string): Promise<CombinedStatus>;

  getCheckRuns(project: string, sha: string): Promise<CheckRun[]>;

  /** Pull requests whose commits include `sha`, in the order the host returns them. */
  listPullRequestsAssociatedWithCommit(project: string, sha: string): Promise<PullRequestRecord[]>;
}
