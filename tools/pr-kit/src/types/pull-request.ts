/**
 * Whether the hosting service has computed a merge commit for a pull request.
 * `unknown` means the host has not finished computing it yet.
 */
export type Mergeable = 'yes' | 'no' | 'unknown';

export type PullRequestState = 'open' | 'closed';

export const AUTHOR_ASSOCIATIONS = [
  'COLLABORATOR',
  'CONTRIBUTOR',
  'FIRST_TIMER',
  'FIRST_TIME_CONTRIBUTOR',
  'MANNEQUIN',
  'MEMBER',
  'NONE',
  'OWNER',
] as const;

/** Trust tier of a user relative to the repository. */
export type AuthorAssociation = (typeof AUTHOR_ASSOCIATIONS)[number];

export const REVIEW_POLICIES = [
  'HEAD_COMMIT_APPROVED',
  'ANY_COMMIT_APPROVED',
  'HAS_REVIEWERS',
  'ANY',
] as const;

export type ReviewPolicy = (typeof REVIEW_POLICIES)[number];

export const STATE_FILTERS = ['OPEN', 'CLOSED', 'ALL'] as const;

/** Which pull requests may be migrated based on their open/closed state. */
export type StateFilter = (typeof STATE_FILTERS)[number];

export interface User {
  login: string;
}

export interface PullRequestHead {
  sha: string;
  /** Branch name on the head repository */
  ref: string;
  /** `owner:branch` */
  label: string;
}

export interface PullRequestBase {
  ref: string;
  sha: string;
}

/**
 * Read-only snapshot of a pull request. Fetched fresh on every resolution.
 */
export interface PullRequestRecord {
  number: number;
  state: PullRequestState;
  head: PullRequestHead;
  base: PullRequestBase;
  mergeable: Mergeable;
  title: string;
  body: string;
  htmlUrl: string;
  user: User;
  assignees: User[];
  requestedReviewers: User[];
}

export interface Review {
  user: User;
  authorAssociation: AuthorAssociation;
  /** Commit the review was left on; null when the host no longer knows it */
  commitId: string | null;
  /** Raw review state, e.g. 'APPROVED', 'CHANGES_REQUESTED', 'COMMENTED' */
  state: string;
  approved: boolean;
}

export interface Issue {
  number: number;
  labels: string[];
}

export type StatusState = 'error' | 'failure' | 'pending' | 'success';

export interface StatusContext {
  context: string;
  state: StatusState;
}

export interface CombinedStatus {
  sha: string;
  state: StatusState;
  statuses: StatusContext[];
}

export interface CheckRun {
  name: string;
  /** 'queued' | 'in_progress' | 'completed' */
  status: string;
  /** 'success', 'failure', ... or null while the run is not completed */
  conclusion: string | null;
}

export function isOpen(pr: PullRequestRecord): boolean {
  return pr.state === 'open';
}
