import type { AuthorAssociation, Review, ReviewPolicy } from 'pr-kit';

/**
 * Decides whether the reviews left by approver-association users are enough
 * to migrate a pull request whose head is `headSha`.
 */
export type ReviewPredicate = (reviews: readonly Review[], headSha: string) => boolean;

export const REVIEW_POLICY_PREDICATES: Readonly<Record<ReviewPolicy, ReviewPredicate>> = {
  // The current head commit has at least one approval
  HEAD_COMMIT_APPROVED: (reviews, headSha) =>
    reviews.some((r) => r.commitId === headSha && r.approved),
  // Any approval, even on an older commit
  ANY_COMMIT_APPROVED: (reviews) => reviews.some((r) => r.approved),
  // Somebody commented, asked for changes or approved
  HAS_REVIEWERS: (reviews) => reviews.length > 0,
  // Only used to populate reviewer labels
  ANY: () => true,
};

export interface RejectedReview {
  login: string;
  association: AuthorAssociation;
}

export interface ApproverState {
  shouldMigrate: boolean;
  /** Reviews ignored because their author's association is not an approver one */
  rejectedReviews: RejectedReview[];
  /** Logins of reviewers with an approver association, first occurrence order */
  approvers: string[];
  /** Logins of every other reviewer */
  others: string[];
}

function uniqueLogins(reviews: readonly Review[]): string[] {
  return Array.from(new Set(reviews.map((r) => r.user.login)));
}

export function computeApproverState(
  policy: ReviewPolicy,
  reviews: readonly Review[],
  approvers: ReadonlySet<AuthorAssociation>,
  headSha: string,
): ApproverState {
  const fromApprovers = reviews.filter((r) => approvers.has(r.authorAssociation));
  const fromOthers = reviews.filter((r) => !approvers.has(r.authorAssociation));

  return {
    shouldMigrate: REVIEW_POLICY_PREDICATES[policy](fromApprovers, headSha),
    rejectedReviews: fromOthers.map((r) => ({ login: r.user.login, association: r.authorAssociation })),
    approvers: uniqueLogins(fromApprovers),
    others: uniqueLogins(fromOthers),
  };
}
