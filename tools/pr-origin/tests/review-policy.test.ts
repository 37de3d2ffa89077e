import { describe, it, expect } from 'vitest';
import type { AuthorAssociation } from 'pr-kit';
import { REVIEW_POLICY_PREDICATES, computeApproverState } from '../src/review-policy.js';
import { makeReview } from './__helpers/fakes.js';

const APPROVERS = new Set<AuthorAssociation>(['COLLABORATOR', 'MEMBER', 'OWNER']);

describe('REVIEW_POLICY_PREDICATES', () => {
  it('HEAD_COMMIT_APPROVED requires an approval on the current head', () => {
    const reviews = [
      makeReview({ commitId: 'old', approved: true }),
      makeReview({ commitId: 'new', approved: false, state: 'COMMENTED' }),
    ];
    expect(REVIEW_POLICY_PREDICATES.HEAD_COMMIT_APPROVED(reviews, 'new')).toBe(false);

    const approvedHead = [reviews[0], makeReview({ commitId: 'new', approved: true })];
    expect(REVIEW_POLICY_PREDICATES.HEAD_COMMIT_APPROVED(approvedHead, 'new')).toBe(true);
  });

  it('ANY_COMMIT_APPROVED accepts an approval on an older commit', () => {
    expect(REVIEW_POLICY_PREDICATES.ANY_COMMIT_APPROVED([makeReview({ commitId: 'old' })], 'new')).toBe(true);
    expect(
      REVIEW_POLICY_PREDICATES.ANY_COMMIT_APPROVED([makeReview({ approved: false, state: 'CHANGES_REQUESTED' })], 'new'),
    ).toBe(false);
  });

  it('HAS_REVIEWERS accepts any review at all', () => {
    expect(REVIEW_POLICY_PREDICATES.HAS_REVIEWERS([makeReview({ approved: false, state: 'COMMENTED' })], 'new')).toBe(true);
    expect(REVIEW_POLICY_PREDICATES.HAS_REVIEWERS([], 'new')).toBe(false);
  });

  it('ANY is always satisfied', () => {
    expect(REVIEW_POLICY_PREDICATES.ANY([], 'new')).toBe(true);
  });
});

describe('computeApproverState', () => {
  it('ignores approvals from users outside the approver associations', () => {
    const reviews = [makeReview({ user: { login: 'drive-by' }, authorAssociation: 'NONE', commitId: 'head' })];

    const state = computeApproverState('ANY_COMMIT_APPROVED', reviews, APPROVERS, 'head');

    expect(state).toEqual({
      shouldMigrate: false,
      rejectedReviews: [{ login: 'drive-by', association: 'NONE' }],
      approvers: [],
      others: ['drive-by'],
    });
  });

  it('buckets and deduplicates reviewer logins', () => {
    const reviews = [
      makeReview({ user: { login: 'carol' }, authorAssociation: 'OWNER', commitId: 'head' }),
      makeReview({ user: { login: 'dave' }, authorAssociation: 'CONTRIBUTOR', approved: false, state: 'COMMENTED' }),
      makeReview({ user: { login: 'carol' }, authorAssociation: 'OWNER', approved: false, state: 'COMMENTED' }),
      makeReview({ user: { login: 'erin' }, authorAssociation: 'MEMBER', approved: false, state: 'COMMENTED' }),
    ];

    const state = computeApproverState('HEAD_COMMIT_APPROVED', reviews, APPROVERS, 'head');

    expect(state.shouldMigrate).toBe(true);
    expect(state.approvers).toEqual(['carol', 'erin']);
    expect(state.others).toEqual(['dave']);
    expect(state.rejectedReviews).toEqual([{ login: 'dave', association: 'CONTRIBUTOR' }]);
  });
});
