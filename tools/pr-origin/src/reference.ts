import {
  CannotResolveRevisionError,
  EmptyChangeError,
  ValidationError,
  isOpen,
  parseHeadRef,
} from 'pr-kit';
import type { GitHubHost, PullRequestRecord } from 'pr-kit';

export const COMPLETE_SHA1_PATTERN = /^[a-f0-9]{40}$/;

/**
 * What a reference string asks for.
 *
 * - `sha1`: a commit whose owning open pull request must be looked up
 * - `baseline-commit`: a literal commit, resolved against the repository only
 */
export type PullRequestReference =
  | { kind: 'number'; number: number }
  | { kind: 'url'; project: string; number: number }
  | { kind: 'head-ref'; number: number }
  | { kind: 'sha1'; sha: string }
  | { kind: 'baseline-commit'; sha: string };

export interface ReferenceContext {
  /** `owner/repo` the origin is configured for */
  project: string;
  host: GitHubHost;
  /** True when status-context or check-run gating is configured */
  commitGating: boolean;
}

function parseNumber(text: string): number {
  const number = parseInt(text, 10);
  if (!Number.isSafeInteger(number)) {
    throw new ValidationError(`'${text}' is not a valid pull request number`);
  }
  return number;
}

/**
 * Turn a reference string into a request for a pull request or a commit.
 *
 * Formats are tried in a fixed order: commit sha (only with commit gating),
 * full pull request URL, bare number, `refs/pull/<n>/head`, and finally a
 * leading 40-hex sha naming a previously resolved baseline.
 */
export function parseReference(raw: string, context: ReferenceContext): PullRequestReference {
  const reference = raw.trim();
  if (reference.length === 0) {
    throw new ValidationError(
      'A pull request reference is expected as argument in the command line.'
        + ' Invoke as:\n    pr-origin resolve 12345',
    );
  }

  if (context.commitGating && COMPLETE_SHA1_PATTERN.test(reference)) {
    return { kind: 'sha1', sha: reference };
  }

  const prUrl = context.host.parsePrUrl(reference);
  if (prUrl) {
    if (prUrl.project !== context.project) {
      throw new ValidationError(
        `Project name should be '${context.project}' but it is '${prUrl.project}' instead`,
      );
    }
    return { kind: 'url', project: prUrl.project, number: prUrl.number };
  }

  if (/^\d+$/.test(reference)) {
    return { kind: 'number', number: parseNumber(reference) };
  }

  const headRefNumber = parseHeadRef(reference);
  if (headRefNumber !== null) {
    return { kind: 'head-ref', number: headRefNumber };
  }

  const [firstToken] = reference.split(/\s+/);
  if (COMPLETE_SHA1_PATTERN.test(firstToken)) {
    return { kind: 'baseline-commit', sha: firstToken };
  }

  throw new CannotResolveRevisionError(
    `'${raw}' is not a valid reference for a GitHub Pull Request. Valid formats: `
      + `'${context.host.pullRequestUrl(context.project, 1234)}', 'refs/pull/1234/head' or '1234'`,
  );
}

/**
 * Pick the pull request to migrate for a commit: the first candidate, in
 * remote order, that is not closed and whose head is exactly `sha`.
 *
 * Several matches are not disambiguated further; the first one wins.
 * @throws EmptyChangeError when no candidate qualifies
 */
export function selectPullRequestForCommit(
  candidates: readonly PullRequestRecord[],
  sha: string,
): PullRequestRecord {
  const match = candidates.find((pr) => isOpen(pr) && pr.head.sha === sha);
  if (!match) {
    throw new EmptyChangeError(
      `Could not find a pr with not-closed state and head being equal to sha ${sha}`,
    );
  }
  return match;
}
