const HEAD_REF_PATTERN = /^refs\/pull\/(\d+)\/head$/;

/** Remote reference that points at the head commit of a pull request. */
export function asHeadRef(prNumber: number): string {
  return `refs/pull/${prNumber}/head`;
}

/** Remote reference that points at the host-computed merge commit of a pull request. */
export function asMergeRef(prNumber: number): string {
  return `refs/pull/${prNumber}/merge`;
}

/**
 * Extract the pull request number from a `refs/pull/<n>/head` reference.
 * Returns null if the text has any other shape.
 */
export function parseHeadRef(text: string): number | null {
  const match = text.match(HEAD_REF_PATTERN);
  if (!match) return null;
  const number = parseInt(match[1], 10);
  return Number.isSafeInteger(number) ? number : null;
}
