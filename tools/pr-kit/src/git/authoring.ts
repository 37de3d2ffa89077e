export const AUTHORING_MODES = ['PASS_THRU', 'OVERWRITE', 'ALLOWED'] as const;

export type AuthoringMode = (typeof AUTHORING_MODES)[number];

/**
 * How commit authors are carried into migrated changes.
 *
 * - PASS_THRU: keep the original author
 * - OVERWRITE: always use the default author
 * - ALLOWED: keep the original author when their email is allowlisted,
 *   otherwise use the default author
 */
export interface Authoring {
  mode: AuthoringMode;
  /** `Name <email>` */
  defaultAuthor: string;
  allowlist: string[];
}

/** Email part of `Name <email>`, or the whole string when there are no brackets. */
export function authorEmail(author: string): string {
  const match = author.match(/<([^>]*)>\s*$/);
  return match ? match[1] : author.trim();
}

export function resolveAuthor(authoring: Authoring, commitAuthor: string): string {
  switch (authoring.mode) {
    case 'PASS_THRU':
      return commitAuthor;
    case 'OVERWRITE':
      return authoring.defaultAuthor;
    case 'ALLOWED':
      return authoring.allowlist.includes(authorEmail(commitAuthor)) ? commitAuthor : authoring.defaultAuthor;
  }
}
