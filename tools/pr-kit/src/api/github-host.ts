import { ValidationError } from '../errors.js';

/**
 * A pull request URL split into its project (`owner/repo`) and number.
 */
export interface GitHubPrUrl {
  project: string;
  number: number;
}

/**
 * URL conventions of a GitHub host (github.com or an Enterprise install).
 */
export interface GitHubHost {
  readonly host: string;

  /**
   * Extract `owner/repo` from a repository URL.
   * Accepts https URLs and scp-style ssh URLs, with or without `.git`.
   * @throws ValidationError if the URL is not a repository on this host.
   */
  getProjectNameFromUrl(url: string): string;

  /** Parse a full pull request URL, or return null if the text is anything else. */
  parsePrUrl(text: string): GitHubPrUrl | null;

  /** https URL of a project, used as the fetch URL. */
  projectAsUrl(project: string): string;

  /** Web URL of a pull request. */
  pullRequestUrl(project: string, prNumber: number): string;
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

export function createGitHubHost(host = 'github.com'): GitHubHost {
  const escaped = escapeRegExp(host);
  const httpsPattern = new RegExp(`^https?://(?:[^@/]+@)?${escaped}/([^/]+/[^/]+?)(?:\\.git)?/?$`);
  const sshPattern = new RegExp(`^(?:ssh://)?git@${escaped}[:/]([^/]+/[^/]+?)(?:\\.git)?/?$`);
  const prUrlPattern = new RegExp(`^https?://${escaped}/([^/]+/[^/]+)/pull/(\\d+)/?$`);

  return {
    host,

    getProjectNameFromUrl(url: string): string {
      const match = url.match(httpsPattern) ?? url.match(sshPattern);
      if (!match) {
        throw new ValidationError(`'${url}' is not a valid ${host} repository URL`);
      }
      return match[1];
    },

    parsePrUrl(text: string): GitHubPrUrl | null {
      const match = text.match(prUrlPattern);
      if (!match) return null;
      const number = parseInt(match[2], 10);
      if (!Number.isSafeInteger(number)) return null;
      return { project: match[1], number };
    },

    projectAsUrl(project: string): string {
      return `https://${host}/${project}`;
    },

    pullRequestUrl(project: string, prNumber: number): string {
      return `https://${host}/${project}/pull/${prNumber}`;
    },
  };
}
