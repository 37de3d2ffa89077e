import { execFile } from 'node:child_process';
import type { z } from 'zod';
import { HostingApiError, errMsg } from '../errors.js';
import type { HostingApi } from './types.js';
import type { Mergeable, PullRequestRecord, Review } from '../types/pull-request.js';
import {
  checkRunsSchema,
  combinedStatusSchema,
  issueSchema,
  pullRequestListSchema,
  pullRequestSchema,
  reviewListSchema,
} from './schemas.js';
import type { RawPullRequest, RawReview } from './schemas.js';

/** Largest page GitHub serves. A shorter page is the last one. */
const PAGE_SIZE = 100;

/**
 * Options for constructing the GitHub API adapter.
 */
export interface GitHubApiOptions {
  /** Host to query; anything other than github.com is passed to `gh --hostname`. */
  host?: string;
  /**
   * Function to execute the `gh` CLI and return its stdout.
   * Injected for testing.
   */
  execFn?: (command: string, args: string[]) => Promise<string>;
}

/**
 * Pull the HTTP status out of `gh` error output, e.g. "gh: Not Found (HTTP 404)".
 */
export function parseHttpStatus(text: string): number | null {
  const match = text.match(/HTTP (\d{3})/);
  return match ? parseInt(match[1], 10) : null;
}

function defaultExec(command: string, args: string[]): Promise<string> {
  return new Promise((resolve, reject) => {
    execFile(
      command,
      args,
      { encoding: 'utf-8', timeout: 30000, maxBuffer: 32 * 1024 * 1024 },
      (err, stdout, stderr) => {
        if (err) {
          const detail = stderr.trim() || err.message;
          reject(new HostingApiError(`${command} ${args.join(' ')} failed: ${detail}`, parseHttpStatus(stderr), stderr, { cause: err }));
        } else {
          resolve(stdout);
        }
      },
    );
  });
}

function toMergeable(value: boolean | null | undefined): Mergeable {
  if (value === true) return 'yes';
  if (value === false) return 'no';
  return 'unknown';
}

function toPullRequestRecord(raw: RawPullRequest): PullRequestRecord {
  return {
    number: raw.number,
    state: raw.state,
    head: { sha: raw.head.sha, ref: raw.head.ref, label: raw.head.label },
    base: { ref: raw.base.ref, sha: raw.base.sha },
    mergeable: toMergeable(raw.mergeable),
    title: raw.title,
    body: raw.body ?? '',
    htmlUrl: raw.html_url,
    user: { login: raw.user.login },
    assignees: (raw.assignees ?? []).map((u) => ({ login: u.login })),
    requestedReviewers: (raw.requested_reviewers ?? []).map((u) => ({ login: u.login })),
  };
}

function toReview(raw: RawReview): Review {
  return {
    user: { login: raw.user?.login ?? 'ghost' },
    authorAssociation: raw.author_association,
    commitId: raw.commit_id,
    state: raw.state,
    approved: raw.state === 'APPROVED',
  };
}

/**
 * Hosting API adapter that uses `gh api` to query GitHub.
 * Authentication and HTTP transport are left to the `gh` CLI.
 */
export function createGitHubApi(options: GitHubApiOptions = {}): HostingApi {
  const host = options.host ?? 'github.com';
  const exec = options.execFn ?? defaultExec;

  async function request<T>(path: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T> {
    const args = ['api', '-H', 'Accept: application/vnd.github+json'];
    if (host !== 'github.com') {
      args.push('--hostname', host);
    }
    args.push(path);

    let raw: string;
    try {
      raw = await exec('gh', args);
    } catch (err) {
      if (err instanceof HostingApiError) throw err;
      const msg = errMsg(err);
      throw new HostingApiError(`GitHub API request ${path} failed: ${msg}`, parseHttpStatus(msg), '', { cause: err });
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (err) {
      throw new HostingApiError(`GitHub API request ${path} returned invalid JSON`, null, '', { cause: err });
    }

    const result = schema.safeParse(json);
    if (!result.success) {
      const issues = result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join(', ');
      throw new HostingApiError(`Unexpected response from GitHub API ${path}: ${issues}`, null);
    }
    return result.data;
  }

  /**
   * Read every page of a listing, following `page=N` until a short page
   * comes back. `first` is the first page, for endpoints that wrap their
   * items in an envelope.
   */
  async function requestAllPages<T, I>(
    path: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    itemsOf: (page: T) => I[],
  ): Promise<{ first: T; items: I[] }> {
    const first = await request(`${path}?per_page=${PAGE_SIZE}&page=1`, schema);
    let pageItems = itemsOf(first);
    const items = [...pageItems];
    for (let page = 2; pageItems.length >= PAGE_SIZE; page++) {
      pageItems = itemsOf(await request(`${path}?per_page=${PAGE_SIZE}&page=${page}`, schema));
      items.push(...pageItems);
    }
    return { first, items };
  }

  return {
    async getPullRequest(project: string, number: number): Promise<PullRequestRecord> {
      const raw = await request(`repos/${project}/pulls/${number}`, pullRequestSchema);
      return toPullRequestRecord(raw);
    },

    async getIssue(project: string, number: number) {
      const raw = await request(`repos/${project}/issues/${number}`, issueSchema);
      return { number: raw.number, labels: raw.labels.map((l) => l.name) };
    },

    async getReviews(project: string, number: number): Promise<Review[]> {
      const { items } = await requestAllPages(`repos/${project}/pulls/${number}/reviews`, reviewListSchema, (page) => page);
      return items.map(toReview);
    },

    async getCombinedStatus(project: string, sha: string) {
      const { first, items } = await requestAllPages(
        `repos/${project}/commits/${sha}/status`,
        combinedStatusSchema,
        (page) => page.statuses,
      );
      return {
        sha: first.sha,
        state: first.state,
        statuses: items.map((s) => ({ context: s.context, state: s.state })),
      };
    },

    async getCheckRuns(project: string, sha: string) {
      const { items } = await requestAllPages(
        `repos/${project}/commits/${sha}/check-runs`,
        checkRunsSchema,
        (page) => page.check_runs,
      );
      return items.map((run) => ({
        name: run.name,
        status: run.status,
        conclusion: run.conclusion,
      }));
    },

    async listPullRequestsAssociatedWithCommit(project: string, sha: string): Promise<PullRequestRecord[]> {
      const { items } = await requestAllPages(`repos/${project}/commits/${sha}/pulls`, pullRequestListSchema, (page) => page);
      return items.map(toPullRequestRecord);
    },
  };
}
