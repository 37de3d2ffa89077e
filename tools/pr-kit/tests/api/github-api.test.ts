import { describe, it, expect, vi } from 'vitest';
import { createGitHubApi, parseHttpStatus } from '../../src/api/github-api.js';
import { HostingApiError } from '../../src/errors.js';

const SHA = 'b'.repeat(40);

function rawPullRequest(overrides: Record<string, unknown> = {}) {
  return {
    number: 42,
    state: 'open',
    title: 'Add widgets',
    body: null,
    html_url: 'https://github.com/acme/widgets/pull/42',
    user: { login: 'octocat', id: 1 },
    assignees: [{ login: 'alice' }],
    requested_reviewers: [{ login: 'bob' }],
    head: { sha: SHA, ref: 'feature', label: 'octocat:feature' },
    base: { sha: 'a'.repeat(40), ref: 'main', label: 'acme:main' },
    mergeable: true,
    ...overrides,
  };
}

function makeApi(response: unknown, host?: string) {
  const execFn = vi.fn(async () => JSON.stringify(response));
  return { api: createGitHubApi({ host, execFn }), execFn };
}

describe('createGitHubApi', () => {
  it('fetches and maps a pull request', async () => {
    const { api, execFn } = makeApi(rawPullRequest());

    const pr = await api.getPullRequest('acme/widgets', 42);

    expect(execFn).toHaveBeenCalledWith('gh', [
      'api',
      '-H',
      'Accept: application/vnd.github+json',
      'repos/acme/widgets/pulls/42',
    ]);
    expect(pr).toEqual({
      number: 42,
      state: 'open',
      head: { sha: SHA, ref: 'feature', label: 'octocat:feature' },
      base: { ref: 'main', sha: 'a'.repeat(40) },
      mergeable: 'yes',
      title: 'Add widgets',
      body: '',
      htmlUrl: 'https://github.com/acme/widgets/pull/42',
      user: { login: 'octocat' },
      assignees: [{ login: 'alice' }],
      requestedReviewers: [{ login: 'bob' }],
    });
  });

  it.each([
    [true, 'yes'],
    [false, 'no'],
    [null, 'unknown'],
  ])('maps mergeable %s to %s', async (mergeable, expected) => {
    const { api } = makeApi(rawPullRequest({ mergeable }));
    expect((await api.getPullRequest('acme/widgets', 42)).mergeable).toBe(expected);
  });

  it('passes the hostname for enterprise hosts', async () => {
    const { api, execFn } = makeApi({ number: 42, labels: [] }, 'github.example.com');

    await api.getIssue('team/tool', 42);

    expect(execFn).toHaveBeenCalledWith('gh', [
      'api',
      '-H',
      'Accept: application/vnd.github+json',
      '--hostname',
      'github.example.com',
      'repos/team/tool/issues/42',
    ]);
  });

  it('returns issue label names', async () => {
    const { api } = makeApi({ number: 42, labels: [{ name: 'ready', color: 'fff' }, { name: 'lgtm' }] });
    expect(await api.getIssue('acme/widgets', 42)).toEqual({ number: 42, labels: ['ready', 'lgtm'] });
  });

  it('maps reviews and deleted reviewers', async () => {
    const { api, execFn } = makeApi([
      { user: { login: 'carol' }, author_association: 'MEMBER', commit_id: SHA, state: 'APPROVED' },
      { user: null, author_association: 'NONE', commit_id: null, state: 'COMMENTED' },
    ]);

    const reviews = await api.getReviews('acme/widgets', 42);

    expect(execFn).toHaveBeenCalledWith('gh', expect.arrayContaining(['repos/acme/widgets/pulls/42/reviews?per_page=100&page=1']));
    expect(reviews).toEqual([
      { user: { login: 'carol' }, authorAssociation: 'MEMBER', commitId: SHA, state: 'APPROVED', approved: true },
      { user: { login: 'ghost' }, authorAssociation: 'NONE', commitId: null, state: 'COMMENTED', approved: false },
    ]);
  });

  it('follows review pages until a short page comes back', async () => {
    const memberReview = { user: { login: 'carol' }, author_association: 'MEMBER', commit_id: 'a'.repeat(40), state: 'COMMENTED' };
    const pages: Record<string, unknown[]> = {
      'repos/acme/widgets/pulls/42/reviews?per_page=100&page=1': Array.from({ length: 100 }, () => memberReview),
      'repos/acme/widgets/pulls/42/reviews?per_page=100&page=2': [
        { user: { login: 'dave' }, author_association: 'OWNER', commit_id: SHA, state: 'APPROVED' },
      ],
    };
    const execFn = vi.fn(async (_command: string, args: string[]) => JSON.stringify(pages[args[args.length - 1]] ?? []));
    const api = createGitHubApi({ execFn });

    const reviews = await api.getReviews('acme/widgets', 42);

    expect(execFn.mock.calls.map((call) => call[1][call[1].length - 1])).toEqual([
      'repos/acme/widgets/pulls/42/reviews?per_page=100&page=1',
      'repos/acme/widgets/pulls/42/reviews?per_page=100&page=2',
    ]);
    expect(reviews).toHaveLength(101);
    expect(reviews[100]).toEqual({
      user: { login: 'dave' },
      authorAssociation: 'OWNER',
      commitId: SHA,
      state: 'APPROVED',
      approved: true,
    });
  });

  it('requests a further page after a full one even when it comes back empty', async () => {
    const run = { name: 'lint', status: 'completed', conclusion: 'success' };
    const execFn = vi.fn(async (_command: string, args: string[]) =>
      JSON.stringify(
        args[args.length - 1].endsWith('page=1')
          ? { total_count: 100, check_runs: Array.from({ length: 100 }, () => run) }
          : { total_count: 100, check_runs: [] },
      ),
    );
    const api = createGitHubApi({ execFn });

    expect(await api.getCheckRuns('acme/widgets', SHA)).toHaveLength(100);
    expect(execFn).toHaveBeenCalledTimes(2);
  });

  it('reads combined status and check runs of a commit', async () => {
    const status = makeApi({ sha: SHA, state: 'pending', statuses: [{ context: 'ci/build', state: 'success', id: 3 }] });
    expect(await status.api.getCombinedStatus('acme/widgets', SHA)).toEqual({
      sha: SHA,
      state: 'pending',
      statuses: [{ context: 'ci/build', state: 'success' }],
    });

    const runs = makeApi({ total_count: 1, check_runs: [{ name: 'lint', status: 'completed', conclusion: 'success' }] });
    expect(await runs.api.getCheckRuns('acme/widgets', SHA)).toEqual([
      { name: 'lint', status: 'completed', conclusion: 'success' },
    ]);
    expect(runs.execFn).toHaveBeenCalledWith(
      'gh',
      expect.arrayContaining([`repos/acme/widgets/commits/${SHA}/check-runs?per_page=100&page=1`]),
    );
  });

  it('lists pull requests associated with a commit, without mergeable state', async () => {
    const { api } = makeApi([rawPullRequest({ mergeable: undefined })]);
    const prs = await api.listPullRequestsAssociatedWithCommit('acme/widgets', SHA);

    expect(prs.map((pr) => [pr.number, pr.mergeable])).toEqual([[42, 'unknown']]);
  });

  it('wraps transport failures with the HTTP status', async () => {
    const execFn = vi.fn(async () => {
      throw new Error('gh: Not Found (HTTP 404)');
    });
    const api = createGitHubApi({ execFn });

    const error = await api.getPullRequest('acme/widgets', 7).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(HostingApiError);
    expect(error).toHaveProperty('status', 404);
    expect(error).toHaveProperty('message', 'GitHub API request repos/acme/widgets/pulls/7 failed: gh: Not Found (HTTP 404)');
  });

  it('rejects malformed JSON and unexpected payloads', async () => {
    const broken = createGitHubApi({ execFn: vi.fn(async () => 'not json') });
    await expect(broken.getIssue('acme/widgets', 1)).rejects.toThrow(
      new HostingApiError('GitHub API request repos/acme/widgets/issues/1 returned invalid JSON', null),
    );

    const { api } = makeApi({ number: 'one', labels: [] });
    await expect(api.getIssue('acme/widgets', 1)).rejects.toThrow(
      'Unexpected response from GitHub API repos/acme/widgets/issues/1: number: Expected number, received string',
    );
  });
});

describe('parseHttpStatus', () => {
  it('extracts the status code from gh output', () => {
    expect(parseHttpStatus('gh: Bad credentials (HTTP 401)')).toBe(401);
    expect(parseHttpStatus('connection refused')).toBeNull();
  });
});
