import { describe, it, expect, vi } from 'vitest';
import { createGitRepository, parseLog, GIT_DESCRIBE_CHANGE_VERSION } from '../../src/git/repository.js';
import { createRevision } from '../../src/git/revision.js';
import { CannotResolveRevisionError, GitCommandError } from '../../src/errors.js';

const GIT_DIR = '/cache/github.com_acme_widgets';
const A = 'a'.repeat(40);
const B = 'b'.repeat(40);

function makeDeps(handler: (args: string[]) => string | Error = () => '') {
  return {
    execGit: vi.fn(async (args: string[]) => {
      const result = handler(args);
      if (result instanceof Error) throw result;
      return result;
    }),
    mkdir: vi.fn(async () => {}),
  };
}

describe('createGitRepository', () => {
  it('initializes the bare repository once before the first command', async () => {
    const deps = makeDeps((args) => (args.includes('merge-base') ? `${A}\n` : ''));
    const repo = createGitRepository(GIT_DIR, deps);

    expect(await repo.mergeBase('refs/PR_HEAD', 'refs/PR_BASE_BRANCH')).toBe(A);
    await repo.mergeBase('refs/PR_HEAD', 'refs/PR_BASE_BRANCH');

    expect(deps.execGit.mock.calls.map((c) => c[0])).toEqual([
      ['init', '--bare', '--quiet', GIT_DIR],
      [`--git-dir=${GIT_DIR}`, 'merge-base', 'refs/PR_HEAD', 'refs/PR_BASE_BRANCH'],
      [`--git-dir=${GIT_DIR}`, 'merge-base', 'refs/PR_HEAD', 'refs/PR_BASE_BRANCH'],
    ]);
  });

  it('fetches every refspec in one command', async () => {
    const deps = makeDeps();
    const repo = createGitRepository(GIT_DIR, deps);

    await repo.fetch('https://github.com/acme/widgets', false, true, ['refs/pull/42/head:refs/PR_HEAD'], true);

    expect(deps.execGit).toHaveBeenLastCalledWith([
      `--git-dir=${GIT_DIR}`,
      'fetch',
      '--no-prune',
      '--force',
      '--filter=blob:none',
      'https://github.com/acme/widgets',
      'refs/pull/42/head:refs/PR_HEAD',
    ]);
  });

  it('reports missing remote refs as unresolvable', async () => {
    const deps = makeDeps((args) =>
      args.includes('fetch') ? new GitCommandError(args, 128, "fatal: couldn't find remote ref refs/pull/7/head\n") : '',
    );
    const repo = createGitRepository(GIT_DIR, deps);

    await expect(
      repo.fetch('https://github.com/acme/widgets', false, true, ['refs/pull/7/head:refs/PR_HEAD'], false),
    ).rejects.toThrow(
      new CannotResolveRevisionError(
        "Cannot fetch refs/pull/7/head:refs/PR_HEAD from https://github.com/acme/widgets: fatal: couldn't find remote ref refs/pull/7/head",
      ),
    );
  });

  it('passes other fetch failures through', async () => {
    const failure = new GitCommandError(['fetch'], 128, 'fatal: unable to access: Could not resolve host');
    const repo = createGitRepository(GIT_DIR, makeDeps((args) => (args.includes('fetch') ? failure : '')));

    await expect(repo.fetch('https://github.com/acme/widgets', false, true, [], false)).rejects.toBe(failure);
  });

  it('resolves references to commits', async () => {
    const deps = makeDeps((args) => (args.includes('rev-parse') ? `${B}\n` : ''));
    const repo = createGitRepository(GIT_DIR, deps);

    const revision = await repo.resolveReference('refs/PR_HEAD');

    expect(revision.sha).toBe(B);
    expect(revision.reference).toBe('refs/PR_HEAD');
    expect(deps.execGit).toHaveBeenLastCalledWith([
      `--git-dir=${GIT_DIR}`,
      'rev-parse',
      '--verify',
      '--quiet',
      'refs/PR_HEAD^{commit}',
    ]);
  });

  it('reports unknown references', async () => {
    const repo = createGitRepository(
      GIT_DIR,
      makeDeps((args) => (args.includes('rev-parse') ? new GitCommandError(args, 1, '') : '')),
    );

    await expect(repo.parseRef('refs/PR_MERGE')).rejects.toThrow(
      new CannotResolveRevisionError("Cannot resolve reference 'refs/PR_MERGE'"),
    );
  });

  it('builds log commands from options', async () => {
    const deps = makeDeps();
    const repo = createGitRepository(GIT_DIR, deps);

    await repo.log(`${A}..${B}`, { limit: 5, firstParent: true, grep: '^GitOrigin-RevId: ', paths: [':(glob)src/**'] });

    const args = deps.execGit.mock.lastCall?.[0] ?? [];
    expect(args.slice(3)).toEqual([
      '-n5',
      '--first-parent',
      '-E',
      '--grep=^GitOrigin-RevId: ',
      `${A}..${B}`,
      '--',
      ':(glob)src/**',
    ]);
  });

  it('adds the describe version when a tag is reachable', async () => {
    const repo = createGitRepository(GIT_DIR, makeDeps((args) => (args.includes('describe') ? 'v1.2.0-3-gbbbbbbb\n' : '')));

    const described = await repo.addDescribeVersion(createRevision({ sha: B, reference: 'refs/pull/42/head' }));

    expect(described.describeVersion).toBe('v1.2.0-3-gbbbbbbb');
    expect(described.labels.get(GIT_DESCRIBE_CHANGE_VERSION)).toEqual(['v1.2.0-3-gbbbbbbb']);
    expect(described.reference).toBe('refs/pull/42/head');
  });

  it('leaves the revision alone when no tag is reachable', async () => {
    const repo = createGitRepository(
      GIT_DIR,
      makeDeps((args) => (args.includes('describe') ? new GitCommandError(args, 128, 'fatal: No names found') : '')),
    );
    const revision = createRevision({ sha: B });

    expect(await repo.addDescribeVersion(revision)).toBe(revision);
  });

  it('checks a tree out into a work directory', async () => {
    const deps = makeDeps();
    const repo = createGitRepository(GIT_DIR, deps);

    await repo.checkout(B, '/tmp/work');

    expect(deps.mkdir).toHaveBeenCalledWith('/tmp/work', { recursive: true });
    expect(deps.execGit).toHaveBeenLastCalledWith([
      `--git-dir=${GIT_DIR}`,
      '--work-tree=/tmp/work',
      'checkout',
      '--force',
      B,
      '--',
      '.',
    ]);
  });
});

describe('parseLog', () => {
  it('splits records and fields', () => {
    const output =
      `${B}\x1f${A}\x1fAlice <alice@example.com>\x1f2024-01-02T03:04:05+00:00\x1fAdd widgets\n\nGitOrigin-RevId: 1234\n\x1e\n`
      + `${A}\x1f\x1fBob <bob@example.com>\x1f2024-01-01T00:00:00+00:00\x1fInitial commit\n\x1e\n`;

    expect(parseLog(output)).toEqual([
      {
        sha: B,
        parents: [A],
        author: 'Alice <alice@example.com>',
        date: '2024-01-02T03:04:05+00:00',
        message: 'Add widgets\n\nGitOrigin-RevId: 1234',
      },
      {
        sha: A,
        parents: [],
        author: 'Bob <bob@example.com>',
        date: '2024-01-01T00:00:00+00:00',
        message: 'Initial commit',
      },
    ]);
  });
});
