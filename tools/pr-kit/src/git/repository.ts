import { execFile } from 'node:child_process';
import { mkdir } from 'node:fs/promises';
import { CannotResolveRevisionError, GitCommandError } from '../errors.js';
import { createRepositoryLock } from './lock.js';
import { createRevision } from './revision.js';
import type { Revision } from './revision.js';

/** Label that carries the `git describe` output of a revision. */
export const GIT_DESCRIBE_CHANGE_VERSION = 'GIT_DESCRIBE_CHANGE_VERSION';

const FIELD_SEP = '\x1f';
const RECORD_SEP = '\x1e';
const LOG_FORMAT = `--format=%H${FIELD_SEP}%P${FIELD_SEP}%an <%ae>${FIELD_SEP}%aI${FIELD_SEP}%B${RECORD_SEP}`;

const MISSING_REMOTE_REF = /couldn't find remote ref|no such remote ref|unknown revision|not our ref/i;

/**
 * A single commit as reported by `git log`.
 */
export interface GitLogEntry {
  sha: string;
  parents: string[];
  /** `Name <email>` */
  author: string;
  /** ISO-8601 author date */
  date: string;
  message: string;
}

export interface LogOptions {
  limit?: number;
  firstParent?: boolean;
  /** Pathspecs restricting the walk; empty means the whole tree */
  paths?: string[];
  /** Extended regular expression the commit message must match */
  grep?: string;
}

/**
 * Injectable dependencies for the repository.
 * Defaults to real implementations; tests can override.
 */
export interface GitRepositoryDeps {
  execGit: (args: string[], cwd?: string) => Promise<string>;
  mkdir: (path: string, options: { recursive: boolean }) => Promise<void>;
}

/**
 * Handle on a local bare repository that mirrors one remote URL.
 */
export interface GitRepository {
  readonly gitDir: string;

  /**
   * Fetch `refspecs` from `url` in a single call.
   * @throws CannotResolveRevisionError when a requested remote ref does not exist
   */
  fetch(url: string, prune: boolean, force: boolean, refspecs: string[], partial: boolean): Promise<void>;

  /** Resolve a reference name (or sha) to a revision carrying that name. */
  resolveReference(name: string): Promise<Revision>;

  /** Resolve arbitrary text to a full commit sha. */
  parseRef(text: string): Promise<string>;

  mergeBase(a: string, b: string): Promise<string>;

  log(ref: string, options?: LogOptions): Promise<GitLogEntry[]>;

  showDiff(from: string, to: string): Promise<string>;

  /** Materialize the tree of `ref` into `workdir`. */
  checkout(ref: string, workdir: string): Promise<void>;

  /** Annotate a revision with a descriptive tag from tag history. */
  addDescribeVersion(revision: Revision): Promise<Revision>;

  /**
   * Run `task` while holding this handle's lock. Fetches write fixed local
   * ref names, so fetch-and-resolve sequences must go through here.
   */
  exclusive<T>(task: () => Promise<T>): Promise<T>;
}

function defaultExecGit(args: string[], cwd?: string): Promise<string> {
  return new Promise((resolve, reject) => {
    execFile(
      'git',
      args,
      { encoding: 'utf-8', cwd, timeout: 600000, maxBuffer: 256 * 1024 * 1024 },
      (err, stdout, stderr) => {
        if (err) {
          const code = typeof err.code === 'number' ? err.code : null;
          reject(new GitCommandError(args, code, stderr || err.message));
        } else {
          resolve(stdout);
        }
      },
    );
  });
}

async function defaultMkdir(dirPath: string, options: { recursive: boolean }): Promise<void> {
  await mkdir(dirPath, options);
}

const defaultDeps: GitRepositoryDeps = {
  execGit: defaultExecGit,
  mkdir: defaultMkdir,
};

/**
 * Parse `git log` output produced with {@link LOG_FORMAT}.
 */
export function parseLog(output: string): GitLogEntry[] {
  const entries: GitLogEntry[] = [];
  for (const chunk of output.split(RECORD_SEP)) {
    const record = chunk.replace(/^\n+/, '');
    if (record.trim().length === 0) continue;
    const [sha, parents, author, date, ...rest] = record.split(FIELD_SEP);
    entries.push({
      sha,
      parents: parents.split(' ').filter((p) => p.length > 0),
      author,
      date,
      message: rest.join(FIELD_SEP).trimEnd(),
    });
  }
  return entries;
}

/**
 * Create a handle on the bare repository at `gitDir`.
 * The repository is initialized on first use.
 */
export function createGitRepository(gitDir: string, deps: Partial<GitRepositoryDeps> = {}): GitRepository {
  const { execGit, mkdir: makeDir } = { ...defaultDeps, ...deps };
  const lock = createRepositoryLock();
  let initialized: Promise<void> | null = null;

  function git(args: string[]): Promise<string> {
    return execGit([`--git-dir=${gitDir}`, ...args]);
  }

  function ensureInitialized(): Promise<void> {
    if (initialized === null) {
      initialized = execGit(['init', '--bare', '--quiet', gitDir]).then(
        () => undefined,
        (err: unknown) => {
          initialized = null;
          throw err;
        },
      );
    }
    return initialized;
  }

  async function parseRef(text: string): Promise<string> {
    await ensureInitialized();
    try {
      const out = await git(['rev-parse', '--verify', '--quiet', `${text}^{commit}`]);
      return out.trim();
    } catch (err) {
      throw new CannotResolveRevisionError(`Cannot resolve reference '${text}'`, { cause: err });
    }
  }

  return {
    gitDir,

    async fetch(url: string, prune: boolean, force: boolean, refspecs: string[], partial: boolean): Promise<void> {
      await ensureInitialized();
      const args = ['fetch', prune ? '--prune' : '--no-prune'];
      if (force) args.push('--force');
      if (partial) args.push('--filter=blob:none');
      args.push(url, ...refspecs);

      try {
        await git(args);
      } catch (err) {
        if (err instanceof GitCommandError && MISSING_REMOTE_REF.test(err.stderr)) {
          throw new CannotResolveRevisionError(`Cannot fetch ${refspecs.join(', ')} from ${url}: ${err.stderr.trim()}`, { cause: err });
        }
        throw err;
      }
    },

    async resolveReference(name: string): Promise<Revision> {
      const sha = await parseRef(name);
      return createRevision({ sha, reference: name });
    },

    parseRef,

    async mergeBase(a: string, b: string): Promise<string> {
      await ensureInitialized();
      const out = await git(['merge-base', a, b]);
      return out.trim();
    },

    async log(ref: string, options: LogOptions = {}): Promise<GitLogEntry[]> {
      await ensureInitialized();
      const args = ['log', LOG_FORMAT];
      if (options.limit !== undefined) args.push(`-n${options.limit}`);
      if (options.firstParent) args.push('--first-parent');
      if (options.grep !== undefined) args.push('-E', `--grep=${options.grep}`);
      args.push(ref);
      const paths = options.paths ?? [];
      if (paths.length > 0) args.push('--', ...paths);
      return parseLog(await git(args));
    },

    async showDiff(from: string, to: string): Promise<string> {
      await ensureInitialized();
      return git(['diff', from, to]);
    },

    async checkout(ref: string, workdir: string): Promise<void> {
      await ensureInitialized();
      await makeDir(workdir, { recursive: true });
      await git([`--work-tree=${workdir}`, 'checkout', '--force', ref, '--', '.']);
    },

    async addDescribeVersion(revision: Revision): Promise<Revision> {
      await ensureInitialized();
      let described: string;
      try {
        described = (await git(['describe', '--tags', revision.sha])).trim();
      } catch (err) {
        if (err instanceof GitCommandError) {
          // No reachable tag: the revision stays as it was
          return revision;
        }
        throw err;
      }
      return createRevision({
        sha: revision.sha,
        reference: revision.reference,
        labels: revision.labels.with(GIT_DESCRIBE_CHANGE_VERSION, described),
        url: revision.url,
        describeVersion: described,
      });
    },

    exclusive<T>(task: () => Promise<T>): Promise<T> {
      return lock.run(task);
    },
  };
}
