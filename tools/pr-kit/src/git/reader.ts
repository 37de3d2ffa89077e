import { CannotResolveRevisionError } from '../errors.js';
import { resolveAuthor } from './authoring.js';
import type { Authoring } from './authoring.js';
import { LabelMapBuilder } from './labels.js';
import type { LabelMap } from './labels.js';
import { toPathspecs } from './path-filter.js';
import type { PathFilter } from './path-filter.js';
import type { GitLogEntry, GitRepository } from './repository.js';
import { createRevision } from './revision.js';
import type { Revision } from './revision.js';

const LABEL_LINE = /^([A-Za-z][\w-]*): (.*)$/;

/**
 * A commit as seen by a migration: its revision plus authoring metadata.
 */
export interface Change {
  revision: Revision;
  author: string;
  date: string;
  message: string;
  parents: string[];
}

/** The prior revision a change set is computed against. */
export interface Baseline {
  /** Origin sha recorded in the baseline */
  sha: string;
  revision: Revision;
}

export interface ChangesResponse {
  /** Oldest first */
  changes: Change[];
}

/**
 * Reads history from an origin, restricted to the origin's path filter.
 */
export interface Reader {
  /** Nearest ancestor of `start` whose message carries `label`. */
  findBaseline(start: Revision, label: string): Promise<Baseline | null>;
  /** Up to `limit` ancestors of `start` (including it) touching the path filter, newest first. */
  findBaselinesWithoutLabel(start: Revision, limit: number): Promise<Revision[]>;
  /** Changes after `from` (exclusive) up to `to` (inclusive). */
  changes(from: Revision | null, to: Revision): Promise<ChangesResponse>;
  change(sha: string): Promise<Change>;
  showDiff(from: Revision, to: Revision): Promise<string>;
  checkout(revision: Revision, workdir: string): Promise<void>;
}

export interface GitReaderOptions {
  firstParent: boolean;
  /** Repository URL stamped on revisions the reader creates */
  url: string | null;
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Parse `Key: value` lines from a commit message body. The subject line is
 * never treated as a label.
 */
export function parseMessageLabels(message: string): LabelMap {
  const builder = new LabelMapBuilder();
  const lines = message.split('\n').slice(1);
  for (const line of lines) {
    const match = line.match(LABEL_LINE);
    if (match) builder.put(match[1], match[2].trim());
  }
  return builder.build();
}

/**
 * Generic git-backed reader over a local repository handle.
 */
export function createGitReader(
  repo: GitRepository,
  pathFilter: PathFilter,
  authoring: Authoring,
  options: Partial<GitReaderOptions> = {},
): Reader {
  const paths = toPathspecs(pathFilter);
  const firstParent = options.firstParent ?? true;
  const url = options.url ?? null;

  function toChange(entry: GitLogEntry): Change {
    return {
      revision: createRevision({ sha: entry.sha, labels: parseMessageLabels(entry.message), url }),
      author: resolveAuthor(authoring, entry.author),
      date: entry.date,
      message: entry.message,
      parents: entry.parents,
    };
  }

  return {
    async findBaseline(start: Revision, label: string): Promise<Baseline | null> {
      const [entry] = await repo.log(start.sha, {
        limit: 1,
        firstParent,
        grep: `^${escapeRegExp(label)}: `,
      });
      if (!entry) return null;
      const change = toChange(entry);
      const sha = change.revision.labels.last(label);
      if (sha === undefined) return null;
      return { sha, revision: change.revision };
    },

    async findBaselinesWithoutLabel(start: Revision, limit: number): Promise<Revision[]> {
      const entries = await repo.log(start.sha, { limit, firstParent, paths });
      return entries.map((e) => toChange(e).revision);
    },

    async changes(from: Revision | null, to: Revision): Promise<ChangesResponse> {
      const range = from ? `${from.sha}..${to.sha}` : to.sha;
      const entries = await repo.log(range, { firstParent, paths });
      return { changes: entries.reverse().map(toChange) };
    },

    async change(sha: string): Promise<Change> {
      const [entry] = await repo.log(sha, { limit: 1 });
      if (!entry) {
        throw new CannotResolveRevisionError(`Cannot find commit ${sha}`);
      }
      return toChange(entry);
    },

    showDiff(from: Revision, to: Revision): Promise<string> {
      return repo.showDiff(from.sha, to.sha);
    },

    checkout(revision: Revision, workdir: string): Promise<void> {
      return repo.checkout(revision.sha, workdir);
    },
  };
}
