import { LabelMap } from './labels.js';

/**
 * Immutable pointer to a commit plus its migration metadata.
 */
export interface Revision {
  readonly sha: string;
  /** Human-meaningful reference name, e.g. `refs/pull/12/head`. Null for bare commits. */
  readonly reference: string | null;
  readonly labels: LabelMap;
  /** Repository URL the revision was read from. */
  readonly url: string | null;
  /** Descriptive tag computed from tag history, when requested. */
  readonly describeVersion: string | null;
}

export interface RevisionInit {
  sha: string;
  reference?: string | null;
  labels?: LabelMap;
  url?: string | null;
  describeVersion?: string | null;
}

export function createRevision(init: RevisionInit): Revision {
  return Object.freeze({
    sha: init.sha,
    reference: init.reference ?? null,
    labels: init.labels ?? LabelMap.empty(),
    url: init.url ?? null,
    describeVersion: init.describeVersion ?? null,
  });
}

/** JSON-friendly view of a revision for CLI output. */
export function revisionToJson(revision: Revision): Record<string, unknown> {
  return {
    sha: revision.sha,
    reference: revision.reference,
    url: revision.url,
    describeVersion: revision.describeVersion,
    labels: revision.labels.toRecord(),
  };
}
