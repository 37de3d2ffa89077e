// Errors
export {
  ValidationError,
  EmptyChangeError,
  RepoError,
  CannotResolveRevisionError,
  GitCommandError,
  HostingApiError,
  errMsg,
} from './errors.js';

// Types
export type {
  Mergeable,
  PullRequestState,
  AuthorAssociation,
  ReviewPolicy,
  StateFilter,
  User,
  PullRequestHead,
  PullRequestBase,
  PullRequestRecord,
  Review,
  Issue,
  StatusState,
  StatusContext,
  CombinedStatus,
  CheckRun,
} from './types/pull-request.js';
export {
  AUTHOR_ASSOCIATIONS,
  REVIEW_POLICIES,
  STATE_FILTERS,
  isOpen,
} from './types/pull-request.js';

// Hosting API
export type { HostingApi } from './api/types.js';
export { createGitHubApi, parseHttpStatus } from './api/github-api.js';
export type { GitHubApiOptions } from './api/github-api.js';
export { createGitHubHost } from './api/github-host.js';
export type { GitHubHost, GitHubPrUrl } from './api/github-host.js';
export { asHeadRef, asMergeRef, parseHeadRef } from './api/refs.js';

// Git
export { LabelMap, LabelMapBuilder } from './git/labels.js';
export { createRevision, revisionToJson } from './git/revision.js';
export type { Revision, RevisionInit } from './git/revision.js';
export { createRepositoryLock } from './git/lock.js';
export type { RepositoryLock } from './git/lock.js';
export { createGitRepository, parseLog, GIT_DESCRIBE_CHANGE_VERSION } from './git/repository.js';
export type { GitRepository, GitRepositoryDeps, GitLogEntry, LogOptions } from './git/repository.js';
export { createRepositoryCache, cacheDirName } from './git/repository-cache.js';
export type { RepositoryCache } from './git/repository-cache.js';
export { ALL_FILES, createPathFilter, toPathspecs, roots } from './git/path-filter.js';
export type { PathFilter } from './git/path-filter.js';
export { AUTHORING_MODES, authorEmail, resolveAuthor } from './git/authoring.js';
export type { Authoring, AuthoringMode } from './git/authoring.js';
export { createGitReader, parseMessageLabels } from './git/reader.js';
export type { Reader, Change, Baseline, ChangesResponse, GitReaderOptions } from './git/reader.js';

// Config
export { originConfigFileSchema } from './config/schema.js';
export type { OriginConfigFile, OriginSection, GitHubSection, AuthoringSection } from './config/schema.js';
export { loadConfig, mergeConfigs, CONFIG_PATHS } from './config/loader.js';
export type { LoadConfigOptions } from './config/loader.js';
export { defaultConfig } from './config/defaults.js';
