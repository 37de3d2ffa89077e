import * as os from 'node:os';
import * as path from 'node:path';
import { ValidationError, loadConfig } from 'pr-kit';
import type { Authoring, AuthorAssociation, LoadConfigOptions, OriginConfigFile } from 'pr-kit';
import type { GatingConfig } from './gating.js';
import type { PrOriginConfig } from './origin.js';

export const DEFAULT_REVIEW_APPROVERS: readonly AuthorAssociation[] = ['COLLABORATOR', 'MEMBER', 'OWNER'];
const DEFAULT_AUTHOR = 'Migration Bot <migration-bot@localhost>';

/**
 * CLI options as received from commander (all strings/booleans).
 */
export interface CliOptions {
  repo: string;
  config?: string;
  url?: string;
  useMerge?: boolean;
  force?: boolean;
  requiredLabel?: string[];
  retryableLabel?: string[];
  cacheDir?: string;
  verbose: boolean;
}

export interface RunConfig {
  repoPath: string;
  verbose: boolean;
  /** Root directory of the bare repository cache */
  cacheDir: string;
  githubHost: string;
  origin: PrOriginConfig;
  authoring: Authoring;
}

/**
 * Injectable dependencies for loadRunConfig.
 * Defaults to real implementations; tests can override.
 */
export interface RunConfigDeps {
  loadConfig: (options: LoadConfigOptions) => OriginConfigFile;
  env: Record<string, string | undefined>;
  homeDir: () => string;
}

const defaultDeps: RunConfigDeps = {
  loadConfig,
  env: process.env,
  homeDir: () => os.homedir(),
};

function parseList(value: string): string[] {
  return value.split(',').map((s) => s.trim()).filter((s) => s.length > 0);
}

type LabelSource = 'cli' | 'env' | 'config';

function pickLabels(
  cli: string[] | undefined,
  env: string | undefined,
  configured: string[] | undefined,
): { labels: string[]; source: LabelSource } {
  if (cli !== undefined) return { labels: cli, source: 'cli' };
  if (env !== undefined) return { labels: parseList(env), source: 'env' };
  return { labels: configured ?? [], source: 'config' };
}

function parseFlag(value: string): boolean {
  return ['1', 'true', 'yes'].includes(value.trim().toLowerCase());
}

/**
 * Load the run configuration from config files, environment variables,
 * and CLI flags.
 *
 * Priority: CLI flags > env vars > config files > defaults.
 */
export function loadRunConfig(cliOptions: CliOptions, deps: Partial<RunConfigDeps> = {}): RunConfig {
  const { loadConfig: load, env, homeDir } = { ...defaultDeps, ...deps };

  const repoPath = path.resolve(cliOptions.repo);
  const file = load({
    repoPath,
    configPath: cliOptions.config === undefined ? undefined : path.resolve(cliOptions.config),
  });
  const origin = file.origin;

  const url = cliOptions.url ?? origin?.url;
  if (url === undefined) {
    throw new ValidationError(
      'No origin URL configured. Pass --url or set origin.url in .pr-origin.yaml',
    );
  }

  // Label overrides replace the configured sets, they are not merged
  const required = pickLabels(cliOptions.requiredLabel, env['PR_ORIGIN_REQUIRED_LABELS'], origin?.required_labels);
  const retryable = pickLabels(cliOptions.retryableLabel, env['PR_ORIGIN_RETRYABLE_LABELS'], origin?.retryable_labels);
  const requiredLabels = required.labels;

  const notRequired = retryable.labels.filter((l) => !requiredLabels.includes(l));
  if (notRequired.length > 0 && retryable.source === required.source) {
    throw new ValidationError(
      `Retryable labels must also be required labels, but these are not: ${notRequired.join(', ')}`,
    );
  }
  // Overriding only the required set stops retries on labels it no longer requires
  const retryableLabels = retryable.labels.filter((l) => requiredLabels.includes(l));

  const envForce = env['PR_ORIGIN_FORCE'];
  const forceImport = cliOptions.force
    ?? (envForce !== undefined ? parseFlag(envForce) : origin?.force_import ?? false);

  const reviewPolicy = origin?.review_state ?? null;
  const gating: GatingConfig = {
    requiredLabels: new Set(requiredLabels),
    retryableLabels: new Set(retryableLabels),
    requiredStatusContexts: new Set(origin?.required_status_context_names ?? []),
    requiredCheckRuns: new Set(origin?.required_check_runs ?? []),
    reviewPolicy,
    reviewApprovers: new Set<AuthorAssociation>(reviewPolicy === null ? [] : origin?.review_approvers ?? DEFAULT_REVIEW_APPROVERS),
    branch: origin?.branch ?? null,
    state: origin?.state ?? 'OPEN',
    forceImport,
  };

  const cacheDir = cliOptions.cacheDir
    ?? env['PR_ORIGIN_CACHE_DIR']
    ?? file.github?.cache_dir
    ?? path.join(homeDir(), '.cache', 'pr-origin');

  return {
    repoPath,
    verbose: cliOptions.verbose,
    cacheDir: path.resolve(cacheDir),
    githubHost: file.github?.host ?? 'github.com',
    origin: {
      url,
      useMerge: cliOptions.useMerge ?? origin?.use_merge ?? false,
      gating,
      baselineFromBranch: origin?.baseline_from_branch ?? false,
      firstParent: origin?.first_parent ?? true,
      partialFetch: origin?.partial_fetch ?? false,
      describeVersion: origin?.describe_version ?? false,
    },
    authoring: {
      mode: file.authoring?.mode ?? 'PASS_THRU',
      defaultAuthor: file.authoring?.default_author ?? DEFAULT_AUTHOR,
      allowlist: file.authoring?.allowlist ?? [],
    },
  };
}
