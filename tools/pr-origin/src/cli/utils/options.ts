import type { Command } from 'commander';
import { createPathFilter } from 'pr-kit';
import type { PathFilter } from 'pr-kit';
import type { CliOptions } from '../../config.js';

/**
 * Options shared by every command, as parsed by commander.
 */
export interface OriginCommandOptions {
  repo: string;
  config?: string;
  url?: string;
  useMerge?: boolean;
  force?: boolean;
  requiredLabel?: string[];
  retryableLabel?: string[];
  cacheDir?: string;
  verbose: boolean;
  pretty: boolean;
  output?: string;
}

export interface PathFilterOptions {
  include?: string[];
  exclude?: string[];
}

/** Repeatable option accumulator. */
export function collect(value: string, previous: string[] | undefined): string[] {
  return [...(previous ?? []), value];
}

export function addOriginOptions(command: Command): Command {
  return command
    .option('--repo <path>', 'Working repository holding .pr-origin.yaml', process.cwd())
    .option('--config <path>', 'Config file to use instead of the repository one')
    .option('--url <url>', 'Origin repository URL')
    .option('--use-merge', 'Migrate the merge commit computed by GitHub instead of the PR head')
    .option('--force', 'Bypass every admission check')
    .option('--required-label <label>', 'Label the pull request must carry (repeatable)', collect)
    .option('--retryable-label <label>', 'Required label worth waiting for (repeatable)', collect)
    .option('--cache-dir <path>', 'Directory for the local repository cache')
    .option('--verbose', 'Verbose output', false)
    .option('--pretty', 'Pretty-print JSON output', false)
    .option('-o, --output <file>', 'Write output to file instead of stdout');
}

export function addPathFilterOptions(command: Command): Command {
  return command
    .option('--include <glob>', 'Origin files to read (repeatable, default **)', collect)
    .option('--exclude <glob>', 'Origin files to ignore (repeatable)', collect);
}

export function toCliOptions(options: OriginCommandOptions): CliOptions {
  return {
    repo: options.repo,
    config: options.config,
    url: options.url,
    useMerge: options.useMerge,
    force: options.force,
    requiredLabel: options.requiredLabel,
    retryableLabel: options.retryableLabel,
    cacheDir: options.cacheDir,
    verbose: options.verbose,
  };
}

export function toPathFilter(options: PathFilterOptions): PathFilter {
  return createPathFilter(options.include ?? [], options.exclude ?? []);
}
