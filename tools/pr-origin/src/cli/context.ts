import { createGitHubApi, createGitHubHost, createRepositoryCache } from 'pr-kit';
import { loadRunConfig } from '../config.js';
import type { RunConfig } from '../config.js';
import { createLogger } from '../logger.js';
import type { Logger } from '../logger.js';
import { createPrOrigin } from '../origin.js';
import type { PrOrigin } from '../origin.js';
import { toCliOptions } from './utils/options.js';
import type { OriginCommandOptions } from './utils/options.js';

export interface CliContext {
  config: RunConfig;
  logger: Logger;
  origin: PrOrigin;
}

/**
 * Wire the origin and its collaborators from command-line options.
 */
export function createCliContext(options: OriginCommandOptions): CliContext {
  const config = loadRunConfig(toCliOptions(options));
  const logger = createLogger(config.verbose);
  const host = createGitHubHost(config.githubHost);
  const api = createGitHubApi({ host: config.githubHost });
  const repo = createRepositoryCache(config.cacheDir).forUrl(config.origin.url);

  logger.debug('Loaded configuration', {
    url: config.origin.url,
    cacheDir: config.cacheDir,
    forceImport: config.origin.gating.forceImport,
  });

  return {
    config,
    logger,
    origin: createPrOrigin(config.origin, { api, repo, host, logger: logger.withContext({ origin: config.origin.url }) }),
  };
}
