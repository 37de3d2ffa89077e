import * as path from 'node:path';
import { createGitRepository } from './repository.js';
import type { GitRepository, GitRepositoryDeps } from './repository.js';

/**
 * Hands out one shared repository handle per remote URL, so every origin
 * that reads the same URL also shares its lock.
 */
export interface RepositoryCache {
  forUrl(url: string): GitRepository;
}

/**
 * Directory name for a URL's bare repository inside the cache root.
 */
export function cacheDirName(url: string): string {
  return url.replace(/^[a-z+]+:\/\//i, '').replace(/[^A-Za-z0-9._-]+/g, '_');
}

export function createRepositoryCache(rootDir: string, deps: Partial<GitRepositoryDeps> = {}): RepositoryCache {
  const handles = new Map<string, GitRepository>();

  return {
    forUrl(url: string): GitRepository {
      const existing = handles.get(url);
      if (existing) return existing;
      const repo = createGitRepository(path.join(rootDir, cacheDirName(url)), deps);
      handles.set(url, repo);
      return repo;
    },
  };
}
