/**
 * Include/exclude glob patterns selecting the origin files a migration reads.
 */
export interface PathFilter {
  include: string[];
  exclude: string[];
}

export const ALL_FILES: PathFilter = Object.freeze({ include: ['**'], exclude: [] });

const WILDCARD = /[*?[{]/;

export function createPathFilter(include: string[] = ['**'], exclude: string[] = []): PathFilter {
  return { include: include.length > 0 ? include : ['**'], exclude };
}

function matchesEverything(filter: PathFilter): boolean {
  return filter.exclude.length === 0 && filter.include.includes('**');
}

/**
 * Convert a filter into git pathspecs. An empty list means the whole tree.
 */
export function toPathspecs(filter: PathFilter): string[] {
  if (matchesEverything(filter)) return [];
  return [
    ...filter.include.map((p) => `:(glob)${p}`),
    ...filter.exclude.map((p) => `:(glob,exclude)${p}`),
  ];
}

/**
 * Directory prefixes that contain every included file.
 * `foo/bar/**` has root `foo/bar`; a pattern that starts with a wildcard has
 * root `''`, meaning the repository root.
 */
export function roots(filter: PathFilter): string[] {
  const result: string[] = [];
  for (const pattern of filter.include) {
    const wildcardAt = pattern.search(WILDCARD);
    const fixed = wildcardAt === -1 ? pattern : pattern.slice(0, wildcardAt);
    const slash = fixed.lastIndexOf('/');
    const root = wildcardAt === -1 ? pattern : slash === -1 ? '' : fixed.slice(0, slash);
    if (!result.includes(root)) result.push(root);
  }
  return result;
}
