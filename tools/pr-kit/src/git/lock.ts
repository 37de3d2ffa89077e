/**
 * Mutual exclusion for one repository handle.
 *
 * Fetches write to fixed local reference names, so two resolutions must not
 * interleave on the same handle. Tasks run one at a time in submission order;
 * a failing task does not block the ones queued behind it.
 */
export interface RepositoryLock {
  run<T>(task: () => Promise<T>): Promise<T>;
}

export function createRepositoryLock(): RepositoryLock {
  let tail: Promise<void> = Promise.resolve();

  return {
    run<T>(task: () => Promise<T>): Promise<T> {
      const result = tail.then(() => task());
      tail = result.then(
        () => undefined,
        () => undefined,
      );
      return result;
    },
  };
}
