import { EmptyChangeError, errMsg } from 'pr-kit';

export const EXIT_FATAL = 2;
export const EXIT_EMPTY_CHANGE = 3;

/**
 * Exit code for an error escaping a command. Eligibility failures are not
 * fatal: the caller is expected to skip the change and carry on.
 */
export function exitCodeFor(err: unknown): number {
  return err instanceof EmptyChangeError ? EXIT_EMPTY_CHANGE : EXIT_FATAL;
}

export function reportError(err: unknown): number {
  const prefix = err instanceof EmptyChangeError ? 'Skipped' : 'Error';
  process.stderr.write(`${prefix}: ${errMsg(err)}\n`);
  return exitCodeFor(err);
}
