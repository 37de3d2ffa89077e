/**
 * Configuration or usage error: malformed references, cross-project
 * references, invalid config. Never retried.
 */
export class ValidationError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ValidationError';
  }
}

/**
 * Eligibility failure. The change should not be migrated right now; callers
 * skip it and carry on with other work.
 */
export class EmptyChangeError extends ValidationError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'EmptyChangeError';
  }
}

/**
 * Failure reported by the git or hosting API collaborators.
 */
export class RepoError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'RepoError';
  }
}

/**
 * The reference is well formed but there is nothing to resolve it to.
 */
export class CannotResolveRevisionError extends RepoError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'CannotResolveRevisionError';
  }
}

/**
 * Error thrown when a `git` invocation exits non-zero.
 */
export class GitCommandError extends RepoError {
  constructor(
    public readonly args: readonly string[],
    public readonly exitCode: number | null,
    public readonly stderr: string,
  ) {
    super(`git ${args.join(' ')} failed${exitCode === null ? '' : ` with exit code ${exitCode}`}: ${stderr.trim()}`);
    this.name = 'GitCommandError';
  }
}

/**
 * Error thrown when a hosting API call fails or returns an unexpected payload.
 * `status` is the HTTP status when the transport reported one.
 */
export class HostingApiError extends RepoError {
  constructor(
    message: string,
    public readonly status: number | null,
    public readonly stderr: string = '',
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'HostingApiError';
  }
}

/** Extract a human-readable message from an unknown thrown value. */
export function errMsg(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
