export type LogContext = Record<string, unknown>;

/**
 * Narrow logging surface the engine components depend on.
 */
export interface LoggerLike {
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
  debug(message: string, context?: LogContext): void;
}

export interface Logger extends LoggerLike {
  /** User-facing progress line, shown regardless of verbosity. */
  progress(message: string): void;
  /** Logger that adds `context` to every line it writes. */
  withContext(context: LogContext): Logger;
}

/**
 * Injectable dependencies for createLogger.
 * Defaults to real implementations; tests can override.
 */
export interface LoggerDeps {
  writeStderr: (data: string) => void;
  now: () => Date;
}

const defaultDeps: LoggerDeps = {
  writeStderr: (data: string) => process.stderr.write(data),
  now: () => new Date(),
};

export const noopLogger: LoggerLike = {
  info: () => {},
  warn: () => {},
  error: () => {},
  debug: () => {},
};

/**
 * Format a log line.
 * Format: [ISO-timestamp] [LEVEL] message { context }
 */
function formatLogLine(
  timestamp: string,
  level: string,
  message: string,
  context?: LogContext,
): string {
  let line = `[${timestamp}] [${level}] ${message}`;
  if (context !== undefined && Object.keys(context).length > 0) {
    line += ` ${JSON.stringify(context)}`;
  }
  return line + '\n';
}

/**
 * Create a structured logger that writes to stderr.
 *
 * - info, warn, error, progress: always shown
 * - debug: only shown when verbose=true
 * - All output goes to stderr (stdout is reserved for program output)
 */
export function createLogger(verbose: boolean, deps: Partial<LoggerDeps> = {}): Logger {
  const resolved: LoggerDeps = { ...defaultDeps, ...deps };
  return buildLogger(verbose, resolved, {});
}

function buildLogger(verbose: boolean, deps: LoggerDeps, fixed: LogContext): Logger {
  function log(level: string, message: string, context?: LogContext): void {
    const merged = context === undefined ? fixed : { ...fixed, ...context };
    deps.writeStderr(formatLogLine(deps.now().toISOString(), level, message, merged));
  }

  return {
    info(message: string, context?: LogContext): void {
      log('INFO', message, context);
    },

    warn(message: string, context?: LogContext): void {
      log('WARN', message, context);
    },

    error(message: string, context?: LogContext): void {
      log('ERROR', message, context);
    },

    debug(message: string, context?: LogContext): void {
      if (verbose) {
        log('DEBUG', message, context);
      }
    },

    progress(message: string): void {
      log('PROGRESS', message);
    },

    withContext(context: LogContext): Logger {
      return buildLogger(verbose, deps, { ...fixed, ...context });
    },
  };
}
