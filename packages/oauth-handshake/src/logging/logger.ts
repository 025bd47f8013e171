/**
 * Logging for exchange and flow operations.
 *
 * Callers never see secrets in log output: tokens, signatures, verifiers and
 * client or consumer secrets are not passed to the logger.
 *
 * @packageDocumentation
 */

/**
 * Log level.
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Structured context attached to a log line.
 */
export type LogContext = Readonly<Record<string, string | number | boolean | undefined>>;

/**
 * Logger interface accepted by clients and the retry executor.
 */
export interface Logger {
  readonly debug: (message: string, context?: LogContext) => void;
  readonly info: (message: string, context?: LogContext) => void;
  readonly warn: (message: string, context?: LogContext) => void;
  readonly error: (message: string, context?: LogContext) => void;
  /** Creates a logger that adds `context` to every entry */
  readonly child: (context: LogContext) => Logger;
}

/**
 * A recorded log entry.
 */
export interface LogEntry {
  readonly level: LogLevel;
  readonly message: string;
  readonly context: LogContext;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

/**
 * Logger that discards everything. Default for library clients.
 */
export const noopLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
  child: () => noopLogger,
};

/**
 * Options for the console logger.
 */
export interface ConsoleLoggerOptions {
  /** Lowest level written (default: 'info') */
  readonly level?: LogLevel;
  /** Context added to every entry */
  readonly context?: LogContext;
}

const formatContext = (context: LogContext): string => {
  const parts = Object.entries(context)
    .filter(([, value]) => value !== undefined)
    .map(([key, value]) => `${key}=${String(value)}`);
  return parts.length > 0 ? ` ${parts.join(' ')}` : '';
};

/**
 * Creates a logger that writes `[prefix] message key=value ...` lines to stderr.
 *
 * stderr keeps stdout free for programs that use it as a data channel.
 *
 * @example
 * ```typescript
 * const logger = createConsoleLogger('oauth1', { level: 'debug' });
 * logger.info('Request token issued', { status: 200 });
 * // [oauth1] Request token issued status=200
 * ```
 */
export const createConsoleLogger = (prefix: string, options: ConsoleLoggerOptions = {}): Logger => {
  const threshold = LEVEL_ORDER[options.level ?? 'info'];
  const base = options.context ?? {};

  const write =
    (level: LogLevel) =>
    (message: string, context: LogContext = {}): void => {
      if (LEVEL_ORDER[level] < threshold) {
        return;
      }
      console.error(`[${prefix}] ${message}${formatContext({ ...base, ...context })}`);
    };

  return {
    debug: write('debug'),
    info: write('info'),
    warn: write('warn'),
    error: write('error'),
    child: (context) =>
      createConsoleLogger(prefix, { ...options, context: { ...base, ...context } }),
  };
};

/**
 * Logger that records entries in memory, for tests.
 */
export interface MemoryLogger extends Logger {
  readonly entries: LogEntry[];
}

/**
 * Creates a logger that records every entry in `entries`.
 * Child loggers share the parent's entry list.
 */
export const createMemoryLogger = (
  context: LogContext = {},
  entries: LogEntry[] = []
): MemoryLogger => {
  const record =
    (level: LogLevel) =>
    (message: string, extra: LogContext = {}): void => {
      entries.push({ level, message, context: { ...context, ...extra } });
    };

  return {
    entries,
    debug: record('debug'),
    info: record('info'),
    warn: record('warn'),
    error: record('error'),
    child: (extra) => createMemoryLogger({ ...context, ...extra }, entries),
  };
};
