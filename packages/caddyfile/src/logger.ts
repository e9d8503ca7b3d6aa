/**
 * Structured logger interface for engine events (validation runs, admin API
 * calls, reloads). Accepts any compatible logger: pino, winston, bunyan,
 * `console`, etc. Arguments follow the printf convention of those loggers.
 */
export interface Logger {
  debug(...args: unknown[]): void;
  info(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
}

const noop = () => {};

/** Default logger: silent, so there is no output unless the caller opts in. */
export const silentLogger: Logger = { debug: noop, info: noop, warn: noop, error: noop };
