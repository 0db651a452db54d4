/**
 * Minimal logging seam for engine modules.
 *
 * Engine code never writes to the console directly; it goes through a
 * `Logger` so hosts can redirect or silence output. The default logger
 * forwards to `console` with a `[Scope]` prefix, the same convention the
 * engine has always used for its diagnostics.
 */

export interface Logger {
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

/**
 * Create a console-backed logger.
 *
 * @param scope     Tag printed in brackets before every message.
 * @param minLevel  Messages below this level are dropped (default `warn`).
 */
export function createConsoleLogger(
  scope: string,
  minLevel: LogLevel = 'warn',
): Logger {
  const enabled = (level: LogLevel): boolean =>
    LEVEL_ORDER[level] >= LEVEL_ORDER[minLevel];
  const prefix = `[${scope}]`;

  return {
    debug(message, ...details) {
      if (enabled('debug')) console.debug(`${prefix} ${message}`, ...details);
    },
    info(message, ...details) {
      if (enabled('info')) console.info(`${prefix} ${message}`, ...details);
    },
    warn(message, ...details) {
      if (enabled('warn')) console.warn(`${prefix} ${message}`, ...details);
    },
    error(message, ...details) {
      if (enabled('error')) console.error(`${prefix} ${message}`, ...details);
    },
  };
}

/** A logger that discards everything. */
export const silentLogger: Logger = {
  debug() {},
  info() {},
  warn() {},
  error() {},
};
