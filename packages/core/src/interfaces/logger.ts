/**
 * Logger
 * Pluggable logger injected into the manager and transports.
 * Any structured logger with these four methods (pino, winston, console) fits.
 */
export interface Logger {
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
}

/**
 * Console-backed logger used when none is injected
 */
export function createConsoleLogger(prefix = '[http]'): Logger {
  return {
    debug: (m, meta) => console.debug(`${prefix}[debug]`, m, meta),
    info: (m, meta) => console.info(`${prefix}[info]`, m, meta),
    warn: (m, meta) => console.warn(`${prefix}[warn]`, m, meta),
    error: (m, meta) => console.error(`${prefix}[error]`, m, meta),
  };
}

/**
 * Logger that drops everything
 */
export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};
