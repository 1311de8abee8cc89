/**
 * Logger contract used by the boundary validator.
 */
export interface BoundaryLogger {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
}

const noop = (): void => {};

/** Default logger: discards everything. */
export const silentLogger: BoundaryLogger = {
  debug: noop,
  info : noop,
  warn : noop,
  error: noop,
};

/** Console logger with level prefixes. */
export const consoleLogger: BoundaryLogger = {
  debug: (msg, data) => console.debug(`[DEBUG] ${msg}`, data ?? ''),
  info : (msg, data) => console.info(`[INFO] ${msg}`, data ?? ''),
  warn : (msg, data) => console.warn(`[WARN] ${msg}`, data ?? ''),
  error: (msg, data) => console.error(`[ERROR] ${msg}`, data ?? ''),
};
