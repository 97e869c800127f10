/**
 * Minimal sink for library diagnostics. Library code never prints
 * directly; it logs through the `logger` option, which defaults to the
 * console.
 */
export interface Logger {
  info(message: string): void;
  warn(message: string): void;
}

export const consoleLogger: Logger = {
  info: (message) => console.info(message),
  warn: (message) => console.warn(message),
};

export const silentLogger: Logger = {
  info: () => undefined,
  warn: () => undefined,
};

/**
 * Log a warning with a consistent format: [tag] message
 */
export function logWarn(logger: Logger, tag: string, message: string): void {
  logger.warn(`[${tag}] ${message}`);
}

/**
 * Log an informational line with a consistent format: [tag] message
 */
export function logInfo(logger: Logger, tag: string, message: string): void {
  logger.info(`[${tag}] ${message}`);
}
