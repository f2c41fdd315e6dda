/**
 * Injectable logger.
 * Defaults to the console for warnings and errors; debug output is dropped
 * unless a logger that handles it is installed with setLogger().
 */

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

const consoleLogger: Logger = {
  debug: () => {},
  warn: (message, ...args) => console.warn(`[graytone] ${message}`, ...args),
  error: (message, ...args) => console.error(`[graytone] ${message}`, ...args),
};

let impl: Logger = consoleLogger;

export function setLogger(logger: Logger | null): void {
  impl = logger ?? consoleLogger;
}

export function getLogger(): Logger {
  return impl;
}
