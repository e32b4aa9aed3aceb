/** Minimal logging port. The library logs nothing unless one is injected. */
export interface Logger {
  debug(message: string, extra?: object): void;
  info(message: string, extra?: object): void;
  warn(message: string, extra?: object): void;
  error(message: string, extra?: object): void;
}

const noop = (): void => {};

export const silentLogger: Logger = {
  debug: noop,
  info: noop,
  warn: noop,
  error: noop,
};

export const consoleLogger: Logger = {
  debug: (message, extra) => console.debug(message, extra ?? {}),
  info: (message, extra) => console.info(message, extra ?? {}),
  warn: (message, extra) => console.warn(message, extra ?? {}),
  error: (message, extra) => console.error(message, extra ?? {}),
};

/** Prefixes every message with a label, like a child logger. */
export function labelledLogger(logger: Logger, label: string): Logger {
  return {
    debug: (message, extra) => logger.debug(`[${label}] ${message}`, extra),
    info: (message, extra) => logger.info(`[${label}] ${message}`, extra),
    warn: (message, extra) => logger.warn(`[${label}] ${message}`, extra),
    error: (message, extra) => logger.error(`[${label}] ${message}`, extra),
  };
}
