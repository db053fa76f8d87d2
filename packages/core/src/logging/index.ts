export interface Logger {
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
}

/**
 * Console-backed logger. Everything goes to stderr so stdout stays free for
 * output; debug lines are dropped unless `debug` is set.
 */
export const createConsoleLogger = (options: { debug?: boolean } = {}): Logger => ({
  debug: (message, ...details) => {
    if (options.debug) console.error(`[debug] ${message}`, ...details);
  },
  info: (message, ...details) => console.error(message, ...details),
  warn: (message, ...details) => console.warn(message, ...details),
  error: (message, ...details) => console.error(message, ...details),
});

export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
