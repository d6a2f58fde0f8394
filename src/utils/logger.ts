/**
 * Minimal diagnostics sink. Nothing in the library writes to the console
 * directly; callers inject a Logger where they want output.
 */
export interface Logger {
  debug(message: string): void;
  info(message: string): void;
}

const noop = (): void => {};

/** Default logger: discards everything. */
export const silentLogger: Logger = {
  debug: noop,
  info: noop,
};

/* eslint-disable no-console */
export const consoleLogger: Logger = {
  debug: (message) => console.debug(message),
  info: (message) => console.info(message),
};
/* eslint-enable no-console */
