/**
 * Logging
 *
 * The engine writes through the subset of console it uses, so hosts can
 * redirect or silence it. Messages carry a bracketed component prefix.
 */

export interface Logger {
  log(message: string): void;
  warn(message: string): void;
  error(message: string, error?: unknown): void;
}

export const consoleLogger: Logger = {
  log: (message) => console.log(message),
  warn: (message) => console.warn(message),
  error: (message, error) => {
    if (error === undefined) {
      console.error(message);
    } else {
      console.error(message, error);
    }
  },
};

/** Logger that drops everything */
export const silentLogger: Logger = {
  log: () => {},
  warn: () => {},
  error: () => {},
};
