/**
 * Console logging for the optimizer.
 *
 * Debug output is enabled by setting the TGOPT_DEBUG environment variable.
 * When disabled, `debug` is a no-op.
 */

const DEBUG_ENABLED = typeof process !== "undefined" && !!process.env?.TGOPT_DEBUG;

export type Logger = {
  debug(message: string): void;
  warn(message: string): void;
};

export const consoleLogger: Logger = {
  debug(message) {
    if (DEBUG_ENABLED) {
      console.debug(`[tgopt] ${message}`);
    }
  },
  warn(message) {
    console.warn(`[tgopt] ${message}`);
  },
};

export const silentLogger: Logger = {
  debug() {},
  warn() {},
};
