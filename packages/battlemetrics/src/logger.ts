import type { Logger } from "./types.js";

/**
 * Console-backed logger. Lines look like `[tag] message`.
 */
export function createConsoleLogger(tag: string): Logger {
  return {
    warn(message: string): void {
      console.warn(`[${tag}] ${message}`);
    },
    debug(message: string): void {
      if (process.env.SESSIONLINK_DEBUG) {
        console.debug(`[${tag}] ${message}`);
      }
    },
  };
}
