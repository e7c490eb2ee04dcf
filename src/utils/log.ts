/**
 * Console logging with an env-gated debug channel.
 * Everything goes to stderr so stdout carries only command output (text or JSON).
 */

const DEBUG = process.env.TXCAT_DEBUG === "1";

export const log = {
  info(message: string, ...args: unknown[]): void {
    console.error(`[txcat] ${message}`, ...args);
  },

  warn(message: string, ...args: unknown[]): void {
    console.warn(`[txcat] WARN ${message}`, ...args);
  },

  error(message: string, ...args: unknown[]): void {
    console.error(`[txcat] ERROR ${message}`, ...args);
  },

  debug(message: string, ...args: unknown[]): void {
    if (DEBUG) {
      console.error(`[txcat DEBUG] ${message}`, ...args);
    }
  },
};
