// Transcript Relay - Logging
//
// Console-backed logger. Components take a Logger so tests can pass vi.fn() stubs.

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

const ts = () => new Date().toISOString();

/**
 * Creates a logger that prefixes each line with level, timestamp and scope:
 * `[INFO] [2024-01-01T00:00:00.000Z] [Server] listening`.
 * Debug lines are printed only when LOG_LEVEL=debug.
 */
export function createConsoleLogger(scope: string, debugEnabled = process.env.LOG_LEVEL === "debug"): Logger {
  const prefix = (level: string) => `[${level}] [${ts()}] [${scope}]`;
  return {
    debug: (msg, ...args) => {
      if (debugEnabled) console.debug(`${prefix("DEBUG")} ${msg}`, ...args);
    },
    info: (msg, ...args) => console.log(`${prefix("INFO")} ${msg}`, ...args),
    warn: (msg, ...args) => console.warn(`${prefix("WARN")} ${msg}`, ...args),
    error: (msg, ...args) => console.error(`${prefix("ERROR")} ${msg}`, ...args),
  };
}
