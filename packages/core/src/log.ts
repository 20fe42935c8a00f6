/**
 * Scoped stderr logging.
 * Servers talk MCP over stdout, so every diagnostic line goes to stderr
 * with a `[scope]` prefix.
 */

export interface Logger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string, cause?: unknown): void;
}

export function createLogger(scope: string): Logger {
  const prefix = `[${scope}]`;
  return {
    info: (message) => console.error(`${prefix} ${message}`),
    warn: (message) => console.error(`${prefix} Warning: ${message}`),
    error: (message, cause) => {
      if (cause === undefined) {
        console.error(`${prefix} ${message}`);
      } else {
        console.error(`${prefix} ${message}`, cause);
      }
    },
  };
}

/** Logger that drops everything; handy in tests. */
export const silentLogger: Logger = {
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};
