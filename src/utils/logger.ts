/**
 * Component-tagged logger.
 *
 * Everything goes to stderr so that stdout stays free for the MCP stdio
 * transport. Debug lines are only printed when the component was created
 * with `debug` enabled.
 */
export interface Logger {
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
}

export function createLogger(component: string, debug = false): Logger {
  const tag = `[${component}]`;

  return {
    debug(message, ...details) {
      if (debug) {
        console.error(`[DEBUG] ${tag} ${message}`, ...details);
      }
    },
    info(message, ...details) {
      console.error(`${tag} ${message}`, ...details);
    },
    warn(message, ...details) {
      console.error(`${tag} ⚠️ ${message}`, ...details);
    },
    error(message, ...details) {
      console.error(`${tag} ✗ ${message}`, ...details);
    },
  };
}

/**
 * Logger that drops everything, used by tests and by components created
 * without a logger.
 */
export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};
