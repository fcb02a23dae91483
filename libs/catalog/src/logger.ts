/**
 * Logger seam for catalog and CLI code.
 * Library code never writes to the console itself; callers pass a logger in.
 */

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export const noopLogger: Logger = {
  debug() { /* no-op */ },
  info() { /* no-op */ },
  warn() { /* no-op */ },
  error() { /* no-op */ },
};

/**
 * Console logger writing to stderr, so stdout stays clean for definitions.
 * Debug lines are dropped unless `verbose` is set.
 */
export function createConsoleLogger(options: { verbose?: boolean; prefix?: string } = {}): Logger {
  const prefix = options.prefix ?? '[ntdocs]';
  return {
    debug(message) {
      if (options.verbose) console.error(`${prefix} ${message}`);
    },
    info(message) {
      console.error(`${prefix} ${message}`);
    },
    warn(message) {
      console.warn(`${prefix} warning: ${message}`);
    },
    error(message) {
      console.error(`${prefix} error: ${message}`);
    },
  };
}
