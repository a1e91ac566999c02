/**
 * Tagged console logging.
 *
 * Output follows the `[TAG] message` convention used across the server and
 * CLI. `debug` lines are only printed when debug output is enabled, either via
 * `IPCD_DEBUG=1` or `setDebug(true)` (the CLI's `--debug` flag).
 */

export interface Logger {
  debug: (message: string, ...details: unknown[]) => void;
  info: (message: string, ...details: unknown[]) => void;
  warn: (message: string, ...details: unknown[]) => void;
  error: (message: string, ...details: unknown[]) => void;
}

let debugOverride: boolean | undefined;

export function setDebug(enabled: boolean): void {
  debugOverride = enabled;
}

export function isDebugEnabled(): boolean {
  return debugOverride ?? process.env.IPCD_DEBUG === '1';
}

/**
 * Create a logger that prefixes every line with `[tag]`. `opts.debug` turns
 * on debug lines for this logger regardless of the global switch.
 */
export function createLogger(tag: string, opts: { debug?: boolean } = {}): Logger {
  const prefix = `[${tag}]`;
  return {
    debug: (message, ...details) => {
      if (!opts.debug && !isDebugEnabled()) return;
      console.log(`[DEBUG] ${prefix} ${message}`, ...details);
    },
    info: (message, ...details) => {
      console.log(`${prefix} ${message}`, ...details);
    },
    warn: (message, ...details) => {
      console.warn(`${prefix} ${message}`, ...details);
    },
    error: (message, ...details) => {
      console.error(`${prefix} ${message}`, ...details);
    },
  };
}

/**
 * Logger that discards everything. Handy for embedding and tests.
 */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};

export function formatError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
