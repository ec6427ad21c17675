export interface SpotlightLogger {
  debug: (message: string, ...details: unknown[]) => void;
  warn: (message: string, ...details: unknown[]) => void;
  error: (message: string, ...details: unknown[]) => void;
}

/**
 * Console-backed logger that prefixes every line with `[Spotlight:<tag>]`.
 * Debug output is dropped unless `verbose` is set.
 */
export function createConsoleLogger(tag: string, verbose = false): SpotlightLogger {
  const prefix = `[Spotlight:${tag}]`;
  return {
    debug: (message, ...details) => {
      if (verbose) console.debug(`${prefix} ${message}`, ...details);
    },
    warn: (message, ...details) => console.warn(`${prefix} ${message}`, ...details),
    error: (message, ...details) => console.error(`${prefix} ${message}`, ...details),
  };
}
