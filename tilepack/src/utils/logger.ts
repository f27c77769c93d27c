/**
 * Minimal console logger. Every line goes to stdout so the whole run reads
 * as one log; tests pass a capturing logger instead.
 */
export interface Logger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  debug(message: string): void;
}

export function createConsoleLogger(verbose = false): Logger {
  return {
    info: (message) => console.log(message),
    warn: (message) => console.log(`Warning: ${message}`),
    error: (message) => console.log(`Error: ${message}`),
    debug: (message) => {
      if (verbose) console.log(`  ${message}`);
    },
  };
}

export interface CapturedLogger extends Logger {
  lines: string[];
}

/**
 * Logger that records formatted lines in memory.
 */
export function createMemoryLogger(verbose = false): CapturedLogger {
  const lines: string[] = [];
  return {
    lines,
    info: (message) => {
      lines.push(message);
    },
    warn: (message) => {
      lines.push(`Warning: ${message}`);
    },
    error: (message) => {
      lines.push(`Error: ${message}`);
    },
    debug: (message) => {
      if (verbose) lines.push(`  ${message}`);
    },
  };
}
