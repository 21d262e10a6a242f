/* eslint-disable no-console */

export type Logger = {
  info(message: string): void;
  warn(message: string): void;
  error(message: string, cause?: unknown): void;
};

function describeCause(cause: unknown): string {
  if (cause instanceof Error) return cause.stack ?? cause.message;
  return String(cause);
}

/**
 * Console logger. Progress (`info`) is only printed when verbose; warnings and errors always go
 * to stderr.
 */
export function createConsoleLogger(opts: { verbose: boolean }): Logger {
  return {
    info: (message) => {
      if (opts.verbose) console.log(message);
    },
    warn: (message) => {
      console.warn(message);
    },
    error: (message, cause) => {
      console.error(message);
      if (cause !== undefined && opts.verbose) console.error(describeCause(cause));
    },
  };
}

export const silentLogger: Logger = {
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};

/** Collects messages in memory; handy for asserting on progress output. */
export function createMemoryLogger(): Logger & { lines: string[] } {
  const lines: string[] = [];
  return {
    lines,
    info: (message) => {
      lines.push(`info ${message}`);
    },
    warn: (message) => {
      lines.push(`warn ${message}`);
    },
    error: (message) => {
      lines.push(`error ${message}`);
    },
  };
}
