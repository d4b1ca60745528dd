import type { Logger } from './types.js';

export interface ConsoleLoggerOptions {
  /** Drop info messages; warnings and errors are still printed */
  quiet?: boolean;
}

/**
 * Logger on top of `console`: info to stdout, warnings and errors to stderr
 */
export function createConsoleLogger(options: ConsoleLoggerOptions = {}): Logger {
  return {
    info(message: string): void {
      if (!options.quiet) console.log(message);
    },
    warn(message: string): void {
      console.error(`Warning: ${message}`);
    },
    error(message: string): void {
      console.error(message);
    },
  };
}

/**
 * Logger that discards everything
 */
export const silentLogger: Logger = {
  info: () => {},
  warn: () => {},
  error: () => {},
};
