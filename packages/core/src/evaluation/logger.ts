const ANSI_YELLOW = '\u001b[33m';
const ANSI_RESET = '\u001b[0m';

export interface Logger {
  info(message: string): void;
  warn(message: string): void;
  debug(message: string): void;
}

export interface ConsoleLoggerOptions {
  /** Print debug lines (default: false) */
  readonly verbose?: boolean;
}

export function createConsoleLogger(options: ConsoleLoggerOptions = {}): Logger {
  const verbose = options.verbose ?? false;
  return {
    info: (message) => console.log(message),
    warn: (message) => console.warn(`${ANSI_YELLOW}Warning: ${message}${ANSI_RESET}`),
    debug: (message) => {
      if (verbose) {
        console.log(message);
      }
    },
  };
}

export const silentLogger: Logger = {
  info: () => {},
  warn: () => {},
  debug: () => {},
};

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
