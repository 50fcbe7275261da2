export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export interface LoggerOptions {
  verbose?: boolean;
  /** Prefix shown in brackets, e.g. "[plansmith]" */
  tag?: string;
  /** Suppress info/debug output (used with --json so stdout stays parseable) */
  quiet?: boolean;
}

/** Console logger. info/debug go to stdout, warn/error to stderr. */
export function createLogger(opts: LoggerOptions = {}): Logger {
  const prefix = `[${opts.tag ?? "plansmith"}]`;
  return {
    debug(message) {
      if (opts.verbose && !opts.quiet) console.log(`${prefix} ${message}`);
    },
    info(message) {
      if (!opts.quiet) console.log(`${prefix} ${message}`);
    },
    warn(message) {
      console.warn(`${prefix} ${message}`);
    },
    error(message) {
      console.error(`${prefix} ${message}`);
    },
  };
}

/** Logger that drops everything. */
export const silentLogger: Logger = {
  debug() {},
  info() {},
  warn() {},
  error() {},
};
