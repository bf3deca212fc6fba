type LogFn = (...args: unknown[]) => void;

interface LoggerMethods {
  debug: LogFn;
  info: LogFn;
  warn: LogFn;
  error: LogFn;
}

class Logger implements LoggerMethods {
  public readonly debug: LogFn;
  public readonly info: LogFn;
  public readonly warn: LogFn;
  public readonly error: LogFn;

  constructor(methods: LoggerMethods) {
    this.debug = methods.debug;
    this.info = methods.info;
    this.warn = methods.warn;
    this.error = methods.error;
  }
}

/**
 * Logger that writes to the console.
 * `debug` output is dropped unless `verbose` is set.
 */
function createConsoleLogger(options: { verbose?: boolean } = {}): Logger {
  return new Logger({
    debug: (...args) => {
      if (options.verbose) {
        console.debug(...args);
      }
    },
    info: (...args) => console.info(...args),
    warn: (...args) => console.warn(...args),
    error: (...args) => console.error(...args),
  });
}

export { Logger, createConsoleLogger };
export type { LoggerMethods, LogFn };
