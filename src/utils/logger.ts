const originalConsole = {
  log: console.log.bind(console),
  warn: console.warn.bind(console),
  error: console.error.bind(console),
};

let isVerbose = false;

export function setVerboseMode(verbose: boolean): void {
  isVerbose = verbose;
}

function logWith(method: "log" | "warn" | "error", args: unknown[]): void {
  originalConsole[method](...args);
}

export type Logger = {
  debug(...args: unknown[]): void;
  info(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
};

export const logger: Logger = {
  debug(...args: unknown[]): void {
    if (!isVerbose) {
      return;
    }
    logWith("log", args);
  },
  info(...args: unknown[]): void {
    logWith("log", args);
  },
  warn(...args: unknown[]): void {
    logWith("warn", args);
  },
  error(...args: unknown[]): void {
    logWith("error", args);
  },
};

/**
 * Logger that prefixes every line with `[tag]`, e.g. the worker id.
 */
export function createTaggedLogger(tag: string): Logger {
  const prefix = `[${tag}]`;
  return {
    debug: (...args) => logger.debug(prefix, ...args),
    info: (...args) => logger.info(prefix, ...args),
    warn: (...args) => logger.warn(prefix, ...args),
    error: (...args) => logger.error(prefix, ...args),
  };
}
