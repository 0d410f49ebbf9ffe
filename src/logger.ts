// ---------- Logger interface ----------

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

export const nullLogger: Logger = {
  debug() {},
  info() {},
  warn() {},
  error() {},
};

export function createConsoleLogger(): Logger {
  return {
    debug: (...args: unknown[]) => console.debug("[tef-memory]", ...args),
    info: (...args: unknown[]) => console.info("[tef-memory]", ...args),
    warn: (...args: unknown[]) => console.warn("[tef-memory]", ...args),
    error: (...args: unknown[]) => console.error("[tef-memory]", ...args),
  };
}

/** Pick the logger for a set of `{ logger, verbose }` options. */
export function resolveLogger(options: {
  logger?: Logger;
  verbose?: boolean;
}): Logger {
  if (options.logger) {
    return options.logger;
  }
  if (options.verbose) {
    return createConsoleLogger();
  }
  return nullLogger;
}
