export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

const LOG_TAG = "[scp-relay]";

export function createConsoleLogger(tag = LOG_TAG): Logger {
  return {
    debug: (message) => {
      console.debug(`${tag} ${message}`);
    },
    info: (message) => {
      console.info(`${tag} ${message}`);
    },
    warn: (message) => {
      console.warn(`${tag} ${message}`);
    },
    error: (message) => {
      console.error(`${tag} ${message}`);
    }
  };
}

/** Forwards debug output only when tracing is switched on. */
export function withVerbosity(logger: Logger, verbose: boolean): Logger {
  if (verbose) {
    return logger;
  }
  return {
    debug: () => undefined,
    info: (message) => logger.info(message),
    warn: (message) => logger.warn(message),
    error: (message) => logger.error(message)
  };
}
