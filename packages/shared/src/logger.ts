export interface Logger {
  log(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export const NOOP_LOGGER: Logger = {
  log: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};

/** Console-backed logger; every line is prefixed with `[prefix]`. */
export function createConsoleLogger(prefix = "graphpack"): Logger {
  const tag = `[${prefix}]`;
  return {
    log: (message) => console.log(`${tag} ${message}`),
    info: (message) => console.info(`${tag} ${message}`),
    warn: (message) => console.warn(`${tag} ${message}`),
    error: (message) => console.error(`${tag} ${message}`),
  };
}
