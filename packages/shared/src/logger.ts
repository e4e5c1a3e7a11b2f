export interface Logger {
  log(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export function createPrefixedLogger(prefix: string, sink: Logger): Logger {
  return {
    log: (m) => sink.log(`[${prefix}] ${m}`),
    info: (m) => sink.info(`[${prefix}] ${m}`),
    warn: (m) => sink.warn(`[${prefix}] ${m}`),
    error: (m) => sink.error(`[${prefix}] ${m}`),
  };
}

export const NOOP_LOGGER: Logger = {
  log: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
