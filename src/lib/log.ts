import { env, type LogLevel } from '../config/env';

const severity: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export interface Logger {
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
}

/**
 * Console logger that prefixes every line with `[scope]` and drops anything
 * below the configured level. Callers must never pass presigned URLs or tokens.
 */
export function createLogger(scope: string, level: LogLevel = env.LOG_LEVEL): Logger {
  const threshold = severity[level];
  const prefix = `[${scope}]`;

  return {
    debug(message, ...details) {
      if (threshold <= severity.debug) console.debug(prefix, message, ...details);
    },
    info(message, ...details) {
      if (threshold <= severity.info) console.info(prefix, message, ...details);
    },
    warn(message, ...details) {
      if (threshold <= severity.warn) console.warn(prefix, message, ...details);
    },
    error(message, ...details) {
      if (threshold <= severity.error) console.error(prefix, message, ...details);
    },
  };
}
