/**
 * Tagged console logging
 *
 * Output looks like `[VersionStore] Appended introduction v3`. The level is
 * read from MANUSCRIPT_LOG_LEVEL on every call so tests and the CLI can
 * change it at runtime.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

function currentLevel(): LogLevel {
  const raw = (process.env.MANUSCRIPT_LOG_LEVEL || 'info').toLowerCase();
  return isLogLevel(raw) ? raw : 'info';
}

function enabled(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[currentLevel()];
}

export function createLogger(tag: string): Logger {
  const prefix = `[${tag}]`;

  return {
    debug: (message, ...args) => {
      if (enabled('debug')) console.debug(`${prefix} ${message}`, ...args);
    },
    info: (message, ...args) => {
      if (enabled('info')) console.log(`${prefix} ${message}`, ...args);
    },
    warn: (message, ...args) => {
      if (enabled('warn')) console.warn(`${prefix} ${message}`, ...args);
    },
    error: (message, ...args) => {
      if (enabled('error')) console.error(`${prefix} ${message}`, ...args);
    },
  };
}
