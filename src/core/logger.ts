/**
 * Structured logger with categories and levels.
 * Filtered by the runtime config's logLevel or a `?log=` query parameter.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LOG_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

let globalLevel: LogLevel = 'info';

export function setLogLevel(level: LogLevel): void {
  globalLevel = level;
}

export function getLogLevel(): LogLevel {
  return globalLevel;
}

/** Map a free-form string onto a level, or null if it names none. */
export function parseLogLevel(value: string | null | undefined): LogLevel | null {
  if (!value) return null;
  const normalized = value.trim().toLowerCase();
  switch (normalized) {
    case 'debug':
    case 'info':
    case 'warn':
    case 'error':
      return normalized;
    case 'warning':
      return 'warn';
    default:
      return null;
  }
}

export type Logger = ReturnType<typeof createLogger>;

export function createLogger(category: string) {
  const prefix = `[${category}]`;

  function shouldLog(level: LogLevel): boolean {
    return LOG_PRIORITY[level] >= LOG_PRIORITY[globalLevel];
  }

  return {
    debug(...args: unknown[]): void {
      if (shouldLog('debug')) console.debug(prefix, ...args);
    },
    info(...args: unknown[]): void {
      if (shouldLog('info')) console.info(prefix, ...args);
    },
    warn(...args: unknown[]): void {
      if (shouldLog('warn')) console.warn(prefix, ...args);
    },
    error(...args: unknown[]): void {
      if (shouldLog('error')) console.error(prefix, ...args);
    },
  };
}
