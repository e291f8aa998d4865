/**
 * Structured Logger
 *
 * One JSON line per entry: { level, msg, ts, ...context }
 *
 * - Minimum level is set from config at boot, else `info` in production and `debug` elsewhere
 * - `child()` binds fields (request id, route) onto every entry it writes
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogContext = Record<string, unknown>;

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
  child(bindings: LogContext): Logger;
}

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

let configuredLevel: LogLevel | undefined;

/**
 * Set the minimum level; undefined restores the NODE_ENV default
 */
export function setLogLevel(level: LogLevel | undefined): void {
  configuredLevel = level;
}

function getMinLevel(): LogLevel {
  if (configuredLevel) {
    return configuredLevel;
  }
  return process.env.NODE_ENV === 'production' ? 'info' : 'debug';
}

function shouldLog(level: LogLevel): boolean {
  return LEVEL_PRIORITY[level] >= LEVEL_PRIORITY[getMinLevel()];
}

export function formatEntry(level: LogLevel, message: string, context?: LogContext): string {
  const entry: LogContext = {
    level,
    msg: message,
    ts: new Date().toISOString(),
  };
  if (context) {
    Object.assign(entry, context);
  }
  return JSON.stringify(entry);
}

function createLogger(bindings: LogContext = {}): Logger {
  const merge = (context?: LogContext): LogContext | undefined => {
    if (Object.keys(bindings).length === 0) return context;
    return { ...bindings, ...context };
  };

  return {
    debug(message, context) {
      if (!shouldLog('debug')) return;
      console.debug(formatEntry('debug', message, merge(context)));
    },

    info(message, context) {
      if (!shouldLog('info')) return;
      console.info(formatEntry('info', message, merge(context)));
    },

    warn(message, context) {
      if (!shouldLog('warn')) return;
      console.warn(formatEntry('warn', message, merge(context)));
    },

    error(message, context) {
      if (!shouldLog('error')) return;
      console.error(formatEntry('error', message, merge(context)));
    },

    child(extra) {
      return createLogger({ ...bindings, ...extra });
    },
  };
}

export const logger = createLogger();
