// Logger implementations

import type { Logger, LogLevel } from '@parley/protocol';

/**
 * Default console logger implementation
 */
export const consoleLogger: Logger = {
  debug(message: string, data?: Record<string, unknown>) {
    console.debug(`[DEBUG] ${message}`, data ?? '');
  },
  info(message: string, data?: Record<string, unknown>) {
    console.info(`[INFO] ${message}`, data ?? '');
  },
  warn(message: string, data?: Record<string, unknown>) {
    console.warn(`[WARN] ${message}`, data ?? '');
  },
  error(message: string, data?: Record<string, unknown>) {
    console.error(`[ERROR] ${message}`, data ?? '');
  },
};

/**
 * Silent logger for testing
 */
export const silentLogger: Logger = {
  debug() {},
  info() {},
  warn() {},
  error() {},
};

/**
 * Create a capturing logger that stores log entries for inspection
 */
export type LogEntry = {
  level: LogLevel;
  message: string;
  data?: Record<string, unknown>;
  timestamp: string;
};

export function createCapturingLogger(): Logger & { entries: LogEntry[] } {
  const entries: LogEntry[] = [];

  const log = (level: LogLevel) => (message: string, data?: Record<string, unknown>) => {
    entries.push({
      level,
      message,
      data,
      timestamp: new Date().toISOString(),
    });
  };

  return {
    entries,
    debug: log('debug'),
    info: log('info'),
    warn: log('warn'),
    error: log('error'),
  };
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

/**
 * Wrap a logger so entries below `minLevel` are dropped.
 */
export function createLevelFilteredLogger(logger: Logger, minLevel: LogLevel): Logger {
  const enabled = (level: LogLevel) => LEVEL_ORDER[level] >= LEVEL_ORDER[minLevel];

  return {
    debug(message, data) {
      if (enabled('debug')) logger.debug(message, data);
    },
    info(message, data) {
      if (enabled('info')) logger.info(message, data);
    },
    warn(message, data) {
      if (enabled('warn')) logger.warn(message, data);
    },
    error(message, data) {
      if (enabled('error')) logger.error(message, data);
    },
  };
}
