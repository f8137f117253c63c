// Logging contract shared by every package

/**
 * Structured logger interface.
 * Implementations can route to console, file, or external services.
 */
export type Logger = {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
};

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
