/**
 * Logger
 * Minimal structured logger injected into transports and dispatch contexts.
 * Compatible with console, pino (via a thin wrapper) and most custom loggers.
 */
export interface Logger {
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
}
