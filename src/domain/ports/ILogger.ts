export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal';

/**
 * Structured logger port. Components never import pino directly; they receive
 * an ILogger (usually a child bound to `{ component }`) through their constructor.
 */
export interface ILogger {
  trace(message: string, data?: Record<string, unknown>): void;
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;

  /**
   * `error` may be an Error (serialized under `err`) or any value
   * (serialized under `error`).
   */
  error(message: string, error?: Error | unknown, data?: Record<string, unknown>): void;
  fatal(message: string, error?: Error | unknown, data?: Record<string, unknown>): void;

  /**
   * Create a child logger with additional context
   */
  child(bindings: Record<string, unknown>): ILogger;
}
