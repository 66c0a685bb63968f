import pino from 'pino';
import type { ILogger, LogLevel } from '../../domain/ports/ILogger.js';

export interface PinoLoggerOptions {
  name?: string;
  level?: LogLevel;
  pretty?: boolean;
}

/**
 * Pino-based logger implementation
 */
export class PinoLogger implements ILogger {
  private readonly logger: pino.Logger;

  /** `instance` wraps an existing pino logger, as child() does */
  constructor(options?: PinoLoggerOptions, instance?: pino.Logger) {
    if (instance) {
      this.logger = instance;
      return;
    }

    const transport = options?.pretty
      ? {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'SYS:standard',
            ignore: 'pid,hostname',
          },
        }
      : undefined;

    this.logger = pino({
      name: options?.name ?? 'telescope-bridge',
      level: options?.level ?? 'info',
      ...(transport && { transport }),
    });
  }

  trace(message: string, data?: Record<string, unknown>): void {
    if (data) {
      this.logger.trace(data, message);
    } else {
      this.logger.trace(message);
    }
  }

  debug(message: string, data?: Record<string, unknown>): void {
    if (data) {
      this.logger.debug(data, message);
    } else {
      this.logger.debug(message);
    }
  }

  info(message: string, data?: Record<string, unknown>): void {
    if (data) {
      this.logger.info(data, message);
    } else {
      this.logger.info(message);
    }
  }

  warn(message: string, data?: Record<string, unknown>): void {
    if (data) {
      this.logger.warn(data, message);
    } else {
      this.logger.warn(message);
    }
  }

  error(message: string, error?: Error | unknown, data?: Record<string, unknown>): void {
    const errorData = error instanceof Error
      ? { err: error, ...data }
      : { error, ...data };

    this.logger.error(errorData, message);
  }

  fatal(message: string, error?: Error | unknown, data?: Record<string, unknown>): void {
    const errorData = error instanceof Error
      ? { err: error, ...data }
      : { error, ...data };

    this.logger.fatal(errorData, message);
  }

  child(bindings: Record<string, unknown>): ILogger {
    return new PinoLogger(undefined, this.logger.child(bindings));
  }
}
