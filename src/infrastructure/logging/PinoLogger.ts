import pino from 'pino';
import type { ILogger, LogLevel } from '../../domain/ports/ILogger.js';

export interface PinoLoggerOptions {
  name?: string;
  level?: LogLevel;
  /** Human readable output through pino-pretty */
  pretty?: boolean;
}

function errorFields(error: unknown, data?: Record<string, unknown>): Record<string, unknown> {
  return error instanceof Error ? { err: error, ...data } : { error, ...data };
}

/**
 * ILogger backed by pino
 */
export class PinoLogger implements ILogger {
  private readonly logger: pino.Logger;

  constructor(options: PinoLoggerOptions | pino.Logger = {}) {
    if (isPinoLogger(options)) {
      this.logger = options;
      return;
    }

    const transport = options.pretty
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
      name: options.name ?? 'climate-agent',
      level: options.level ?? 'info',
      ...(transport && { transport }),
    });
  }

  trace(message: string, data?: Record<string, unknown>): void {
    this.logger.trace(data ?? {}, message);
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.logger.debug(data ?? {}, message);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.logger.info(data ?? {}, message);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.logger.warn(data ?? {}, message);
  }

  error(message: string, error?: unknown, data?: Record<string, unknown>): void {
    this.logger.error(errorFields(error, data), message);
  }

  fatal(message: string, error?: unknown, data?: Record<string, unknown>): void {
    this.logger.fatal(errorFields(error, data), message);
  }

  child(bindings: Record<string, unknown>): ILogger {
    return new PinoLogger(this.logger.child(bindings));
  }
}

function isPinoLogger(value: PinoLoggerOptions | pino.Logger): value is pino.Logger {
  return 'child' in value;
}
