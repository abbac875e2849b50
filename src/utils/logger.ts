/**
 * Centralized logging utility with optional Loki shipping
 * Structured winston logging with fallback to stdout
 */

import winston from 'winston';
import LokiTransport from 'winston-loki';
import { LogContext, LogLevel } from '../types/logging';

const LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'debug', 'verbose'];

const resolveLevel = (value: string | undefined): LogLevel => {
  const match = LOG_LEVELS.find(level => level === value);
  return match ?? 'info';
};

export interface ScopedLogger {
  info(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext & { error?: Error | string }): void;
  warn(message: string, context?: LogContext): void;
  debug(message: string, context?: LogContext): void;
  verbose(message: string, context?: LogContext): void;
}

class Logger implements ScopedLogger {
  private logger: winston.Logger;

  private consoleFormat = (info: winston.Logform.TransformableInfo): string => {
    const { timestamp, level, message, entityType, operation, ...meta } = info;
    const scope = [entityType, operation].filter(part => typeof part === 'string').join('.');
    const prefix = scope ? `[${scope}]` : '';
    const metaStr = Object.keys(meta).length > 0 ? JSON.stringify(meta) : '';
    return `${String(timestamp)} ${level}: ${prefix} ${String(message)} ${metaStr}`;
  };

  constructor() {
    const transports: winston.transport[] = [
      new winston.transports.Console({
        silent: process.env.NODE_ENV === 'test' && !process.env.LOG_LEVEL,
        format: winston.format.combine(
          winston.format.colorize(),
          winston.format.timestamp(),
          winston.format.printf(this.consoleFormat)
        ),
      }),
    ];

    if (process.env.LOKI_HOST) {
      transports.push(
        new LokiTransport({
          host: process.env.LOKI_HOST,
          labels: {
            service: 'pg-docstore',
            environment: process.env.NODE_ENV || 'development',
          },
          json: true,
          format: winston.format.json(),
          replaceTimestamp: true,
          onConnectionError: err => {
            let fallbackMessage = 'Loki connection error, falling back to console';
            if (err instanceof Error) {
              fallbackMessage += `: ${err.message}`;
            }
            console.error(fallbackMessage);
          },
        })
      );
    }

    if (process.env.NODE_ENV === 'development') {
      transports.push(
        new winston.transports.File({
          filename: 'logs/error.log',
          level: 'error',
          format: winston.format.json(),
        }),
        new winston.transports.File({
          filename: 'logs/combined.log',
          format: winston.format.json(),
        })
      );
    }

    this.logger = winston.createLogger({
      level: resolveLevel(process.env.LOG_LEVEL),
      format: winston.format.combine(
        winston.format.timestamp(),
        winston.format.errors({ stack: true }),
        winston.format.json()
      ),
      defaultMeta: {
        service: 'pg-docstore',
        version: process.env.npm_package_version || '1.0.0',
        environment: process.env.NODE_ENV || 'development',
      },
      transports,
    });
  }

  public info(message: string, context?: LogContext): void {
    this.logger.info(message, context);
  }

  public error(message: string, context?: LogContext & { error?: Error | string }): void {
    this.logger.error(message, context);
  }

  public warn(message: string, context?: LogContext): void {
    this.logger.warn(message, context);
  }

  public debug(message: string, context?: LogContext): void {
    this.logger.debug(message, context);
  }

  public verbose(message: string, context?: LogContext): void {
    this.logger.verbose(message, context);
  }

  public setLevel(level: LogLevel): void {
    this.logger.level = level;
  }

  // Logger bound to an entity type / operation
  public withContext(scope: LogContext): ScopedLogger {
    return {
      info: (message, context) => this.info(message, { ...scope, ...context }),
      error: (message, context) => this.error(message, { ...scope, ...context }),
      warn: (message, context) => this.warn(message, { ...scope, ...context }),
      debug: (message, context) => this.debug(message, { ...scope, ...context }),
      verbose: (message, context) => this.verbose(message, { ...scope, ...context }),
    };
  }
}

export const logger = new Logger();
export default logger;
