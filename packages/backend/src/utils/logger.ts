/**
 * Winston-based production logger
 *
 * - structured JSON entries with service/environment metadata
 * - trace id stamped from the active trace context
 * - sensitive keys redacted
 * - daily rotated files when LOG_DIR is set
 */

import path from 'path';

import { Request, Response, NextFunction } from 'express';
import winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';

import '../types/express-augmentation';

import { getTraceContext } from './traceContext';

const { combine, timestamp, errors, json, printf, colorize } = winston.format;

/**
 * Log context
 */
export interface LogContext {
  [key: string]: unknown;
  traceId?: string;
  userId?: string;
  operation?: string;
  duration?: number;
}

export interface LoggerOptions {
  service: string;
  environment: string;
  level: string;
  logDir?: string;
}

const SENSITIVE_KEYS = ['password', 'token', 'secret', 'apikey'];

/**
 * Stamp trace id and user id from the active trace context
 */
export const traceFormat = winston.format((info) => {
  const context = getTraceContext();
  if (context !== undefined) {
    info['traceId'] = context.traceId;
    if (context.userId !== undefined && info['userId'] === undefined) {
      info['userId'] = context.userId;
    }
  }
  return info;
});

const devFormat = printf(({ level, message, timestamp: time, ...metadata }) => {
  const meta = Object.keys(metadata).length > 0 ? JSON.stringify(metadata) : '';
  return `${String(time)} [${String(level)}] ${String(message)} ${meta}`;
});

/**
 * Redact sensitive keys and expand an `error` value into a plain object
 */
export function sanitizeContext(context?: LogContext): LogContext {
  if (!context) return {};

  const sanitized: LogContext = { ...context };
  Object.keys(sanitized).forEach((key) => {
    if (SENSITIVE_KEYS.some((sensitive) => key.toLowerCase().includes(sensitive))) {
      sanitized[key] = '[REDACTED]';
    }
  });

  const error = sanitized['error'];
  if (error instanceof Error) {
    sanitized['error'] = { name: error.name, message: error.message, stack: error.stack };
  }

  return sanitized;
}

function rotatingFile(logDir: string, name: string, level?: string): DailyRotateFile {
  return new DailyRotateFile({
    level,
    filename: path.join(logDir, `%DATE%-${name}.log`),
    datePattern: 'YYYY-MM-DD',
    maxSize: '20m',
    maxFiles: level === 'error' ? '30d' : '14d',
  });
}

/**
 * Build the underlying winston logger
 */
export function createWinstonLogger(options: LoggerOptions): winston.Logger {
  const consoleTransport = new winston.transports.Console({
    silent: options.environment === 'test',
    format:
      options.environment === 'production'
        ? json()
        : combine(colorize(), timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }), devFormat),
  });

  const fileTransports =
    options.logDir !== undefined && options.logDir !== ''
      ? [rotatingFile(options.logDir, 'app'), rotatingFile(options.logDir, 'error', 'error')]
      : [];

  return winston.createLogger({
    level: options.level,
    format: combine(traceFormat(), timestamp(), errors({ stack: true }), json()),
    defaultMeta: {
      service: options.service,
      environment: options.environment,
    },
    transports: [consoleTransport, ...fileTransports],
  });
}

/**
 * Logger interface
 */
export interface Logger {
  info(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  debug(message: string, context?: LogContext): void;
  http(message: string, context?: LogContext): void;
}

/**
 * Winston logger wrapper
 */
export class WinstonLogger implements Logger {
  constructor(private readonly winstonLogger: winston.Logger) {}

  info(message: string, context?: LogContext): void {
    this.winstonLogger.info(message, sanitizeContext(context));
  }

  error(message: string, context?: LogContext): void {
    this.winstonLogger.error(message, sanitizeContext(context));
  }

  warn(message: string, context?: LogContext): void {
    this.winstonLogger.warn(message, sanitizeContext(context));
  }

  debug(message: string, context?: LogContext): void {
    this.winstonLogger.debug(message, sanitizeContext(context));
  }

  http(message: string, context?: LogContext): void {
    this.winstonLogger.http(message, sanitizeContext(context));
  }

  /**
   * Flush transports; resolves once the underlying stream has finished
   */
  close(): Promise<void> {
    return new Promise((resolve) => {
      this.winstonLogger.on('finish', () => resolve());
      this.winstonLogger.end();
    });
  }
}

function loggerOptionsFromEnv(): LoggerOptions {
  return {
    service: process.env['SERVICE_NAME'] ?? 'auth-gateway',
    environment: process.env['NODE_ENV'] ?? 'development',
    level: process.env['LOG_LEVEL'] ?? 'info',
    logDir: process.env['LOG_DIR'],
  };
}

/**
 * Singleton logger instance
 */
export const logger = new WinstonLogger(createWinstonLogger(loggerOptionsFromEnv()));

/**
 * HTTP access logger for Express
 */
export const httpLogger = (req: Request, res: Response, next: NextFunction): void => {
  const start = Date.now();

  res.on('finish', () => {
    logger.http(`${req.method} ${req.originalUrl}`, {
      method: req.method,
      url: req.originalUrl,
      status: res.statusCode,
      duration: Date.now() - start,
      ip: req.ip,
      userAgent: req.get('user-agent'),
      traceId: req.id,
      userId: req.user?.id,
    });
  });

  next();
};
