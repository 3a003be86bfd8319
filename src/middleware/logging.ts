import { Request, Response, NextFunction } from 'express';
import morgan from 'morgan';
import winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import type { LoggingConfig } from '../config/types.js';

// Console-only until initializeLogger() applies the configured transports.
// Jest runs set NODE_ENV=test, which keeps the default logger quiet.
export const logger = winston.createLogger({
  level: 'info',
  silent: process.env.NODE_ENV === 'test',
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    winston.format.json()
  ),
  transports: [
    new winston.transports.Console({
      format: winston.format.combine(
        winston.format.colorize({ all: true }),
        winston.format.simple()
      ),
    }),
  ],
});

let isInitialized = false;

/**
 * Apply the logging section of the app configuration.
 * Safe to call more than once; only the first call takes effect.
 */
export function initializeLogger(config: LoggingConfig): void {
  if (isInitialized) {
    return;
  }

  logger.level = config.level;
  logger.clear();

  if (config.file.enabled) {
    logger.add(
      new DailyRotateFile({
        filename: `${config.file.path}/error-%DATE%.log`,
        datePattern: 'YYYY-MM-DD',
        level: 'error',
        maxSize: config.file.maxSize,
        maxFiles: `${config.file.maxFiles}d`,
        zippedArchive: true,
        auditFile: `${config.file.path}/.audit-error.json`,
      })
    );

    logger.add(
      new DailyRotateFile({
        filename: `${config.file.path}/app-%DATE%.log`,
        datePattern: 'YYYY-MM-DD',
        maxSize: config.file.maxSize,
        maxFiles: `${config.file.maxFiles}d`,
        zippedArchive: true,
        auditFile: `${config.file.path}/.audit-app.json`,
      })
    );
  }

  if (config.console.enabled) {
    logger.add(
      new winston.transports.Console({
        format: winston.format.combine(
          winston.format.colorize({ all: config.console.colorize }),
          winston.format.simple()
        ),
      })
    );
  }

  isInitialized = true;
  logger.info('Logger initialized with configuration', { level: config.level });
}

/**
 * Child logger tagging every entry with the emitting service
 */
export function createServiceLogger(service: string): winston.Logger {
  return logger.child({ service });
}

// Morgan middleware for HTTP request logging. SSE progress streams stay open
// for the whole download, so they are logged when the response finishes.
export const requestLoggingMiddleware = morgan('combined', {
  stream: {
    write: (message: string) => {
      logger.info(message.trim());
    },
  },
});

export const errorLoggingMiddleware = (
  error: Error,
  req: Request,
  _res: Response,
  next: NextFunction
): void => {
  logger.error({
    message: error.message,
    stack: error.stack,
    url: req.url,
    method: req.method,
    ip: req.ip,
    userAgent: req.get('User-Agent'),
  });

  next(error);
};
