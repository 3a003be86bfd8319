import { Request, Response, NextFunction } from 'express';
import { logger } from './logging.js';
import { ApplicationError } from '../errors/index.js';

interface ErrorResponseBody {
  error: {
    message: string;
    status: number;
    code?: string;
    stack?: string;
  };
}

/**
 * Unified error handler for ApplicationError
 * Provides consistent error responses with rich logging context
 */
export const errorHandler = (
  error: Error,
  req: Request,
  res: Response,
  next: NextFunction
): void => {
  const request = {
    method: req.method,
    url: req.url,
    ip: req.ip,
    userAgent: req.get('User-Agent'),
  };

  // An SSE stream or file transfer already committed its status line
  if (res.headersSent) {
    logger.error('Error after response started', { error: error.message, request });
    next(error);
    return;
  }

  let statusCode = 500;
  let message = 'Internal server error';
  let errorCode: string | undefined;

  if (error instanceof ApplicationError) {
    statusCode = error.statusCode;
    message = error.isOperational ? error.message : message;
    errorCode = error.code;

    // Client mistakes are routine; only server-side failures are errors
    const level = statusCode >= 500 ? 'error' : 'warn';
    logger.log(level, 'Request error', { error: error.toJSON(), request });
  } else {
    logger.error('Request error (generic)', {
      error: {
        name: error.name,
        message: error.message,
        stack: error.stack,
      },
      request,
    });
  }

  const body: ErrorResponseBody = {
    error: {
      message,
      status: statusCode,
      ...(errorCode && { code: errorCode }),
    },
  };

  if (process.env.NODE_ENV === 'development' && error.stack) {
    body.error.stack = error.stack;
  }

  res.status(statusCode).json(body);
};

export const notFoundHandler = (req: Request, res: Response): void => {
  res.status(404).json({
    error: {
      message: `Route ${req.method} ${req.url} not found`,
      status: 404,
    },
  });
};
