/**
 * Global error handler middleware
 */

import { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import { AdvisorError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { config } from '../../config/index.js';

const errorLogger = logger.child({ middleware: 'errorHandler' });

/**
 * Errors raised by express itself (body parser, CORS) carry a status code
 */
export interface ApiError extends Error {
  statusCode?: number;
  code?: string;
}

export function errorHandler(
  err: ApiError,
  req: Request,
  res: Response,
  _next: NextFunction
): void {
  const clientError: boolean = err instanceof ZodError || (err instanceof AdvisorError && err.statusCode < 500);

  if (clientError) {
    errorLogger.warn(
      { error: err.message, path: req.path, method: req.method, code: err.code },
      'Rejected request'
    );
  } else {
    errorLogger.error(
      {
        error: err.message,
        stack: err.stack,
        path: req.path,
        method: req.method,
        code: err.code,
      },
      'Request error'
    );
  }

  // Handle Zod validation errors
  if (err instanceof ZodError) {
    res.status(400).json({
      error: 'Validation error',
      code: 'VALIDATION_ERROR',
      details: err.errors.map((e) => ({
        path: e.path.join('.'),
        message: e.message,
      })),
    });
    return;
  }

  // Invalid positions, illegal moves
  if (err instanceof AdvisorError) {
    const hideMessage = config.isProduction && err.statusCode >= 500;
    res.status(err.statusCode).json({
      error: hideMessage ? 'Internal server error' : err.message,
      code: err.code,
      ...(config.isProduction ? {} : { context: err.details }),
    });
    return;
  }

  // Handle known errors with status codes
  if (err.statusCode) {
    res.status(err.statusCode).json({
      error: err.message,
      code: err.code || 'ERROR',
    });
    return;
  }

  // Handle unknown errors
  res.status(500).json({
    error: config.isProduction ? 'Internal server error' : err.message,
    code: 'INTERNAL_ERROR',
    ...(config.isProduction ? {} : { stack: err.stack }),
  });
}
