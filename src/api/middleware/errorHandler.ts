/**
 * Global error handler middleware
 */

import { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import { logger } from '../../utils/logger.js';
import { config } from '../../config/index.js';
import { formatValidationErrors } from '../../utils/validation.js';

const errorLogger = logger.child({ middleware: 'errorHandler' });

/**
 * Errors carrying an HTTP status, such as body-parser's malformed JSON errors
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

  if (err instanceof ZodError) {
    res.status(400).json({
      error: 'Validation error',
      details: formatValidationErrors(err),
    });
    return;
  }

  if (err.statusCode && err.statusCode < 500) {
    res.status(err.statusCode).json({ error: err.message });
    return;
  }

  res.status(err.statusCode ?? 500).json({
    error: config.isProduction ? 'Internal server error' : err.message,
  });
}
