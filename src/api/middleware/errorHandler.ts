import type { Request, Response, NextFunction, RequestHandler } from 'express';
import { logger } from '../../utils/logger.js';

/**
 * Base class for errors that map onto an HTTP status
 */
export class ApiError extends Error {
  constructor(
    message: string,
    public readonly statusCode: number = 500,
    public readonly code: string = 'INTERNAL_ERROR',
    public readonly details?: unknown
  ) {
    super(message);
    this.name = 'ApiError';
  }
}

export class ValidationError extends ApiError {
  constructor(message: string, details?: unknown) {
    super(message, 400, 'VALIDATION_ERROR', details);
    this.name = 'ValidationError';
  }
}

export class UnauthorizedError extends ApiError {
  constructor(message: string = 'Unauthorized') {
    super(message, 401, 'UNAUTHORIZED');
    this.name = 'UnauthorizedError';
  }
}

/**
 * Async handler wrapper for error handling
 */
export function asyncHandler(
  fn: (req: Request, res: Response, next: NextFunction) => Promise<void>
): RequestHandler {
  return (req, res, next) => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };
}

function isBodyParseError(error: unknown): boolean {
  return error instanceof SyntaxError && 'body' in error;
}

/**
 * Error handling middleware; must be registered after the routes
 */
export function errorHandler(error: unknown, req: Request, res: Response, next: NextFunction): void {
  if (res.headersSent) {
    next(error);
    return;
  }

  if (error instanceof ApiError) {
    if (error.statusCode >= 500) {
      logger.error(`API error on ${req.method} ${req.originalUrl}`, error);
    } else {
      logger.debug(`API ${error.statusCode} on ${req.method} ${req.originalUrl}: ${error.message}`);
    }

    res.status(error.statusCode).json({
      error: {
        code: error.code,
        message: error.message,
        ...(error.details !== undefined ? { details: error.details } : {}),
      },
    });
    return;
  }

  if (isBodyParseError(error)) {
    res.status(400).json({
      error: { code: 'INVALID_JSON', message: 'Request body is not valid JSON' },
    });
    return;
  }

  logger.error(`Unhandled error on ${req.method} ${req.originalUrl}`, error);
  res.status(500).json({
    error: { code: 'INTERNAL_ERROR', message: 'Internal server error' },
  });
}

/**
 * 404 handler for unmatched routes
 */
export function notFoundHandler(availableEndpoints: readonly string[]): RequestHandler {
  return (req, res) => {
    res.status(404).json({
      error: {
        code: 'NOT_FOUND',
        message: `Route ${req.method} ${req.originalUrl} not found`,
      },
      availableEndpoints,
    });
  };
}
