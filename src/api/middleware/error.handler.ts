import type { Request, Response, NextFunction, RequestHandler } from 'express';
import { logger } from '../../logging/logger.service.js';
import { getCorrelationId } from './correlation.middleware.js';

/**
 * API error types for centralized error handling
 */
export enum ApiErrorCode {
  INTERNAL_ERROR = 'INTERNAL_ERROR',
  NOT_FOUND = 'NOT_FOUND',
  RATE_LIMITED = 'RATE_LIMITED'
}

/**
 * Standard API error class
 */
export class ApiError extends Error {
  constructor(
    public readonly code: ApiErrorCode,
    message: string,
    public readonly statusCode: number = 500,
    public readonly retryable: boolean = false,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'ApiError';
  }

  /**
   * Convert error to JSON response format
   */
  toJSON(): Record<string, unknown> {
    return {
      error: {
        code: this.code,
        message: this.message,
        retryable: this.retryable,
        ...(this.details && { details: this.details })
      }
    };
  }

  /**
   * Generic server fault
   * SECURITY: never carries the underlying message
   */
  static internal(): ApiError {
    return new ApiError(
      ApiErrorCode.INTERNAL_ERROR,
      'Internal server error',
      500,
      false
    );
  }

  static notFound(method: string, path: string): ApiError {
    return new ApiError(
      ApiErrorCode.NOT_FOUND,
      `Cannot ${method} ${path}`,
      404,
      false
    );
  }

  static rateLimited(): ApiError {
    return new ApiError(
      ApiErrorCode.RATE_LIMITED,
      'Too many requests. Please try again later.',
      429,
      true
    );
  }
}

/**
 * Wrap an async route handler so rejections reach the Express error handler
 * Express 4 does not forward promise rejections by itself
 */
export function asyncHandler(
  handler: (req: Request, res: Response, next: NextFunction) => Promise<void>
): RequestHandler {
  return (req, res, next) => {
    handler(req, res, next).catch(next);
  };
}

/**
 * Log error with structured format
 */
export function logError(error: Error, context: string, metadata?: Record<string, unknown>): void {
  logger.error(context, error.message, {
    error: {
      name: error.name,
      message: error.message,
      stack: error.stack
    },
    ...(metadata && { metadata })
  });
}

/**
 * 404 handler for unmatched routes
 */
export function notFoundHandler(req: Request, res: Response): void {
  const error = ApiError.notFound(req.method, req.path);
  res.status(error.statusCode).json(error.toJSON());
}

/**
 * Top-level Express error handler
 *
 * ApiError instances are answered as-is. Anything else is a server fault:
 * the details are logged with the correlation id and the client only sees
 * the generic INTERNAL_ERROR body.
 */
export function errorHandler(
  err: unknown,
  req: Request,
  res: Response,
  next: NextFunction
): void {
  if (res.headersSent) {
    next(err);
    return;
  }

  if (err instanceof ApiError) {
    res.status(err.statusCode).json(err.toJSON());
    return;
  }

  const error = err instanceof Error ? err : new Error(String(err));
  logError(error, 'ErrorHandler', {
    correlation_id: getCorrelationId(req),
    method: req.method,
    path: req.path
  });

  const apiError = ApiError.internal();
  res.status(apiError.statusCode).json(apiError.toJSON());
}
