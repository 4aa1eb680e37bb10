import { Request, Response, NextFunction } from 'express';
import { logger } from '../../logging/logger.service.js';
import type { RequestLogEntry } from '../../types/log.types.js';
import { getCorrelationId } from './correlation.middleware.js';

/**
 * Extended Express Request to include timing data
 */
declare global {
  namespace Express {
    interface Request {
      _startTime?: number;
    }
  }
}

/**
 * Build the log entry for a finished request
 *
 * @param duration - Request duration in milliseconds
 */
export function createLogEntry(
  req: Request,
  res: Response,
  duration: number
): RequestLogEntry {
  return {
    correlation_id: getCorrelationId(req),
    method: req.method,
    // path excludes the query string
    path: req.path,
    status_code: res.statusCode,
    duration,
    timestamp: new Date().toISOString(),
    metadata: {
      ip: req.ip,
      user_agent: req.get('user-agent')
    }
  };
}

/**
 * Request logging middleware
 *
 * Records the start time and writes one structured line when the response
 * finishes. Must be applied after correlationMiddleware.
 *
 * SECURITY:
 * - Does not log query parameters
 * - Does not log request or response bodies
 */
export function requestLoggerMiddleware(
  req: Request,
  res: Response,
  next: NextFunction
): void {
  req._startTime = Date.now();

  res.on('finish', () => {
    const duration = req._startTime !== undefined ? Date.now() - req._startTime : 0;
    void logger.logRequest(createLogEntry(req, res, duration));
  });

  next();
}
