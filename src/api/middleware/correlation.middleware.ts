import { Request, Response, NextFunction } from 'express';
import { v4 as uuidv4 } from 'uuid';

/**
 * Extend Express Request to include correlation ID
 */
declare global {
  namespace Express {
    interface Request {
      correlationId?: string;
    }
  }
}

/**
 * Correlation ID header name
 */
export const CORRELATION_HEADER = 'x-request-id';

/**
 * Longest inbound id we accept; anything longer is replaced
 */
const MAX_CORRELATION_ID_LENGTH = 128;

/**
 * Extract correlation ID from request headers
 * Returns the existing correlation ID if present and usable, null otherwise
 */
function extractCorrelationId(req: Request): string | null {
  const headerValue = req.headers[CORRELATION_HEADER];
  const candidate = Array.isArray(headerValue) ? headerValue[0] : headerValue;

  if (typeof candidate !== 'string') {
    return null;
  }

  const trimmed = candidate.trim();
  if (trimmed.length === 0 || trimmed.length > MAX_CORRELATION_ID_LENGTH) {
    return null;
  }

  return trimmed;
}

/**
 * Middleware to manage correlation IDs for request tracking
 *
 * Reuses an inbound x-request-id (e.g. set by the nginx proxy in front of the
 * app) or generates a UUID v4, stores it on the request and echoes it on the
 * response.
 */
export function correlationMiddleware(
  req: Request,
  res: Response,
  next: NextFunction
): void {
  const correlationId = extractCorrelationId(req) ?? uuidv4();

  req.correlationId = correlationId;
  req.headers[CORRELATION_HEADER] = correlationId;
  res.setHeader(CORRELATION_HEADER, correlationId);

  next();
}

/**
 * Returns the correlation ID or 'unknown' if not set
 */
export function getCorrelationId(req: Request): string {
  return req.correlationId ?? 'unknown';
}
