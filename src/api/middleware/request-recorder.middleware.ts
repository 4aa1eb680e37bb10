import type { RequestHandler } from 'express';
import { logger } from '../../logging/logger.service.js';
import { DATABASE_DEPENDENCY_NAME, type RequestRecord } from '../../dependencies/postgres.dependency.js';
import { DEFAULT_DEPENDENCY_TIMEOUT_MS, withTimeout } from '../../dependencies/dependency.timeout.js';
import type { Counter } from '../../metrics/types/metrics.types.js';
import { asyncHandler } from './error.handler.js';

/**
 * Where served requests are written, one row per request
 */
export interface RequestLog {
  recordRequest(record: RequestRecord): Promise<void>;
}

export interface RequestRecorderOptions {
  /** Total-requests counter */
  counter: Counter;
  /** Optional audit table; omitted when there is no database */
  requestLog?: RequestLog;
  /** Longest each write may hold up the request (default: 2000) */
  timeoutMs?: number;
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Count and record every request before it is handled
 *
 * Both writes are awaited so a stats read issued after a response always
 * sees that request counted. Neither can fail the request: a dependency
 * being down or stalled only costs the record, and is logged.
 */
export function createRequestRecorder(options: RequestRecorderOptions): RequestHandler {
  const timeoutMs = options.timeoutMs ?? DEFAULT_DEPENDENCY_TIMEOUT_MS;

  return asyncHandler(async (req, _res, next) => {
    const record: RequestRecord = {
      ip: req.ip ?? 'unknown',
      userAgent: req.get('user-agent') ?? 'Unknown',
      endpoint: req.path
    };

    const writes: Promise<unknown>[] = [
      withTimeout(options.counter.increment(), 'request counter', timeoutMs)
    ];
    if (options.requestLog) {
      writes.push(withTimeout(options.requestLog.recordRequest(record), DATABASE_DEPENDENCY_NAME, timeoutMs));
    }

    const results = await Promise.allSettled(writes);
    for (const result of results) {
      if (result.status === 'rejected') {
        logger.warn('RequestRecorder', 'Failed to record request', {
          correlation_id: req.correlationId,
          endpoint: record.endpoint,
          error: describeError(result.reason)
        });
      }
    }

    next();
  });
}
