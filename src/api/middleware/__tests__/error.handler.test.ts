/**
 * Error Handler Tests
 *
 * - ApiError serialization and factories
 * - asyncHandler forwarding rejections
 * - Generic 500 for unexpected errors, with nothing internal leaked
 * - 404 body for unmatched routes
 */

import { describe, it, expect, beforeEach, afterAll, jest } from '@jest/globals';
import express from 'express';
import request from 'supertest';
import {
  ApiError,
  ApiErrorCode,
  asyncHandler,
  errorHandler,
  notFoundHandler
} from '../error.handler.js';
import { correlationMiddleware } from '../correlation.middleware.js';
import { logger } from '../../../logging/logger.service.js';

const mockLoggerError = jest.spyOn(logger, 'error').mockImplementation(() => {});

function createTestApp(register: (app: express.Express) => void): express.Express {
  const app = express();
  app.use(correlationMiddleware);
  register(app);
  app.use(notFoundHandler);
  app.use(errorHandler);
  return app;
}

describe('ApiError', () => {
  it('should serialize to the standard error body', () => {
    const error = new ApiError(ApiErrorCode.NOT_FOUND, 'Nothing here', 404, false, { resource: 'report' });

    expect(error.toJSON()).toEqual({
      error: {
        code: 'NOT_FOUND',
        message: 'Nothing here',
        retryable: false,
        details: { resource: 'report' }
      }
    });
  });

  it('should omit details when none are given', () => {
    expect(ApiError.internal().toJSON()).toEqual({
      error: { code: 'INTERNAL_ERROR', message: 'Internal server error', retryable: false }
    });
  });

  it('should build the rate limit error as retryable 429', () => {
    const error = ApiError.rateLimited();

    expect(error.statusCode).toBe(429);
    expect(error.retryable).toBe(true);
    expect(error.code).toBe(ApiErrorCode.RATE_LIMITED);
  });

  it('should be an Error named ApiError', () => {
    const error = ApiError.notFound('GET', '/missing');

    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe('ApiError');
    expect(error.message).toBe('Cannot GET /missing');
  });
});

describe('errorHandler', () => {
  beforeEach(() => {
    jest.clearAllMocks();
  });

  afterAll(() => {
    jest.restoreAllMocks();
  });

  it('should answer an ApiError with its own status and body', async () => {
    const app = createTestApp((a) => {
      a.get('/limited', () => {
        throw ApiError.rateLimited();
      });
    });

    const response = await request(app).get('/limited');

    expect(response.status).toBe(429);
    expect(response.body).toEqual({
      error: {
        code: 'RATE_LIMITED',
        message: 'Too many requests. Please try again later.',
        retryable: true
      }
    });
    expect(mockLoggerError).not.toHaveBeenCalled();
  });

  it('should answer unexpected errors with a generic 500 and log the details', async () => {
    const app = createTestApp((a) => {
      a.get('/boom', () => {
        throw new Error('relation "requests" does not exist');
      });
    });

    const response = await request(app).get('/boom').set('x-request-id', 'req-500');

    expect(response.status).toBe(500);
    expect(response.body).toEqual({
      error: { code: 'INTERNAL_ERROR', message: 'Internal server error', retryable: false }
    });
    expect(response.text).not.toContain('relation');
    expect(mockLoggerError).toHaveBeenCalledWith(
      'ErrorHandler',
      'relation "requests" does not exist',
      expect.objectContaining({
        metadata: { correlation_id: 'req-500', method: 'GET', path: '/boom' }
      })
    );
  });

  it('should handle non-Error throwables', async () => {
    const app = createTestApp((a) => {
      a.get('/string', () => {
        throw 'plain string failure';
      });
    });

    const response = await request(app).get('/string');

    expect(response.status).toBe(500);
    expect(mockLoggerError).toHaveBeenCalledWith('ErrorHandler', 'plain string failure', expect.anything());
  });
});

describe('asyncHandler', () => {
  beforeEach(() => {
    jest.clearAllMocks();
  });

  it('should forward a rejected handler to the error handler', async () => {
    const app = createTestApp((a) => {
      a.get(
        '/async',
        asyncHandler(async () => {
          throw new Error('pool exhausted');
        })
      );
    });

    const response = await request(app).get('/async');

    expect(response.status).toBe(500);
    expect(response.body.error.code).toBe('INTERNAL_ERROR');
  });

  it('should let a resolved handler answer normally', async () => {
    const app = createTestApp((a) => {
      a.get(
        '/ok',
        asyncHandler(async (_req, res) => {
          res.json({ ok: true });
        })
      );
    });

    const response = await request(app).get('/ok');

    expect(response.status).toBe(200);
    expect(response.body).toEqual({ ok: true });
  });
});

describe('notFoundHandler', () => {
  it('should answer unmatched routes with the NOT_FOUND body', async () => {
    const response = await request(createTestApp(() => undefined)).post('/api/unknown');

    expect(response.status).toBe(404);
    expect(response.body).toEqual({
      error: { code: 'NOT_FOUND', message: 'Cannot POST /api/unknown', retryable: false }
    });
  });
});
