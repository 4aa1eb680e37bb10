import { describe, it, expect, beforeEach, afterAll, jest } from '@jest/globals';
import express from 'express';
import request from 'supertest';
import { requestLoggerMiddleware } from '../request-logger.middleware.js';
import { correlationMiddleware } from '../correlation.middleware.js';
import { logger } from '../../../logging/logger.service.js';
import type { LogResult, RequestLogEntry } from '../../../types/log.types.js';

const logged: RequestLogEntry[] = [];
const mockLogRequest = jest.spyOn(logger, 'logRequest').mockImplementation(async (entry): Promise<LogResult> => {
  logged.push(entry);
  return { success: true, timestamp: entry.timestamp };
});

function createTestApp(): express.Express {
  const app = express();
  app.use(correlationMiddleware);
  app.use(requestLoggerMiddleware);
  app.get('/health', (_req, res) => {
    res.json({ status: 'healthy' });
  });
  app.get('/missing', (_req, res) => {
    res.status(404).json({});
  });
  return app;
}

describe('requestLoggerMiddleware', () => {
  beforeEach(() => {
    jest.clearAllMocks();
    logged.length = 0;
  });

  afterAll(() => {
    jest.restoreAllMocks();
  });

  it('should log one entry per finished request', async () => {
    await request(createTestApp())
      .get('/health?verbose=1')
      .set('x-request-id', 'req-log-1')
      .set('User-Agent', 'kube-probe/1.29');

    expect(mockLogRequest).toHaveBeenCalledTimes(1);
    expect(logged[0]).toMatchObject({
      correlation_id: 'req-log-1',
      method: 'GET',
      path: '/health',
      status_code: 200,
      metadata: { user_agent: 'kube-probe/1.29' }
    });
  });

  it('should record the status code actually sent', async () => {
    await request(createTestApp()).get('/missing');

    expect(logged[0].status_code).toBe(404);
  });

  it('should not log the query string', async () => {
    await request(createTestApp()).get('/health?token=test-secret');

    expect(JSON.stringify(logged[0])).not.toContain('test-secret');
  });

  it('should record a non-negative duration and an ISO timestamp', async () => {
    await request(createTestApp()).get('/health');

    expect(logged[0].duration).toBeGreaterThanOrEqual(0);
    expect(new Date(logged[0].timestamp).toISOString()).toBe(logged[0].timestamp);
  });
});
