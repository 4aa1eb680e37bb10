/**
 * Status Controller
 *
 * Handlers for the dashboard, the health document, runtime info, the
 * on-demand dependency exercises and the polling stats endpoint.
 *
 * Dependency failures never turn into HTTP errors here: the health and stats
 * documents report them as data, and the exercise endpoints answer with a
 * `status: "error"` body. Only unexpected faults reach the error handler.
 */

import type { Request, Response } from 'express';
import { v4 as uuidv4 } from 'uuid';
import { logger } from '../../../logging/logger.service.js';
import { toDependencyError } from '../../../dependencies/dependency.errors.js';
import { withTimeout } from '../../../dependencies/dependency.timeout.js';
import { DATABASE_DEPENDENCY_NAME } from '../../../dependencies/postgres.dependency.js';
import { CACHE_DEPENDENCY_NAME } from '../../../dependencies/redis.dependency.js';
import { renderDashboardPage } from '../../../rendering/dashboard.page.js';
import { toMegabytes } from '../../../rendering/html.helpers.js';
import { toMachineDocument } from '../../../rendering/report.renderer.js';
import { collectHostInfo } from '../../../system/host-info.js';
import {
  CACHE_TEST_TTL_SECONDS,
  type InfoResponse,
  type StatsResponse,
  type StatusRouteDependencies,
  type TestCacheSuccess,
  type TestDatabaseSuccess,
  type TestFailure
} from './status.types.js';

/**
 * A new key on every call, so a read always returns this call's write
 */
export function freshCacheTestKey(): string {
  return `test:${Date.now()}:${uuidv4()}`;
}

export interface StatusController {
  dashboard(req: Request, res: Response): Promise<void>;
  health(req: Request, res: Response): Promise<void>;
  info(req: Request, res: Response): Promise<void>;
  testDatabase(req: Request, res: Response): Promise<void>;
  testCache(req: Request, res: Response): Promise<void>;
  stats(req: Request, res: Response): Promise<void>;
}

export function createStatusController(deps: StatusRouteDependencies): StatusController {
  const hostInfo = deps.hostInfo ?? collectHostInfo;
  const cacheTestKey = deps.cacheTestKey ?? freshCacheTestKey;
  // Direct dependency calls share the probe bound
  const { timeoutMs } = deps.healthCheck.getConfig();

  /**
   * GET /
   *
   * Every view bumps the cache-hit counter, whether or not anything was
   * served from the cache. The name is historical.
   */
  async function dashboard(req: Request, res: Response): Promise<void> {
    const startTime = Date.now();

    try {
      await withTimeout(deps.counters.cacheHits.increment(), 'cacheHits counter', timeoutMs);
    } catch (error) {
      logger.warn('StatusController', 'Could not increment cache hits', {
        correlation_id: req.correlationId,
        error: error instanceof Error ? error.message : String(error)
      });
    }

    const [report, metrics] = await Promise.all([
      deps.healthCheck.aggregate(),
      deps.metrics.snapshot()
    ]);

    const html = renderDashboardPage({
      report,
      metrics,
      host: hostInfo(),
      environment: deps.config.environment,
      version: deps.config.version,
      databaseHost: deps.config.database.host,
      databaseName: deps.config.database.database,
      cacheHost: deps.config.cache.host,
      responseTimeMs: Date.now() - startTime
    });

    res.status(200).type('html').send(html);
  }

  /**
   * GET /health
   *
   * Always 200: a degraded report still means the web tier is serving.
   */
  async function health(_req: Request, res: Response): Promise<void> {
    const report = await deps.healthCheck.aggregate();
    res.status(200).json(toMachineDocument(report));
  }

  /**
   * GET /info
   */
  async function info(_req: Request, res: Response): Promise<void> {
    const host = hostInfo();
    const metrics = deps.metrics.hostMetrics();

    const body: InfoResponse = {
      node_version: host.nodeVersion,
      pid: host.pid,
      hostname: host.hostname,
      environment: deps.config.environment,
      debug: deps.config.debug,
      version: deps.config.version,
      memory_mb: toMegabytes(metrics.memoryUsedBytes),
      cpu_count: metrics.cpuCount,
      platform: host.platform,
      uptime_seconds: host.uptimeSeconds
    };

    res.json(body);
  }

  /**
   * GET /api/test-db
   */
  async function testDatabase(req: Request, res: Response): Promise<void> {
    try {
      const result = await withTimeout(deps.database.exercise(), DATABASE_DEPENDENCY_NAME, timeoutMs);
      const body: TestDatabaseSuccess = {
        status: 'success',
        database_version: result.databaseVersion,
        total_requests: result.totalRequests,
        timestamp: new Date().toISOString()
      };
      res.json(body);
    } catch (error) {
      const failure = toDependencyError(DATABASE_DEPENDENCY_NAME, error);
      logger.warn('StatusController', 'Database exercise failed', {
        correlation_id: req.correlationId,
        kind: failure.kind,
        error: failure.message
      });
      const body: TestFailure = { status: 'error', message: failure.message };
      res.json(body);
    }
  }

  /**
   * GET /api/test-cache
   */
  async function testCache(req: Request, res: Response): Promise<void> {
    const testKey = cacheTestKey();
    const testValue = `Hello from Redis at ${new Date().toISOString()}`;

    try {
      const result = await withTimeout(
        deps.cache.exercise(testKey, testValue, CACHE_TEST_TTL_SECONDS),
        CACHE_DEPENDENCY_NAME,
        timeoutMs
      );
      const body: TestCacheSuccess = {
        status: 'success',
        test_key: testKey,
        test_value: testValue,
        retrieved_value: result.retrievedValue,
        redis_version: result.redisVersion,
        memory_usage: result.memoryUsage,
        total_keys: result.totalKeys,
        timestamp: new Date().toISOString()
      };
      res.json(body);
    } catch (error) {
      const failure = toDependencyError(CACHE_DEPENDENCY_NAME, error);
      logger.warn('StatusController', 'Cache exercise failed', {
        correlation_id: req.correlationId,
        kind: failure.kind,
        error: failure.message
      });
      const body: TestFailure = { status: 'error', message: failure.message };
      res.json(body);
    }
  }

  /**
   * GET /api/stats
   */
  async function stats(_req: Request, res: Response): Promise<void> {
    const [report, metrics] = await Promise.all([
      deps.healthCheck.aggregate(),
      deps.metrics.snapshot()
    ]);

    const body: StatsResponse = {
      ...toMachineDocument(report),
      memory_used_bytes: metrics.memoryUsedBytes,
      cpu_count: metrics.cpuCount,
      request_count: metrics.requestCount,
      cache_hit_count: metrics.cacheHitCount,
      captured_at: metrics.capturedAt.toISOString()
    };

    res.json(body);
  }

  return { dashboard, health, info, testDatabase, testCache, stats };
}
