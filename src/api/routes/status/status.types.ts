import type { AppConfig } from '../../../config/app.config.js';
import type { DatabaseExerciseResult } from '../../../dependencies/postgres.dependency.js';
import type { CacheExerciseResult } from '../../../dependencies/redis.dependency.js';
import type { HealthCheckService } from '../../../health/services/health-check.service.js';
import type { MetricsSnapshotService } from '../../../metrics/services/metrics-snapshot.service.js';
import type { ServiceCounters } from '../../../metrics/types/metrics.types.js';
import type { MachineHealthDocument } from '../../../rendering/report.renderer.js';
import type { HostInfo } from '../../../system/host-info.js';

/**
 * On-demand database exercise (the PostgreSQL dependency, or a fake)
 */
export interface DatabaseExercise {
  exercise(): Promise<DatabaseExerciseResult>;
}

/**
 * On-demand cache exercise (the Redis dependency, or a fake)
 */
export interface CacheExercise {
  exercise(key: string, value: string, ttlSeconds: number): Promise<CacheExerciseResult>;
}

/**
 * Collaborators the status routes are built from
 * Everything is owned by the server lifecycle and passed in; nothing is global
 */
export interface StatusRouteDependencies {
  config: Pick<AppConfig, 'environment' | 'version' | 'debug' | 'database' | 'cache'>;
  healthCheck: HealthCheckService;
  metrics: MetricsSnapshotService;
  counters: ServiceCounters;
  database: DatabaseExercise;
  cache: CacheExercise;
  /** Defaults to the live runtime */
  hostInfo?: () => HostInfo;
  /** Key for each /api/test-cache call; defaults to a fresh key per call */
  cacheTestKey?: () => string;
}

/**
 * Seconds a /api/test-cache key lives
 */
export const CACHE_TEST_TTL_SECONDS = 60;

export interface TestDatabaseSuccess {
  status: 'success';
  database_version: string;
  total_requests: number;
  timestamp: string;
}

export interface TestCacheSuccess {
  status: 'success';
  test_key: string;
  test_value: string;
  retrieved_value: string | null;
  redis_version: string;
  memory_usage: string;
  total_keys: number;
  timestamp: string;
}

export interface TestFailure {
  status: 'error';
  message: string;
}

export interface InfoResponse {
  node_version: string;
  pid: number;
  hostname: string;
  environment: string;
  debug: boolean;
  version: string;
  memory_mb: number;
  cpu_count: number;
  platform: string;
  uptime_seconds: number;
}

/**
 * /api/stats body: the health document merged with the metrics snapshot
 */
export interface StatsResponse extends MachineHealthDocument {
  memory_used_bytes: number;
  cpu_count: number;
  request_count: number;
  cache_hit_count: number;
  captured_at: string;
}
