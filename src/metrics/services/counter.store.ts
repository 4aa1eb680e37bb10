import type { CounterBackend } from '../../config/app.config.js';
import type { SqlClient } from '../../dependencies/postgres.dependency.js';
import type { RedisCommands } from '../../dependencies/redis.dependency.js';
import type { Counter, ServiceCounters } from '../types/metrics.types.js';

/**
 * Process-local counter
 * The event loop runs `increment` as one uninterrupted step, so no lock is needed
 */
export class InMemoryCounter implements Counter {
  private value: number;

  constructor(initialValue: number = 0) {
    this.value = initialValue;
  }

  async increment(): Promise<number> {
    this.value += 1;
    return this.value;
  }

  async read(): Promise<number> {
    return this.value;
  }
}

function toCount(value: unknown): number {
  const count = typeof value === 'string' ? Number(value) : value;
  return typeof count === 'number' && Number.isFinite(count) ? count : 0;
}

/**
 * Counter stored under a Redis key (INCR is atomic on the server)
 */
export class RedisCounter implements Counter {
  constructor(
    private readonly redis: Pick<RedisCommands, 'incr' | 'get'>,
    private readonly key: string
  ) {}

  async increment(): Promise<number> {
    return this.redis.incr(this.key);
  }

  async read(): Promise<number> {
    return toCount(await this.redis.get(this.key));
  }
}

/**
 * Counter stored as a row of the `metrics` table
 * The upsert increments in a single statement, so concurrent requests never lose an update
 */
export class PostgresCounter implements Counter {
  constructor(
    private readonly sql: Pick<SqlClient, 'query'>,
    private readonly metricName: string
  ) {}

  async increment(): Promise<number> {
    const { rows } = await this.sql.query(
      `INSERT INTO metrics (metric_name, metric_value) VALUES ($1, 1)
       ON CONFLICT (metric_name)
       DO UPDATE SET metric_value = metrics.metric_value + 1, updated_at = CURRENT_TIMESTAMP
       RETURNING metric_value`,
      [this.metricName]
    );
    return PostgresCounter.rowValue(rows);
  }

  async read(): Promise<number> {
    const { rows } = await this.sql.query(
      'SELECT metric_value FROM metrics WHERE metric_name = $1',
      [this.metricName]
    );
    return PostgresCounter.rowValue(rows);
  }

  private static rowValue(rows: unknown[]): number {
    const [row] = rows;
    if (typeof row !== 'object' || row === null || !('metric_value' in row)) {
      return 0;
    }
    return toCount(row.metric_value);
  }
}

/**
 * Redis key used for the dashboard view counter
 */
export const CACHE_HITS_KEY = 'cache_hits';

/**
 * Metric row used for the request total
 */
export const TOTAL_REQUESTS_METRIC = 'total_requests';

/**
 * Build the service counters for the configured backend
 * - external: request total in PostgreSQL, cache hits in Redis
 * - memory: both in process
 */
export function createServiceCounters(
  backend: CounterBackend,
  stores: { sql: Pick<SqlClient, 'query'>; redis: Pick<RedisCommands, 'incr' | 'get'> }
): ServiceCounters {
  if (backend === 'memory') {
    return {
      requests: new InMemoryCounter(),
      cacheHits: new InMemoryCounter()
    };
  }

  return {
    requests: new PostgresCounter(stores.sql, TOTAL_REQUESTS_METRIC),
    cacheHits: new RedisCounter(stores.redis, CACHE_HITS_KEY)
  };
}
