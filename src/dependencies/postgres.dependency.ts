import { Pool } from 'pg';
import { logger } from '../logging/logger.service.js';
import type { DatabaseConfig } from '../config/app.config.js';
import type { DependencyClient } from '../health/types/health.types.js';
import { MalformedDependencyResponseError } from './dependency.errors.js';

/**
 * The subset of a pg Pool this module relies on
 * Lets tests hand in an in-process fake instead of a real server
 */
export interface SqlClient {
  query(text: string, values?: unknown[]): Promise<{ rows: unknown[] }>;
  end(): Promise<void>;
}

/**
 * Request row written for every served request
 */
export interface RequestRecord {
  ip: string;
  userAgent: string;
  endpoint: string;
}

/**
 * Result of the on-demand database exercise behind /api/test-db
 */
export interface DatabaseExerciseResult {
  databaseVersion: string;
  totalRequests: number;
}

export const DATABASE_DEPENDENCY_NAME = 'database';

const SCHEMA_STATEMENTS = [
  `CREATE TABLE IF NOT EXISTS requests (
    id SERIAL PRIMARY KEY,
    timestamp TIMESTAMP DEFAULT CURRENT_TIMESTAMP,
    ip_address VARCHAR(45),
    user_agent TEXT,
    endpoint VARCHAR(255)
  )`,
  `CREATE TABLE IF NOT EXISTS metrics (
    id SERIAL PRIMARY KEY,
    metric_name VARCHAR(100) UNIQUE NOT NULL,
    metric_value INTEGER NOT NULL DEFAULT 0,
    updated_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP
  )`,
  `INSERT INTO metrics (metric_name, metric_value) VALUES ('total_requests', 0) ON CONFLICT (metric_name) DO NOTHING`,
  `INSERT INTO metrics (metric_name, metric_value) VALUES ('db_connections', 0) ON CONFLICT (metric_name) DO NOTHING`
];

/**
 * Create a pooled PostgreSQL client
 * The pool lives as long as the service and is closed on shutdown.
 * Both connecting and each query are bounded by `timeoutMs`.
 */
export function createPgClient(config: DatabaseConfig, timeoutMs: number): SqlClient {
  const pool = new Pool({
    host: config.host,
    port: config.port,
    database: config.database,
    user: config.user,
    password: config.password,
    connectionTimeoutMillis: timeoutMs,
    query_timeout: timeoutMs,
    max: 5
  });

  // Idle clients that lose their connection emit here; unhandled it would crash the process
  pool.on('error', (error) => {
    logger.warn('Postgres', 'Idle client error', { error: error.message });
  });

  return {
    query: async (text, values) => {
      const result = await pool.query(text, values);
      return { rows: result.rows };
    },
    end: () => pool.end()
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

/**
 * PostgreSQL dependency
 *
 * Liveness is a `SELECT 1`; metadata is the server version, the number of
 * tables in the public schema and the number of open backends.
 */
export class PostgresDependency implements DependencyClient {
  readonly name = DATABASE_DEPENDENCY_NAME;

  constructor(
    private readonly sql: SqlClient,
    private readonly config: Pick<DatabaseConfig, 'host' | 'database'>
  ) {}

  private async firstRow(text: string, values?: unknown[]): Promise<Record<string, unknown>> {
    const { rows } = await this.sql.query(text, values);
    const [row] = rows;
    if (!isRecord(row)) {
      throw new MalformedDependencyResponseError(this.name, `Query returned no rows: ${text}`);
    }
    return row;
  }

  private async readString(text: string, column: string): Promise<string> {
    const row = await this.firstRow(text);
    const value = row[column];
    if (typeof value !== 'string') {
      throw new MalformedDependencyResponseError(this.name, `Expected text column "${column}"`);
    }
    return value;
  }

  /**
   * COUNT(*) comes back as a string (bigint) unless cast; accept both
   */
  private async readCount(text: string, values?: unknown[]): Promise<number> {
    const row = await this.firstRow(text, values);
    const value = row.count;
    const count = typeof value === 'string' ? Number(value) : value;
    if (typeof count !== 'number' || !Number.isInteger(count) || count < 0) {
      throw new MalformedDependencyResponseError(this.name, 'Expected a non-negative integer count');
    }
    return count;
  }

  async checkLiveness(): Promise<void> {
    await this.firstRow('SELECT 1 AS ok');
  }

  async queryMetadata(): Promise<Record<string, string>> {
    const version = await this.readString('SELECT version() AS version', 'version');
    const tableCount = await this.readCount(
      "SELECT COUNT(*)::int AS count FROM information_schema.tables WHERE table_schema = 'public'"
    );
    const connections = await this.readCount('SELECT COUNT(*)::int AS count FROM pg_stat_activity');

    return {
      version,
      host: this.config.host,
      database: this.config.database,
      table_count: String(tableCount),
      connections: String(connections)
    };
  }

  /**
   * Create the demo tables and seed metric rows; safe to run repeatedly
   */
  async initializeSchema(): Promise<void> {
    for (const statement of SCHEMA_STATEMENTS) {
      await this.sql.query(statement);
    }
  }

  async recordRequest(record: RequestRecord): Promise<void> {
    await this.sql.query(
      'INSERT INTO requests (ip_address, user_agent, endpoint) VALUES ($1, $2, $3)',
      [record.ip, record.userAgent, record.endpoint]
    );
  }

  /**
   * Run a version query and count logged requests
   * Unlike a probe this rejects on failure; the route turns that into an error body
   */
  async exercise(): Promise<DatabaseExerciseResult> {
    const databaseVersion = await this.readString('SELECT version() AS version', 'version');
    const totalRequests = await this.readCount('SELECT COUNT(*)::int AS count FROM requests');
    return { databaseVersion, totalRequests };
  }

  async close(): Promise<void> {
    await this.sql.end();
  }
}
