import type { Server } from 'http';
import { createApp } from './app.js';
import { loadConfig, type AppConfig } from './config/app.config.js';
import {
  createPgClient,
  createRedisCommands,
  PostgresDependency,
  RedisDependency
} from './dependencies/index.js';
import { HealthCheckService } from './health/index.js';
import { logger } from './logging/index.js';
import { createServiceCounters, MetricsSnapshotService, processHostMetrics } from './metrics/index.js';

/**
 * Long-lived resources owned by the server process
 */
interface Runtime {
  server: Server;
  database: PostgresDependency;
  cache: RedisDependency;
}

let runtime: Runtime | null = null;

async function initializeDatabase(database: PostgresDependency): Promise<void> {
  try {
    await database.initializeSchema();
    logger.info('Startup', 'Database schema ready');
  } catch (error) {
    // The dashboard reports the database as down; the web tier still starts
    logger.warn('Startup', 'Database initialization failed, starting degraded', {
      error: error instanceof Error ? error.message : String(error)
    });
  }
}

/**
 * Start the server
 */
async function start(config: AppConfig): Promise<Runtime> {
  logger.info('Startup', 'Starting status demo', {
    environment: config.environment,
    version: config.version,
    counter_backend: config.counterBackend
  });

  const sql = createPgClient(config.database, config.probeTimeoutMs);
  const redis = createRedisCommands(config.cache, config.probeTimeoutMs);

  const database = new PostgresDependency(sql, config.database);
  const cache = new RedisDependency(redis, config.cache);

  await initializeDatabase(database);

  const counters = createServiceCounters(config.counterBackend, { sql, redis });

  const healthCheck = new HealthCheckService([database, cache], { timeoutMs: config.probeTimeoutMs });

  const app = createApp({
    config,
    healthCheck,
    metrics: new MetricsSnapshotService(counters, processHostMetrics, { timeoutMs: config.probeTimeoutMs }),
    counters,
    database,
    cache,
    requestLog: database,
    allowedOrigins: config.allowedOrigins
  });

  const server = await new Promise<Server>((resolve) => {
    const listening = app.listen(config.port, () => resolve(listening));
  });

  logger.info('Startup', 'Listening', {
    port: config.port,
    endpoints: ['/', '/health', '/info', '/api/test-db', '/api/test-cache', '/api/stats'],
    dependencies: healthCheck.getDependencyNames(),
    dependency_timeout_ms: healthCheck.getConfig().timeoutMs,
    log_level: logger.getMinLevel()
  });

  return { server, database, cache };
}

/**
 * Close the HTTP server first so no request runs against a closed pool
 */
async function shutdown(signal: string): Promise<void> {
  logger.info('Shutdown', `${signal} received, shutting down gracefully`);

  if (!runtime) {
    process.exit(0);
  }

  const { server, database, cache } = runtime;
  runtime = null;

  try {
    await new Promise<void>((resolve, reject) => {
      server.close((error) => (error ? reject(error) : resolve()));
    });
    await Promise.allSettled([database.close(), cache.close()]);
    logger.info('Shutdown', 'Stopped');
    process.exit(0);
  } catch (error) {
    logger.error('Shutdown', 'Error during shutdown', {
      error: error instanceof Error ? error.message : String(error)
    });
    process.exit(1);
  }
}

process.on('SIGTERM', () => {
  void shutdown('SIGTERM');
});

process.on('SIGINT', () => {
  void shutdown('SIGINT');
});

async function main(): Promise<void> {
  const { config, warnings } = loadConfig();
  for (const warning of warnings) {
    logger.warn('Config', warning);
  }
  runtime = await start(config);
}

main().catch((error: unknown) => {
  logger.error('Startup', 'Fatal error during startup', {
    error: error instanceof Error ? error.message : String(error)
  });
  process.exit(1);
});
