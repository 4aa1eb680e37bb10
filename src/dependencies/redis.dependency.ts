import Redis from 'ioredis';
import { logger } from '../logging/logger.service.js';
import type { CacheConfig } from '../config/app.config.js';
import type { DependencyClient } from '../health/types/health.types.js';
import { MalformedDependencyResponseError } from './dependency.errors.js';

/**
 * The Redis commands this service issues
 */
export interface RedisCommands {
  ping(): Promise<string>;
  info(): Promise<string>;
  dbsize(): Promise<number>;
  setex(key: string, seconds: number, value: string): Promise<string>;
  get(key: string): Promise<string | null>;
  incr(key: string): Promise<number>;
  quit(): Promise<string>;
}

/**
 * Result of the on-demand cache exercise behind /api/test-cache
 */
export interface CacheExerciseResult {
  retrievedValue: string | null;
  redisVersion: string;
  memoryUsage: string;
  totalKeys: number;
}

export const CACHE_DEPENDENCY_NAME = 'redis';

/**
 * Create the long-lived Redis connection
 * Commands give up after one reconnect attempt instead of queueing forever,
 * and reject once `timeoutMs` passes without a reply
 */
export function createRedisCommands(config: CacheConfig, timeoutMs: number): RedisCommands {
  const redis = new Redis({
    host: config.host,
    port: config.port,
    connectTimeout: timeoutMs,
    commandTimeout: timeoutMs,
    maxRetriesPerRequest: 1
  });

  redis.on('error', (error: Error) => {
    logger.warn('Redis', 'Connection error', { error: error.message });
  });

  return {
    ping: () => redis.ping(),
    info: () => redis.info(),
    dbsize: () => redis.dbsize(),
    setex: (key, seconds, value) => redis.setex(key, seconds, value),
    get: (key) => redis.get(key),
    incr: (key) => redis.incr(key),
    quit: () => redis.quit()
  };
}

/**
 * Parse the `field:value` lines of an INFO reply, skipping section headers
 */
export function parseRedisInfo(raw: string): Record<string, string> {
  const fields: Record<string, string> = {};

  for (const line of raw.split(/\r?\n/)) {
    if (line.length === 0 || line.startsWith('#')) {
      continue;
    }
    const separator = line.indexOf(':');
    if (separator > 0) {
      fields[line.slice(0, separator)] = line.slice(separator + 1).trim();
    }
  }

  return fields;
}

/**
 * Redis dependency
 *
 * Liveness is a PING that must answer PONG; metadata is the server version,
 * used memory and the number of keys in the selected database.
 */
export class RedisDependency implements DependencyClient {
  readonly name = CACHE_DEPENDENCY_NAME;

  constructor(
    private readonly redis: RedisCommands,
    private readonly config: Pick<CacheConfig, 'host'>
  ) {}

  private async readInfo(): Promise<{ version: string; memoryUsed: string }> {
    const info = parseRedisInfo(await this.redis.info());
    const version = info.redis_version;
    const memoryUsed = info.used_memory_human;

    if (!version || !memoryUsed) {
      throw new MalformedDependencyResponseError(
        this.name,
        'INFO reply is missing redis_version or used_memory_human'
      );
    }

    return { version, memoryUsed };
  }

  async checkLiveness(): Promise<void> {
    const reply = await this.redis.ping();
    if (reply !== 'PONG') {
      throw new MalformedDependencyResponseError(this.name, `Unexpected PING reply: ${reply}`);
    }
  }

  async queryMetadata(): Promise<Record<string, string>> {
    const { version, memoryUsed } = await this.readInfo();
    const keyCount = await this.redis.dbsize();

    return {
      version,
      host: this.config.host,
      memory_used: memoryUsed,
      key_count: String(keyCount)
    };
  }

  /**
   * Write a value with a TTL and read it straight back
   */
  async exercise(key: string, value: string, ttlSeconds: number): Promise<CacheExerciseResult> {
    await this.redis.setex(key, ttlSeconds, value);
    const retrievedValue = await this.redis.get(key);
    const { version, memoryUsed } = await this.readInfo();
    const totalKeys = await this.redis.dbsize();

    return {
      retrievedValue,
      redisVersion: version,
      memoryUsage: memoryUsed,
      totalKeys
    };
  }

  async close(): Promise<void> {
    await this.redis.quit();
  }
}
