/**
 * Application Configuration
 *
 * Reads every environment variable the service uses exactly once, at startup.
 * Defaults match the compose file the demo ships with (service names
 * `database` and `cache` on the compose network).
 */

/**
 * Where the request and cache-hit counters live
 * - external: request total in PostgreSQL, cache hits in Redis
 * - memory: both counters held in process
 */
export type CounterBackend = 'external' | 'memory';

export interface DatabaseConfig {
  host: string;
  port: number;
  database: string;
  user: string;
  password: string;
}

export interface CacheConfig {
  host: string;
  port: number;
}

export interface AppConfig {
  port: number;
  environment: string;
  version: string;
  debug: boolean;
  database: DatabaseConfig;
  cache: CacheConfig;
  probeTimeoutMs: number;
  counterBackend: CounterBackend;
  allowedOrigins: string[];
}

/**
 * Configuration validation result
 */
export interface ConfigValidationResult {
  valid: boolean;
  errors: string[];
  warnings: string[];
}

const DEFAULT_DB_PASSWORD = 'secret';

function readString(env: NodeJS.ProcessEnv, key: string, fallback: string): string {
  const value = env[key];
  return value !== undefined && value.trim() !== '' ? value.trim() : fallback;
}

function readInteger(
  env: NodeJS.ProcessEnv,
  key: string,
  fallback: number,
  errors: string[],
  bounds: { min: number; max: number }
): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }

  if (!/^\d+$/.test(raw.trim())) {
    errors.push(`${key} must be an integer (got "${raw}")`);
    return fallback;
  }

  const value = parseInt(raw, 10);
  if (value < bounds.min || value > bounds.max) {
    errors.push(`${key} must be between ${bounds.min} and ${bounds.max} (got ${value})`);
    return fallback;
  }

  return value;
}

function readCounterBackend(env: NodeJS.ProcessEnv, errors: string[]): CounterBackend {
  const raw = readString(env, 'COUNTER_BACKEND', 'external').toLowerCase();
  if (raw === 'external' || raw === 'memory') {
    return raw;
  }
  errors.push(`COUNTER_BACKEND must be "external" or "memory" (got "${raw}")`);
  return 'external';
}

/**
 * Parse configuration from an environment map
 * Never throws; problems are collected in `validation`
 */
export function parseConfig(env: NodeJS.ProcessEnv = process.env): {
  config: AppConfig;
  validation: ConfigValidationResult;
} {
  const errors: string[] = [];
  const warnings: string[] = [];
  const portBounds = { min: 1, max: 65535 };

  const environment = readString(env, 'APP_ENV', readString(env, 'NODE_ENV', 'development'));

  const config: AppConfig = {
    port: readInteger(env, 'PORT', 5000, errors, portBounds),
    environment,
    version: readString(env, 'APP_VERSION', '1.0.0'),
    debug: readString(env, 'DEBUG', 'false').toLowerCase() === 'true',
    database: {
      host: readString(env, 'DB_HOST', 'database'),
      port: readInteger(env, 'DB_PORT', 5432, errors, portBounds),
      database: readString(env, 'DB_NAME', 'webapp'),
      user: readString(env, 'DB_USER', 'admin'),
      password: env.DB_PASSWORD ?? DEFAULT_DB_PASSWORD
    },
    cache: {
      host: readString(env, 'REDIS_HOST', 'cache'),
      port: readInteger(env, 'REDIS_PORT', 6379, errors, portBounds)
    },
    probeTimeoutMs: readInteger(env, 'PROBE_TIMEOUT_MS', 2000, errors, { min: 50, max: 30000 }),
    counterBackend: readCounterBackend(env, errors),
    allowedOrigins: (env.ALLOWED_ORIGINS ?? '')
      .split(',')
      .map((origin) => origin.trim())
      .filter((origin) => origin.length > 0)
  };

  if (isProduction(config) && config.database.password === DEFAULT_DB_PASSWORD) {
    warnings.push('DB_PASSWORD is the compose default in a production environment');
  }

  if (isProduction(config) && config.debug) {
    warnings.push('DEBUG is enabled in a production environment');
  }

  return {
    config: Object.freeze(config),
    validation: {
      valid: errors.length === 0,
      errors,
      warnings
    }
  };
}

/**
 * Load configuration and throw if invalid
 * @throws Error listing every invalid variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): {
  config: AppConfig;
  warnings: string[];
} {
  const { config, validation } = parseConfig(env);

  if (!validation.valid) {
    const errorMessage = `Invalid configuration:\n${validation.errors.map((e) => `  - ${e}`).join('\n')}`;
    throw new Error(errorMessage);
  }

  return { config, warnings: validation.warnings };
}

/**
 * Check if running in production environment
 */
export function isProduction(config: AppConfig): boolean {
  return config.environment === 'production';
}
