export {
  PostgresDependency,
  createPgClient,
  DATABASE_DEPENDENCY_NAME,
  type SqlClient,
  type RequestRecord,
  type DatabaseExerciseResult
} from './postgres.dependency.js';
export {
  RedisDependency,
  createRedisCommands,
  parseRedisInfo,
  CACHE_DEPENDENCY_NAME,
  type RedisCommands,
  type CacheExerciseResult
} from './redis.dependency.js';
export {
  DependencyError,
  DependencyUnreachableError,
  DependencyTimeoutError,
  MalformedDependencyResponseError,
  toDependencyError,
  type DependencyFailureKind
} from './dependency.errors.js';
export { withTimeout, DEFAULT_DEPENDENCY_TIMEOUT_MS } from './dependency.timeout.js';
