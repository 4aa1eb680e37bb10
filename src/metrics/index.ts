export {
  InMemoryCounter,
  RedisCounter,
  PostgresCounter,
  createServiceCounters,
  CACHE_HITS_KEY,
  TOTAL_REQUESTS_METRIC
} from './services/counter.store.js';
export { MetricsSnapshotService, processHostMetrics } from './services/metrics-snapshot.service.js';
export type {
  Counter,
  HostMetricsSource,
  MetricsSnapshot,
  ServiceCounters
} from './types/metrics.types.js';
