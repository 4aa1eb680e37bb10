/**
 * Monotonically increasing counter
 *
 * `increment` must be atomic with respect to concurrent requests: either a
 * single synchronous step in process, or a server-side atomic operation.
 */
export interface Counter {
  /** Add one and return the new value */
  increment(): Promise<number>;
  /** Current value without modifying it */
  read(): Promise<number>;
}

/**
 * Counters owned by the service and injected into request handlers
 */
export interface ServiceCounters {
  /** Total requests served */
  requests: Counter;
  /** Dashboard views (historically labelled "cache hits") */
  cacheHits: Counter;
}

/**
 * Point-in-time view of process metrics and counters
 * Assembled on demand; reading it has no side effects
 */
export interface MetricsSnapshot {
  readonly memoryUsedBytes: number;
  readonly cpuCount: number;
  readonly requestCount: number;
  readonly cacheHitCount: number;
  readonly capturedAt: Date;
}

/**
 * Host facts the snapshot pulls from the platform
 * Injectable so tests can pin the values
 */
export interface HostMetricsSource {
  memoryUsedBytes(): number;
  cpuCount(): number;
}
