/**
 * Overall health verdict
 * - healthy: every dependency answered its probe
 * - degraded: at least one dependency is unreachable; the service keeps serving
 */
export type OverallStatus = 'healthy' | 'degraded';

/**
 * Per-dependency status as exposed in the `services` map of /health
 */
export type ServiceStatus = 'healthy' | 'unhealthy';

/**
 * Metadata a dependency reports about itself (version, memory, key count...)
 */
export type DependencyDetail = Readonly<Record<string, string>>;

/**
 * Result of one probe against one dependency
 * Built fresh on every probe and frozen; never persisted
 */
export interface DependencyCheck {
  readonly name: string;
  readonly reachable: boolean;
  readonly detail: DependencyDetail;
  readonly error?: string;
  /** Wall-clock time the probe took, in milliseconds */
  readonly latencyMs: number;
}

/**
 * Aggregated health of all configured dependencies
 * Derived entirely from `checks`; `checks` follows declaration order
 */
export interface HealthReport {
  readonly overallStatus: OverallStatus;
  readonly checks: readonly DependencyCheck[];
  readonly generatedAt: Date;
}

/**
 * Capability a dependency must offer to be probed
 *
 * Implemented by the PostgreSQL and Redis clients, and by fakes in tests.
 */
export interface DependencyClient {
  /** Stable name used as the key in health documents (e.g. "database", "redis") */
  readonly name: string;

  /** Cheapest round trip that proves the dependency is up; rejects otherwise */
  checkLiveness(): Promise<void>;

  /** Metadata to attach to a successful check; rejects on malformed replies */
  queryMetadata(): Promise<Record<string, string>>;
}

/**
 * Probe configuration
 */
export interface ProbeOptions {
  timeoutMs: number;
}
