import os from 'os';
import { logger } from '../../logging/logger.service.js';
import { DEFAULT_DEPENDENCY_TIMEOUT_MS, withTimeout } from '../../dependencies/dependency.timeout.js';
import type {
  Counter,
  HostMetricsSource,
  MetricsSnapshot,
  ServiceCounters
} from '../types/metrics.types.js';

/**
 * Host metrics as reported by the Node.js runtime
 */
export const processHostMetrics: HostMetricsSource = {
  memoryUsedBytes: () => process.memoryUsage().rss,
  // cpus() can be empty inside some sandboxes
  cpuCount: () => Math.max(1, os.cpus().length)
};

/**
 * Metrics Snapshot Service
 *
 * Reads host metrics and the injected counters. Never increments anything:
 * counting is the request path's job.
 */
export class MetricsSnapshotService {
  constructor(
    private readonly counters: ServiceCounters,
    private readonly host: HostMetricsSource = processHostMetrics,
    private readonly options: { timeoutMs: number } = { timeoutMs: DEFAULT_DEPENDENCY_TIMEOUT_MS }
  ) {}

  /**
   * A counter that cannot be read in time reports 0 rather than failing the snapshot
   */
  private async readCounter(name: string, counter: Counter): Promise<number> {
    try {
      return await withTimeout(counter.read(), `${name} counter`, this.options.timeoutMs);
    } catch (error) {
      logger.warn('MetricsSnapshot', `Could not read ${name} counter`, {
        error: error instanceof Error ? error.message : String(error)
      });
      return 0;
    }
  }

  /**
   * Host figures only, without touching the counters
   */
  hostMetrics(): Pick<MetricsSnapshot, 'memoryUsedBytes' | 'cpuCount'> {
    return {
      memoryUsedBytes: this.host.memoryUsedBytes(),
      cpuCount: this.host.cpuCount()
    };
  }

  async snapshot(): Promise<MetricsSnapshot> {
    const [requestCount, cacheHitCount] = await Promise.all([
      this.readCounter('requests', this.counters.requests),
      this.readCounter('cacheHits', this.counters.cacheHits)
    ]);

    return Object.freeze({
      ...this.hostMetrics(),
      requestCount,
      cacheHitCount,
      capturedAt: new Date()
    });
  }
}
