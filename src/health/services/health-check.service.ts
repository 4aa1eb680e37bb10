import { DEFAULT_PROBE_OPTIONS, probeDependency } from './dependency-probe.service.js';
import type {
  DependencyCheck,
  DependencyClient,
  HealthReport,
  OverallStatus,
  ProbeOptions
} from '../types/health.types.js';

/**
 * Health check service aggregates the health of every configured dependency
 *
 * Dependencies are probed concurrently and independently: one failing probe
 * never stops the others from running or being reported. Checks come back in
 * the order the dependencies were declared, not the order probes finished.
 *
 * Unlike a readiness cache, nothing is kept between calls: every report is
 * derived from a fresh round of probes.
 */
export class HealthCheckService {
  private readonly dependencies: readonly DependencyClient[];
  private readonly options: ProbeOptions;

  constructor(dependencies: readonly DependencyClient[], options?: Partial<ProbeOptions>) {
    this.dependencies = [...dependencies];
    this.options = { ...DEFAULT_PROBE_OPTIONS, ...options };
  }

  /**
   * Probe all dependencies and build a report
   */
  async aggregate(): Promise<HealthReport> {
    // Promise.all keeps input order regardless of completion order
    const checks = await Promise.all(
      this.dependencies.map((dependency) => probeDependency(dependency, this.options))
    );

    return Object.freeze({
      overallStatus: calculateOverallStatus(checks),
      checks: Object.freeze(checks),
      generatedAt: new Date()
    });
  }

  /**
   * Names of the dependencies this service probes, in declaration order
   */
  getDependencyNames(): string[] {
    return this.dependencies.map((dependency) => dependency.name);
  }

  getConfig(): ProbeOptions {
    return { ...this.options };
  }
}

/**
 * Degrade-on-any-failure rule
 * Returns degraded if any dependency is unreachable, healthy otherwise
 */
export function calculateOverallStatus(checks: readonly DependencyCheck[]): OverallStatus {
  return checks.some((check) => !check.reachable) ? 'degraded' : 'healthy';
}
