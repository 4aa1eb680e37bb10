import { logger } from '../../logging/logger.service.js';
import { toDependencyError } from '../../dependencies/dependency.errors.js';
import { DEFAULT_DEPENDENCY_TIMEOUT_MS, withTimeout } from '../../dependencies/dependency.timeout.js';
import type { DependencyCheck, DependencyClient, ProbeOptions } from '../types/health.types.js';

/**
 * Default probe configuration
 */
export const DEFAULT_PROBE_OPTIONS: ProbeOptions = {
  timeoutMs: DEFAULT_DEPENDENCY_TIMEOUT_MS
};

async function runProbe(client: DependencyClient): Promise<Record<string, string>> {
  await client.checkLiveness();
  return client.queryMetadata();
}

/**
 * Probe a single dependency
 *
 * Runs a liveness round trip followed by a metadata query, bounded by one
 * fixed timeout. There is no retry: one failed attempt is final.
 *
 * Never rejects. Every failure (network, auth, timeout, malformed reply) is
 * returned as an unreachable check carrying the cause, with no metadata.
 */
export async function probeDependency(
  client: DependencyClient,
  options: ProbeOptions = DEFAULT_PROBE_OPTIONS
): Promise<DependencyCheck> {
  const startTime = Date.now();

  try {
    const metadata = await withTimeout(runProbe(client), client.name, options.timeoutMs);

    return Object.freeze({
      name: client.name,
      reachable: true,
      detail: Object.freeze({ ...metadata }),
      latencyMs: Date.now() - startTime
    });
  } catch (error) {
    const failure = toDependencyError(client.name, error);

    logger.warn('DependencyProbe', `${client.name} probe failed`, {
      dependency: client.name,
      kind: failure.kind,
      error: failure.message
    });

    return Object.freeze({
      name: client.name,
      reachable: false,
      detail: Object.freeze({}),
      error: failure.message,
      latencyMs: Date.now() - startTime
    });
  }
}
