import { describe, it, expect } from '@jest/globals';
import { MetricsSnapshotService, processHostMetrics } from '../services/metrics-snapshot.service.js';
import { InMemoryCounter } from '../services/counter.store.js';
import { FailingCounter, StalledCounter, fixedHostMetrics } from '../../__tests__/fakes.js';

describe('MetricsSnapshotService', () => {
  it('should combine host metrics with the counter values', async () => {
    const service = new MetricsSnapshotService(
      { requests: new InMemoryCounter(12), cacheHits: new InMemoryCounter(4) },
      fixedHostMetrics
    );

    const snapshot = await service.snapshot();

    expect(snapshot).toMatchObject({
      memoryUsedBytes: 52428800,
      cpuCount: 4,
      requestCount: 12,
      cacheHitCount: 4
    });
    expect(snapshot.capturedAt).toBeInstanceOf(Date);
  });

  it('should have no side effect on the counters', async () => {
    const requests = new InMemoryCounter(5);
    const cacheHits = new InMemoryCounter(2);
    const service = new MetricsSnapshotService({ requests, cacheHits }, fixedHostMetrics);

    await service.snapshot();
    await service.snapshot();

    expect(await requests.read()).toBe(5);
    expect(await cacheHits.read()).toBe(2);
  });

  it('should report zero for a counter that cannot be read', async () => {
    const service = new MetricsSnapshotService(
      { requests: new FailingCounter(), cacheHits: new InMemoryCounter(9) },
      fixedHostMetrics
    );

    const snapshot = await service.snapshot();

    expect(snapshot.requestCount).toBe(0);
    expect(snapshot.cacheHitCount).toBe(9);
  });

  it('should report zero for a counter that never answers', async () => {
    const service = new MetricsSnapshotService(
      { requests: new InMemoryCounter(6), cacheHits: new StalledCounter() },
      fixedHostMetrics,
      { timeoutMs: 30 }
    );
    const startTime = Date.now();

    const snapshot = await service.snapshot();

    expect(snapshot.requestCount).toBe(6);
    expect(snapshot.cacheHitCount).toBe(0);
    expect(Date.now() - startTime).toBeLessThan(500);
  });

  it('should return a frozen snapshot', async () => {
    const service = new MetricsSnapshotService(
      { requests: new InMemoryCounter(), cacheHits: new InMemoryCounter() },
      fixedHostMetrics
    );

    expect(Object.isFrozen(await service.snapshot())).toBe(true);
  });

  it('should expose host metrics without reading the counters', () => {
    const service = new MetricsSnapshotService(
      { requests: new FailingCounter(), cacheHits: new FailingCounter() },
      fixedHostMetrics
    );

    expect(service.hostMetrics()).toEqual({ memoryUsedBytes: 52428800, cpuCount: 4 });
  });
});

describe('processHostMetrics', () => {
  it('should report a positive memory figure and at least one CPU', () => {
    expect(processHostMetrics.memoryUsedBytes()).toBeGreaterThan(0);
    expect(processHostMetrics.cpuCount()).toBeGreaterThanOrEqual(1);
  });
});
