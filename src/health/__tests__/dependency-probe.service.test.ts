import { describe, it, expect } from '@jest/globals';
import { probeDependency, DEFAULT_PROBE_OPTIONS } from '../services/dependency-probe.service.js';
import { MalformedDependencyResponseError } from '../../dependencies/dependency.errors.js';
import { FakeDependency, reachable, unreachable } from '../../__tests__/fakes.js';

describe('probeDependency', () => {
  it('should report a reachable dependency with its metadata', async () => {
    const client = reachable('redis', { version: '7.2.4', key_count: '5' });

    const check = await probeDependency(client, { timeoutMs: 100 });

    expect(check.name).toBe('redis');
    expect(check.reachable).toBe(true);
    expect(check.detail).toEqual({ version: '7.2.4', key_count: '5' });
    expect(check.error).toBeUndefined();
    expect(check.latencyMs).toBeGreaterThanOrEqual(0);
  });

  it('should run liveness before metadata', async () => {
    const client = reachable('database');

    await probeDependency(client);

    expect(client.livenessCalls).toBe(1);
    expect(client.metadataCalls).toBe(1);
  });

  it('should return an unreachable check instead of rejecting on connection errors', async () => {
    const client = unreachable('database', 'connect ECONNREFUSED 10.0.0.5:5432');

    const check = await probeDependency(client, { timeoutMs: 100 });

    expect(check).toEqual({
      name: 'database',
      reachable: false,
      detail: {},
      error: 'connect ECONNREFUSED 10.0.0.5:5432',
      latencyMs: check.latencyMs
    });
  });

  it('should not query metadata when liveness fails', async () => {
    const client = unreachable('database');

    await probeDependency(client);

    expect(client.metadataCalls).toBe(0);
  });

  it('should treat a malformed reply the same as an unreachable dependency', async () => {
    const client = new FakeDependency('redis', {
      metadataError: new MalformedDependencyResponseError('redis', 'INFO reply is missing redis_version or used_memory_human')
    });

    const check = await probeDependency(client);

    expect(check.reachable).toBe(false);
    expect(check.detail).toEqual({});
    expect(check.error).toBe('INFO reply is missing redis_version or used_memory_human');
  });

  it('should report a timeout when the dependency never answers', async () => {
    const client = new FakeDependency('database', { hang: true });

    const check = await probeDependency(client, { timeoutMs: 20 });

    expect(check.reachable).toBe(false);
    expect(check.error).toBe('Connection timeout after 20ms');
  });

  it('should try exactly once with no retry', async () => {
    const client = unreachable('redis');

    await probeDependency(client);

    expect(client.livenessCalls).toBe(1);
  });

  it('should convert non-Error throwables into a readable cause', async () => {
    const client: FakeDependency = reachable('redis');
    client.checkLiveness = async () => {
      throw 'socket closed';
    };

    const check = await probeDependency(client);

    expect(check.reachable).toBe(false);
    expect(check.error).toBe('socket closed');
  });

  it('should return a frozen check', async () => {
    const check = await probeDependency(reachable('database', { version: '16' }));

    expect(Object.isFrozen(check)).toBe(true);
    expect(Object.isFrozen(check.detail)).toBe(true);
  });

  it('should not share the metadata object with the client', async () => {
    const metadata = { version: '16' };
    const client: FakeDependency = reachable('database');
    client.queryMetadata = async () => metadata;

    const check = await probeDependency(client);
    metadata.version = '17';

    expect(check.detail).toEqual({ version: '16' });
  });

  it('should use a short default timeout', () => {
    expect(DEFAULT_PROBE_OPTIONS.timeoutMs).toBe(2000);
  });
});
