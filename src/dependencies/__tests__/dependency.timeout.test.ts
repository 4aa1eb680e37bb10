import { describe, it, expect } from '@jest/globals';
import { withTimeout } from '../dependency.timeout.js';
import { DependencyTimeoutError } from '../dependency.errors.js';
import { never } from '../../__tests__/fakes.js';

describe('withTimeout', () => {
  it('should resolve with the value when the call answers in time', async () => {
    await expect(withTimeout(Promise.resolve(7), 'redis', 50)).resolves.toBe(7);
  });

  it('should pass the call rejection through unchanged', async () => {
    const failure = new Error('connect ECONNREFUSED 172.18.0.3:6379');

    await expect(withTimeout(Promise.reject(failure), 'redis', 50)).rejects.toBe(failure);
  });

  it('should reject with a timeout error naming the dependency when the call never answers', async () => {
    const startTime = Date.now();

    const error = await withTimeout(never(), 'database', 30).catch((reason: unknown) => reason);

    expect(error).toBeInstanceOf(DependencyTimeoutError);
    expect(error).toMatchObject({ dependency: 'database', timeoutMs: 30, message: 'Connection timeout after 30ms' });
    expect(Date.now() - startTime).toBeLessThan(500);
  });
});
