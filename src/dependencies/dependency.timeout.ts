import { DependencyTimeoutError } from './dependency.errors.js';

/**
 * Upper bound for a single dependency call when none is configured
 */
export const DEFAULT_DEPENDENCY_TIMEOUT_MS = 2000;

/**
 * Race a dependency call against a timer, clearing the timer either way
 *
 * The call itself is not cancelled; a late result is dropped. Every call a
 * request waits on goes through here, so a dependency that accepts a
 * connection and then stalls costs at most `timeoutMs`.
 *
 * @throws DependencyTimeoutError when the timer wins
 */
export async function withTimeout<T>(operation: Promise<T>, dependency: string, timeoutMs: number): Promise<T> {
  let timer: NodeJS.Timeout | undefined;

  const timeout = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => reject(new DependencyTimeoutError(dependency, timeoutMs)), timeoutMs);
  });

  try {
    return await Promise.race([operation, timeout]);
  } finally {
    clearTimeout(timer);
  }
}
