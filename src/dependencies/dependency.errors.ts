/**
 * Failures raised by dependency clients
 *
 * None of these ever leave the probe boundary: the probe converts them into an
 * unreachable DependencyCheck. They exist so the cause recorded on the check
 * can be told apart in logs.
 */
export type DependencyFailureKind = 'unreachable' | 'timeout' | 'malformed_response';

export abstract class DependencyError extends Error {
  abstract readonly kind: DependencyFailureKind;

  constructor(
    public readonly dependency: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Connection, authentication or network failure
 */
export class DependencyUnreachableError extends DependencyError {
  readonly kind: DependencyFailureKind = 'unreachable';
}

/**
 * The dependency did not answer within the probe timeout
 */
export class DependencyTimeoutError extends DependencyError {
  readonly kind: DependencyFailureKind = 'timeout';

  constructor(dependency: string, public readonly timeoutMs: number) {
    super(dependency, `Connection timeout after ${timeoutMs}ms`);
  }
}

/**
 * The dependency answered, but not in the shape we expected
 */
export class MalformedDependencyResponseError extends DependencyError {
  readonly kind: DependencyFailureKind = 'malformed_response';
}

/**
 * Normalize anything thrown by a client library into a DependencyError
 */
export function toDependencyError(dependency: string, error: unknown): DependencyError {
  if (error instanceof DependencyError) {
    return error;
  }

  // Dual-stack connect failures (ECONNREFUSED on ::1 and 127.0.0.1) arrive with an empty message
  if (error instanceof AggregateError && !error.message) {
    const [first] = error.errors;
    if (first instanceof Error && first.message) {
      return new DependencyUnreachableError(dependency, first.message, { cause: error });
    }
  }

  if (error instanceof Error) {
    return new DependencyUnreachableError(dependency, error.message || error.name, { cause: error });
  }

  return new DependencyUnreachableError(dependency, String(error));
}
