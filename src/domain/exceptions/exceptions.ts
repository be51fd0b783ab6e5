/**
 * @fileoverview Dependency Resolution Errors
 *
 * @packageDocumentation
 * @module di-registry/domain/exceptions
 *
 * ## Error Kinds
 *
 * | Kind           | Class                      | Raised when                                        |
 * |----------------|----------------------------|----------------------------------------------------|
 * | `NotExist`     | `NotExistError`            | no registration group exists for the type          |
 * | `NameNotExist` | `NameNotExistError`        | the group exists but the named entry does not      |
 * | `Validation`   | `SignatureValidationError` | a callable, signature or resolved value is invalid |
 * | `Factory`      | `FactoryError`             | a factory or constructor reported a failure        |
 *
 * Resolution stops at the first error and rethrows it unchanged to the
 * caller; errors raised by the container itself are never re-wrapped on the
 * way up. Anything else a factory throws is wrapped once in `FactoryError`
 * with the original available as `cause`.
 *
 * @example Catching resolution errors
 * ```typescript
 * try {
 *   container.resolve(GreeterType);
 * } catch (error) {
 *   if (isDependencyError(error, 'NotExist')) {
 *     logger.warn(error.message);
 *     logger.warn(error.dependencyGraph);
 *   }
 *   throw error;
 * }
 * ```
 */

/**
 * Discriminator shared by every container error.
 */
export type DependencyErrorKind =
  | 'NotExist'
  | 'NameNotExist'
  | 'Validation'
  | 'Factory';

/**
 * Base class for every error raised by the container.
 */
export class DependencyResolutionError extends Error {
  /**
   * Resolution path that led to the failure, rendered as a tree:
   *
   * ```
   * └─ Aggregate
   *   └─ Dependency (UNREGISTERED)
   * ```
   *
   * Empty when the failure happened outside a nested resolution.
   */
  public readonly dependencyGraph: string;

  constructor(
    message: string,
    public readonly kind: DependencyErrorKind,
    dependencyGraph: string = '',
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'DependencyResolutionError';
    this.dependencyGraph = dependencyGraph;

    // Maintain proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * No registration group exists for the requested type.
 */
export class NotExistError extends DependencyResolutionError {
  constructor(
    public readonly typeName: string,
    dependencyGraph: string = '',
  ) {
    super(
      `item does not exist in the container: '${typeName}'`,
      'NotExist',
      dependencyGraph,
    );
    this.name = 'NotExistError';
  }
}

/**
 * The type is registered but not under the requested name.
 */
export class NameNotExistError extends DependencyResolutionError {
  constructor(
    public readonly typeName: string,
    public readonly registrationName: string,
    dependencyGraph: string = '',
  ) {
    super(
      `item with the given name does not exist in the container: '${registrationName}' (type '${typeName}')`,
      'NameNotExist',
      dependencyGraph,
    );
    this.name = 'NameNotExistError';
  }
}

/**
 * A callable's shape, a declared signature or a resolved value does not
 * satisfy what the container requires.
 */
export class SignatureValidationError extends DependencyResolutionError {
  constructor(message: string) {
    super(message, 'Validation');
    this.name = 'SignatureValidationError';
  }
}

/**
 * A registered factory or an invoked constructor reported a failure.
 */
export class FactoryError extends DependencyResolutionError {
  constructor(
    public readonly typeName: string,
    cause: unknown,
  ) {
    super(
      `factory for '${typeName}' failed: ${describeCause(cause)}`,
      'Factory',
      '',
      { cause },
    );
    this.name = 'FactoryError';
  }
}

function describeCause(cause: unknown): string {
  if (cause instanceof Error) return cause.message;
  return String(cause);
}

/**
 * Narrow an unknown thrown value to a container error, optionally of one kind.
 */
export function isDependencyError(
  error: unknown,
  kind?: DependencyErrorKind,
): error is DependencyResolutionError {
  return (
    error instanceof DependencyResolutionError &&
    (kind === undefined || error.kind === kind)
  );
}
