export type ErrorKind =
  | 'security'
  | 'unauthorized-access'
  | 'invalid-operation'
  | 'invalid-argument';

/**
 * An error that names its own kind, so classification never depends on the
 * prototype chain or on the class it was constructed from.
 */
export interface TaggedError extends Error {
  readonly kind: string;
}

export function isTaggedError(error: unknown): error is TaggedError {
  return (
    error instanceof Error &&
    'kind' in error &&
    typeof error.kind === 'string'
  );
}

/** A security policy was violated */
export class SecurityError extends Error implements TaggedError {
  public readonly kind: ErrorKind = 'security';

  constructor(message: string) {
    super(message);
    this.name = 'SecurityError';
  }
}

/** The caller is not allowed to touch the resource */
export class UnauthorizedAccessError extends Error implements TaggedError {
  public readonly kind: ErrorKind = 'unauthorized-access';

  constructor(message: string) {
    super(message);
    this.name = 'UnauthorizedAccessError';
  }
}

/** The operation is not valid for the current state of the object */
export class InvalidOperationError extends Error implements TaggedError {
  public readonly kind: ErrorKind = 'invalid-operation';

  constructor(message: string) {
    super(message);
    this.name = 'InvalidOperationError';
  }
}

export class ArgumentError extends Error implements TaggedError {
  public readonly kind: ErrorKind = 'invalid-argument';

  constructor(
    message: string,
    public readonly argumentName?: string
  ) {
    super(message);
    this.name = 'ArgumentError';
  }
}
