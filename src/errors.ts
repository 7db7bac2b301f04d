import type { ZodIssue } from 'zod';

/**
 * Raised when an entity, field or query cannot be resolved into valid query
 * text. Always thrown before the transport is called.
 */
export class ConfigurationError extends Error {
  override readonly name: string = 'ConfigurationError';

  constructor(message: string) {
    super(message);
    // Restore prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class UnsupportedOperatorError extends ConfigurationError {
  override readonly name: string = 'UnsupportedOperatorError';

  constructor(
    readonly operator: string,
    readonly dialect: string,
    readonly valueType: string,
    message?: string,
  ) {
    super(message ?? `Operator "${operator}" is not supported for ${valueType} values in the ${dialect} dialect`);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** Raised when the builder or a combinator is called in a way it does not allow. */
export class UsageError extends Error {
  override readonly name: string = 'UsageError';

  constructor(message: string) {
    super(message);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class MismatchConditionsError extends UsageError {
  override readonly name: string = 'MismatchConditionsError';

  constructor(message: string) {
    super(message);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class InvalidStageError extends UsageError {
  override readonly name: string = 'InvalidStageError';

  constructor(
    readonly operation: string,
    readonly stage: string,
    message?: string,
  ) {
    super(message ?? `Cannot call ${operation}() once the query is ${stage}`);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** The service answered with more rows than the call allows. */
export class InvalidResponseError extends Error {
  override readonly name = 'InvalidResponseError';

  constructor(message: string) {
    super(message);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class DecodeError extends Error {
  override readonly name = 'DecodeError';

  constructor(
    message: string,
    readonly row: unknown,
    readonly path: string,
    readonly issues: readonly ZodIssue[] = [],
  ) {
    super(message);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class QueryTransportError extends Error {
  override readonly name = 'QueryTransportError';

  constructor(
    message: string,
    readonly query: string,
    override readonly cause?: unknown,
  ) {
    super(message);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}
