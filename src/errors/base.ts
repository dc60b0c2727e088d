import { ErrorCode } from './codes';

/**
 * Base error class for all query-related errors
 */
export class QueryError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode,
    public readonly context: Record<string, unknown>,
    public readonly cause?: Error,
  ) {
    super(message);
    this.name = 'QueryError';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }

    Object.setPrototypeOf(this, QueryError.prototype);
  }

  toString(options?: { includeStack?: boolean }): string {
    let str = `${this.name}: ${this.message} [code=${this.code}]`;
    for (const [key, value] of Object.entries(this.context)) {
      if (value === undefined) continue;
      str += ` [${key}=${String(value)}]`;
    }
    if (options?.includeStack && this.stack) {
      str += `\n${this.stack}`;
    }
    return str;
  }
}

/**
 * Error class for invalid options, range bounds and unformattable segments
 */
export class ValidationError extends QueryError {
  constructor(message: string, context: Record<string, unknown>) {
    super(message, ErrorCode.VALIDATION_ERROR, context);
    this.name = 'ValidationError';
    Object.setPrototypeOf(this, ValidationError.prototype);
  }
}

/**
 * Context attached to every resolution failure
 */
export interface ResolutionErrorContext extends Record<string, unknown> {
  /** The segment that failed, as rendered by describeSegment */
  segment: string;
  /** The full path of the failing call */
  path: string;
}

/**
 * Base class for the two ways a path can fail to resolve
 */
export class ResolutionError extends QueryError {
  constructor(message: string, code: ErrorCode, context: ResolutionErrorContext) {
    super(message, code, context);
    this.name = 'ResolutionError';
    Object.setPrototypeOf(this, ResolutionError.prototype);
  }
}

/**
 * A key has no entry, or an index is out of range
 */
export class LookupFailureError extends ResolutionError {
  constructor(message: string, context: ResolutionErrorContext) {
    super(message, ErrorCode.LOOKUP_FAILURE, context);
    this.name = 'LookupFailureError';
    Object.setPrototypeOf(this, LookupFailureError.prototype);
  }
}

/**
 * A segment needs a capability the value does not have
 */
export class ShapeMismatchError extends ResolutionError {
  constructor(message: string, context: ResolutionErrorContext) {
    super(message, ErrorCode.SHAPE_MISMATCH, context);
    this.name = 'ShapeMismatchError';
    Object.setPrototypeOf(this, ShapeMismatchError.prototype);
  }
}
