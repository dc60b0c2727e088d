import { QueryError } from '../errors/base';
import { ErrorCode } from '../errors/codes';

/**
 * Error thrown when a path expression cannot be parsed
 */
export class PathSyntaxError extends QueryError {
  constructor(
    message: string,
    public readonly path: string,
    public readonly position?: number,
  ) {
    super(`Invalid path syntax: ${message}`, ErrorCode.PATH_SYNTAX_ERROR, { path, position });
    this.name = 'PathSyntaxError';
    Object.setPrototypeOf(this, PathSyntaxError.prototype);
  }
}
