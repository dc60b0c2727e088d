/**
 * Error codes carried by every query error
 */
export enum ErrorCode {
  // Resolution errors
  LOOKUP_FAILURE = 'LOOKUP_FAILURE',
  SHAPE_MISMATCH = 'SHAPE_MISMATCH',

  // Input errors
  PATH_SYNTAX_ERROR = 'PATH_SYNTAX_ERROR',
  VALIDATION_ERROR = 'VALIDATION_ERROR',
}
