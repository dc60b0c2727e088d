/* istanbul ignore file */
export { Key, Segment, Path, NestedValue, ResolverOptions, ResolvedResolverOptions } from './types';
export {
  PathResolver,
  defaultResolver,
  resolve,
  tryResolve,
  has,
  getOr,
  query,
  BoundQuery,
  RangeSelector,
  WildcardSelector,
  SELECT_ALL,
  WILDCARD,
  range,
  isRange,
  isWildcard,
  isKey,
  describeSegment,
  describePath,
  Outcome,
  Failure,
  FailureKind,
  ValueShape,
  AssociativeShape,
  OrderedShape,
  ScalarShape,
  inspectValue,
  isPlainRecord,
} from './path-resolver';
export { PathExpression, PathSyntaxError } from './path-expression';
export {
  QueryError,
  ValidationError,
  ResolutionError,
  ResolutionErrorContext,
  LookupFailureError,
  ShapeMismatchError,
  ErrorCode,
} from './errors';
export {
  Logger,
  LogEntry,
  LogLevel,
  ConsoleLogger,
  TestLogger,
  noLogger,
  defaultLogger,
} from './util/logger';
export { OptionsValidator } from './util/options-validator';
export { DEFAULT_RESOLVER_OPTIONS, DEFAULT_MAX_WILDCARD_DEPTH } from './constants/limits';
