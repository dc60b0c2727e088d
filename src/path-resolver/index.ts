export {
  PathResolver,
  defaultResolver,
  resolve,
  tryResolve,
  has,
  getOr,
  query,
} from './resolver';
export { BoundQuery } from './bound-query';
export {
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
} from './segments';
export { Outcome, Failure, FailureKind } from './outcome';
export {
  ValueShape,
  AssociativeShape,
  OrderedShape,
  ScalarShape,
  inspectValue,
  isPlainRecord,
} from './value-shape';
