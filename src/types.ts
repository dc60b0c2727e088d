import type { RangeSelector, WildcardSelector } from './path-resolver/segments';
import type { Logger } from './util/logger';

/**
 * A scalar used for associative lookup or for indexing an ordered collection
 */
export type Key = string | number | bigint | boolean | symbol | null;

/**
 * One unit of a path
 */
export type Segment = Key | RangeSelector | WildcardSelector;

/**
 * A bare segment, or an ordered sequence of segments applied left to right
 */
export type Path = Segment | readonly Segment[];

/**
 * Anything the resolver can be pointed at. Its shape is decided by inspectValue.
 */
export type NestedValue = unknown;

/**
 * Options for the PathResolver
 */
export interface ResolverOptions {
  /** Logger instance to use */
  logger?: Logger;
  /** How many levels below the first a wildcard may descend. Infinity means no cap. */
  maxWildcardDepth?: number;
}

export type ResolvedResolverOptions = Required<ResolverOptions>;
