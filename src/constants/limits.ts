import { ResolvedResolverOptions } from '../types';
import { noLogger } from '../util/logger';

/**
 * Wildcard descent is unbounded unless a cap is configured
 */
export const DEFAULT_MAX_WILDCARD_DEPTH = Infinity;

/**
 * Options used when a resolver is constructed without any
 */
export const DEFAULT_RESOLVER_OPTIONS: ResolvedResolverOptions = {
  logger: noLogger,
  maxWildcardDepth: DEFAULT_MAX_WILDCARD_DEPTH,
};
