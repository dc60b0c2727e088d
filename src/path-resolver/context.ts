import { Segment } from '../types';
import { Logger } from '../util/logger';
import { Outcome } from './outcome';

/**
 * What the broadcaster and the wildcard descender need from the dispatcher
 */
export interface ResolutionContext {
  readonly logger: Logger;
  readonly maxWildcardDepth: number;
  /**
   * Resolve a path against a value without throwing.
   * @param wildcardDepth levels the enclosing wildcard has already descended
   */
  step(value: unknown, path: readonly Segment[], wildcardDepth?: number): Outcome;
}
