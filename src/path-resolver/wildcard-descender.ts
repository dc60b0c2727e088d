import { Segment } from '../types';
import { broadcast } from './broadcaster';
import { ResolutionContext } from './context';
import { WILDCARD, describePath } from './segments';
import { childrenOf, inspectValue } from './value-shape';

/**
 * Match `rest` at the level of `value`'s children, and again at every level
 * below them. Results from all depths are flattened into one sequence,
 * shallower first, and are not deduplicated.
 *
 * With nothing left to match, the children themselves are the result: a
 * trailing wildcard goes one level down, not all the way.
 */
export function descend(
  context: ResolutionContext,
  value: unknown,
  rest: readonly Segment[],
  wildcardDepth = 0,
): unknown[] {
  const children = childrenOf(inspectValue(value));
  if (children === undefined) {
    return rest.length === 0 ? [value] : [];
  }
  if (rest.length === 0) {
    return children;
  }
  if (children.length === 0) {
    return [];
  }

  const here = broadcast(context, children, rest, true);
  if (wildcardDepth >= context.maxWildcardDepth) {
    context.logger.debug('Wildcard depth limit reached', {
      depth: wildcardDepth,
      path: describePath(rest),
    });
    return here;
  }
  const below = broadcast(context, children, [WILDCARD, ...rest], true, wildcardDepth + 1);
  return here.concat(below);
}
