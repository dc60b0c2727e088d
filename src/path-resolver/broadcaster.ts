import { Segment } from '../types';
import { ResolutionContext } from './context';
import { describePath } from './segments';

/**
 * Resolve `rest` against every element, in order. Elements that fail are left
 * out. With `flatten` each element's result is a sequence and its items are
 * appended one by one.
 */
export function broadcast(
  context: ResolutionContext,
  elements: readonly unknown[],
  rest: readonly Segment[],
  flatten: boolean,
  wildcardDepth = 0,
): unknown[] {
  const results: unknown[] = [];
  elements.forEach((element, index) => {
    const outcome = context.step(element, rest, wildcardDepth);
    if (!outcome.ok) {
      context.logger.debug('Skipping element', {
        index,
        path: describePath(rest),
        reason: outcome.failure.message,
      });
      return;
    }
    if (flatten && Array.isArray(outcome.value)) {
      for (const item of outcome.value) {
        results.push(item);
      }
    } else {
      results.push(outcome.value);
    }
  });
  return results;
}
