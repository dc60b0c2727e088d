import { Path, ResolverOptions, Segment } from '../types';
import { Logger } from '../util/logger';
import { OptionsValidator } from '../util/options-validator';
import { LookupFailureError, ResolutionError, ShapeMismatchError } from '../errors/base';
import { PathExpression } from '../path-expression';
import { broadcast } from './broadcaster';
import { ResolutionContext } from './context';
import { descend } from './wildcard-descender';
import { Failure, Outcome, success } from './outcome';
import {
  describePath,
  describeSegment,
  isRange,
  isWildcard,
  normalizePath,
  requiresFlatten,
} from './segments';
import { inspectValue, lookupKey, selectRange } from './value-shape';
import { BoundQuery } from './bound-query';

/**
 * Resolves paths of keys, ranges and wildcards against nested values.
 *
 * Failures are values (`Outcome`) all the way down; only `resolve`, and the
 * helpers built on it, turn a failure into a thrown `ResolutionError`. A
 * failure inside a broadcast drops that element and never reaches the caller.
 *
 * @example
 * const resolver = new PathResolver();
 * resolver.resolve(data, ['things', SELECT_ALL, 'name']);
 * resolver.query(data, '**.properties');
 */
export class PathResolver implements ResolutionContext {
  readonly logger: Logger;
  readonly maxWildcardDepth: number;

  constructor(options: ResolverOptions = {}) {
    const resolved = OptionsValidator.validateResolverOptions(options);
    this.logger = resolved.logger.createNested('PathResolver');
    this.maxWildcardDepth = resolved.maxWildcardDepth;
  }

  /**
   * Resolve a path, throwing if it cannot be resolved
   * @throws {LookupFailureError} If a key has no entry or an index is out of range
   * @throws {ShapeMismatchError} If a segment does not apply to the value it meets
   */
  resolve(value: unknown, path: Path): unknown {
    const segments = normalizePath(path);
    const outcome = this.tryResolve(value, segments);
    if (!outcome.ok) {
      throw this.toError(outcome.failure, segments);
    }
    return outcome.value;
  }

  /**
   * Resolve a path, reporting failure in the result instead of throwing
   */
  tryResolve(value: unknown, path: Path): Outcome {
    const segments = normalizePath(path);
    this.logger.debug('Resolving path', { path: describePath(segments) });
    const outcome = this.step(value, segments);
    if (!outcome.ok) {
      this.logger.debug('Path did not resolve', {
        path: describePath(segments),
        reason: outcome.failure.message,
      });
    }
    return outcome;
  }

  /**
   * Check if a path resolves against a value
   */
  has(value: unknown, path: Path): boolean {
    return this.tryResolve(value, path).ok;
  }

  /**
   * Resolve a path, or return `fallback` if it does not resolve
   */
  getOr(value: unknown, path: Path, fallback: unknown): unknown {
    const outcome = this.tryResolve(value, path);
    return outcome.ok ? outcome.value : fallback;
  }

  /**
   * Parse a path expression such as `things[1:].name` and resolve it
   * @throws {PathSyntaxError} If the expression is malformed
   */
  query(value: unknown, expression: string): unknown {
    return this.resolve(value, PathExpression.parse(expression));
  }

  /**
   * Bind a value so that several paths can be resolved against it
   */
  bind(value: unknown): BoundQuery {
    return new BoundQuery(this, value);
  }

  step(value: unknown, path: readonly Segment[], wildcardDepth = 0): Outcome {
    if (path.length === 0) {
      return success(value);
    }

    const [first, ...rest] = path;

    if (isWildcard(first)) {
      return success(descend(this, value, rest, wildcardDepth));
    }

    if (isRange(first)) {
      const selected = selectRange(inspectValue(value), first);
      if (!selected.ok || rest.length === 0) {
        return selected;
      }
      return success(broadcast(this, selected.value, rest, requiresFlatten(rest)));
    }

    const found = lookupKey(inspectValue(value), first);
    if (!found.ok || rest.length === 0) {
      return found;
    }
    return this.step(found.value, rest);
  }

  private toError(failure: Failure, segments: readonly Segment[]): ResolutionError {
    const context = {
      segment: describeSegment(failure.segment),
      path: describePath(segments),
    };
    return failure.kind === 'lookup'
      ? new LookupFailureError(failure.message, context)
      : new ShapeMismatchError(failure.message, context);
  }
}

export const defaultResolver = new PathResolver();

export function resolve(value: unknown, path: Path, options?: ResolverOptions): unknown {
  return resolverFor(options).resolve(value, path);
}

export function tryResolve(value: unknown, path: Path, options?: ResolverOptions): Outcome {
  return resolverFor(options).tryResolve(value, path);
}

export function has(value: unknown, path: Path): boolean {
  return defaultResolver.has(value, path);
}

export function getOr(value: unknown, path: Path, fallback: unknown): unknown {
  return defaultResolver.getOr(value, path, fallback);
}

export function query(value: unknown, expression: string): unknown {
  return defaultResolver.query(value, expression);
}

function resolverFor(options?: ResolverOptions): PathResolver {
  return options ? new PathResolver(options) : defaultResolver;
}
