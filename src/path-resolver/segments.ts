import { Key, Path, Segment } from '../types';
import { ValidationError } from '../errors/base';

/**
 * Selects a run of elements from an ordered collection. With every bound
 * absent it is the select-all marker, the only range that also applies to
 * associative collections.
 *
 * Bounds follow slice semantics: negative values count from the end, bounds
 * past either end are clamped, and a negative step walks backwards.
 */
export class RangeSelector {
  readonly kind = 'range' as const;

  constructor(
    public readonly start?: number,
    public readonly stop?: number,
    public readonly step?: number,
  ) {
    for (const [name, bound] of [
      ['start', start],
      ['stop', stop],
      ['step', step],
    ] as const) {
      if (bound !== undefined && !Number.isInteger(bound)) {
        throw new ValidationError(`Range ${name} must be an integer`, { [name]: bound });
      }
    }
    if (step === 0) {
      throw new ValidationError('Range step cannot be zero', { step });
    }
    Object.freeze(this);
  }

  get selectsAll(): boolean {
    return this.start === undefined && this.stop === undefined && this.step === undefined;
  }

  /**
   * The indices this range picks out of a collection of the given length, in order
   */
  indices(length: number): number[] {
    const step = this.step ?? 1;
    const lower = step < 0 ? -1 : 0;
    const upper = step < 0 ? length - 1 : length;
    const clamp = (bound: number | undefined, fallback: number): number => {
      if (bound === undefined) return fallback;
      if (bound < 0) return Math.max(bound + length, lower);
      return Math.min(bound, upper);
    };
    const start = clamp(this.start, step < 0 ? upper : lower);
    const stop = clamp(this.stop, step < 0 ? lower : upper);

    const result: number[] = [];
    for (let i = start; step > 0 ? i < stop : i > stop; i += step) {
      result.push(i);
    }
    return result;
  }

  toString(): string {
    if (this.selectsAll) return '[*]';
    const step = this.step === undefined ? '' : `:${this.step}`;
    return `[${this.start ?? ''}:${this.stop ?? ''}${step}]`;
  }
}

/**
 * Matches zero or more levels of nesting before the rest of the path applies
 */
export class WildcardSelector {
  static readonly instance = new WildcardSelector();

  readonly kind = 'wildcard' as const;

  private constructor() {
    Object.freeze(this);
  }

  toString(): string {
    return '**';
  }
}

export const SELECT_ALL = new RangeSelector();
export const WILDCARD = WildcardSelector.instance;

/**
 * Build a range selector; `range(1)` is everything from index 1 on
 */
export function range(start?: number, stop?: number, step?: number): RangeSelector {
  if (start === undefined && stop === undefined && step === undefined) {
    return SELECT_ALL;
  }
  return new RangeSelector(start, stop, step);
}

export function isRange(segment: Segment): segment is RangeSelector {
  return segment instanceof RangeSelector;
}

export function isWildcard(segment: Segment): segment is WildcardSelector {
  return segment instanceof WildcardSelector;
}

export function isKey(segment: Segment): segment is Key {
  return !isRange(segment) && !isWildcard(segment);
}

/**
 * Whether results gathered ahead of these segments must be flattened:
 * true as soon as a range or wildcard is still to come.
 */
export function requiresFlatten(rest: readonly Segment[]): boolean {
  return rest.some((segment) => isRange(segment) || isWildcard(segment));
}

/**
 * A bare segment is the same as a path of one segment
 */
export function normalizePath(path: Path): readonly Segment[] {
  return isSegmentList(path) ? path : [path];
}

function isSegmentList(path: Path): path is readonly Segment[] {
  return Array.isArray(path);
}

/**
 * Render a segment for error and log messages
 */
export function describeSegment(segment: Segment): string {
  if (isRange(segment) || isWildcard(segment)) return segment.toString();
  if (typeof segment === 'string') return JSON.stringify(segment);
  if (typeof segment === 'bigint') return `${segment}n`;
  return String(segment);
}

export function describePath(segments: readonly Segment[]): string {
  return `(${segments.map(describeSegment).join(', ')})`;
}
