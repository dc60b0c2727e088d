import { Segment } from '../types';
import { ValidationError } from '../errors/base';
import {
  RangeSelector,
  SELECT_ALL,
  WILDCARD,
  isRange,
  isWildcard,
} from '../path-resolver/segments';
import { PathSyntaxError } from './errors';

const IDENTIFIER = /^[a-zA-Z_$][a-zA-Z0-9_$]*$/;
const INTEGER = /^-?[0-9]+$/;

/**
 * Parses and formats the string form of a path
 */
export class PathExpression {
  /**
   * Parse a path expression into segments
   * Examples:
   * "things[1].id" -> ['things', 1, 'id']
   * "things[1:].name" -> ['things', range(1), 'name']
   * "[*][0].id" -> [SELECT_ALL, 0, 'id']
   * "**.properties" -> [WILDCARD, 'properties']
   * "meta['content-type']" -> ['meta', 'content-type']
   * @throws {PathSyntaxError} If the path syntax is invalid
   */
  static parse(path: string): Segment[] {
    const segments: Segment[] = [];

    if (path.startsWith('.')) {
      throw new PathSyntaxError('Path cannot start with .', path, 0);
    }

    let i = 0;
    while (i < path.length) {
      const char = path[i];

      if (char === '[') {
        const close = this.findClosingBracket(path, i);
        segments.push(this.parseBracket(path.slice(i + 1, close), path, i));
        i = close + 1;
        continue;
      }

      if (char === ']') {
        throw new PathSyntaxError(`Unexpected ] at position ${i}`, path, i);
      }

      if (char === '.') {
        if (path[i - 1] === '.') {
          throw new PathSyntaxError('Consecutive dots are not allowed', path, i);
        }
        if (i === path.length - 1) {
          throw new PathSyntaxError('Path cannot end with .', path, i);
        }
        if (path[i + 1] === '[') {
          throw new PathSyntaxError(`Unexpected [ after . at position ${i + 1}`, path, i + 1);
        }
        i++;
        continue;
      }

      if (i > 0 && path[i - 1] !== '.') {
        throw new PathSyntaxError(`Unexpected character '${char}' at position ${i}`, path, i);
      }

      let end = i;
      while (end < path.length && path[end] !== '.' && path[end] !== '[' && path[end] !== ']') {
        end++;
      }
      segments.push(this.parseToken(path.slice(i, end), path, i));
      i = end;
    }

    return segments;
  }

  /**
   * Format segments as a path expression that parses back to the same segments
   * @throws {ValidationError} If a key has no expression form
   */
  static format(segments: readonly Segment[]): string {
    return segments
      .map((segment, i) => {
        if (isWildcard(segment)) {
          return i === 0 ? '**' : '.**';
        }
        if (isRange(segment)) {
          return segment.toString();
        }
        if (typeof segment === 'number' && Number.isInteger(segment)) {
          return `[${segment}]`;
        }
        if (typeof segment === 'string') {
          if (IDENTIFIER.test(segment)) {
            return i === 0 ? segment : `.${segment}`;
          }
          return `[${this.quote(segment)}]`;
        }
        throw new ValidationError('Key cannot be written as a path expression', {
          key: String(segment),
          type: typeof segment,
        });
      })
      .join('');
  }

  private static findClosingBracket(path: string, open: number): number {
    let quoteChar: string | null = null;
    for (let i = open + 1; i < path.length; i++) {
      const char = path[i];
      if (quoteChar) {
        if (char === quoteChar) quoteChar = null;
        continue;
      }
      if (char === '"' || char === "'") {
        quoteChar = char;
      } else if (char === ']') {
        return i;
      } else if (char === '[') {
        throw new PathSyntaxError(`Nested brackets are not allowed at position ${i}`, path, i);
      }
    }
    if (quoteChar) {
      throw new PathSyntaxError('Unclosed quote', path);
    }
    throw new PathSyntaxError('Unclosed [', path);
  }

  private static parseBracket(content: string, path: string, position: number): Segment {
    if (content === '') {
      throw new PathSyntaxError('Empty brackets are not allowed', path, position);
    }

    const first = content[0];
    if (first === '"' || first === "'") {
      if (content.length < 2 || !content.endsWith(first) || content.slice(1, -1).includes(first)) {
        throw new PathSyntaxError(
          `Invalid quoted key at position ${position}: ${content}`,
          path,
          position,
        );
      }
      return content.slice(1, -1);
    }

    if (content === '*') {
      return SELECT_ALL;
    }

    if (INTEGER.test(content)) {
      return parseInt(content, 10);
    }

    if (content.includes(':')) {
      return this.parseRange(content, path, position);
    }

    throw new PathSyntaxError(
      `Invalid bracket content at position ${position}: ${content}`,
      path,
      position,
    );
  }

  private static parseRange(content: string, path: string, position: number): RangeSelector {
    const parts = content.split(':');
    if (parts.length > 3) {
      throw new PathSyntaxError(`Too many : in range at position ${position}`, path, position);
    }

    const bounds = parts.map((part) => {
      if (part === '') return undefined;
      if (!INTEGER.test(part)) {
        throw new PathSyntaxError(
          `Invalid range bound '${part}' at position ${position}`,
          path,
          position,
        );
      }
      return parseInt(part, 10);
    });
    const [start, stop, step] = bounds;

    if (step === 0) {
      throw new PathSyntaxError(
        `Range step cannot be zero at position ${position}`,
        path,
        position,
      );
    }
    if (start === undefined && stop === undefined && step === undefined) {
      return SELECT_ALL;
    }
    return new RangeSelector(start, stop, step);
  }

  private static parseToken(token: string, path: string, position: number): Segment {
    if (token === '**') {
      return WILDCARD;
    }
    if (token === '*') {
      return SELECT_ALL;
    }
    if (/^[0-9]/.test(token)) {
      throw new PathSyntaxError(
        'Array indices must use bracket notation (e.g. [0] instead of .0)',
        path,
        position,
      );
    }
    for (let j = 0; j < token.length; j++) {
      if (!/[a-zA-Z0-9_$]/.test(token[j])) {
        throw new PathSyntaxError(
          `Invalid character '${token[j]}' in property name at position ${position + j}`,
          path,
          position + j,
        );
      }
    }
    return token;
  }

  private static quote(key: string): string {
    if (!key.includes('"')) return `"${key}"`;
    if (!key.includes("'")) return `'${key}'`;
    throw new ValidationError(
      'Key with both quote characters cannot be written as a path expression',
      { key },
    );
  }
}
