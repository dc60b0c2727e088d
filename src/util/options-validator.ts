import { ResolverOptions, ResolvedResolverOptions } from '../types';
import { DEFAULT_RESOLVER_OPTIONS } from '../constants/limits';
import { ValidationError } from '../errors/base';

/**
 * Utility class for validating resolver options
 */
export class OptionsValidator {
  /**
   * Validates a wildcard depth cap and returns it
   *
   * @param depth - The cap to validate
   * @param defaultValue - Used when depth is undefined
   * @throws ValidationError if the cap is not a non-negative integer or Infinity
   */
  static validateMaxWildcardDepth(
    depth: unknown,
    defaultValue: number = DEFAULT_RESOLVER_OPTIONS.maxWildcardDepth,
  ): number {
    if (depth === undefined) {
      return defaultValue;
    }

    if (typeof depth !== 'number' || Number.isNaN(depth)) {
      throw new ValidationError('maxWildcardDepth must be a number', {
        value: depth,
        type: typeof depth,
      });
    }

    if (depth === Infinity) {
      return depth;
    }

    if (!Number.isInteger(depth) || depth < 0) {
      throw new ValidationError('maxWildcardDepth must be a non-negative integer or Infinity', {
        value: depth,
      });
    }

    return depth;
  }

  /**
   * Validates resolver options and returns a complete copy with defaults filled in
   */
  static validateResolverOptions(options: ResolverOptions = {}): ResolvedResolverOptions {
    return {
      logger: options.logger ?? DEFAULT_RESOLVER_OPTIONS.logger,
      maxWildcardDepth: this.validateMaxWildcardDepth(options.maxWildcardDepth),
    };
  }
}
