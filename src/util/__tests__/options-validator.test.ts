import { OptionsValidator } from '../options-validator';
import { DEFAULT_RESOLVER_OPTIONS, DEFAULT_MAX_WILDCARD_DEPTH } from '../../constants/limits';
import { ValidationError } from '../../errors/base';
import { TestLogger, noLogger } from '../logger';

describe('OptionsValidator', () => {
  describe('validateMaxWildcardDepth', () => {
    it('returns the default when no value is provided', () => {
      expect(OptionsValidator.validateMaxWildcardDepth(undefined)).toBe(DEFAULT_MAX_WILDCARD_DEPTH);
      expect(OptionsValidator.validateMaxWildcardDepth(undefined, 4)).toBe(4);
    });

    it('accepts non-negative integers and Infinity', () => {
      expect(OptionsValidator.validateMaxWildcardDepth(0)).toBe(0);
      expect(OptionsValidator.validateMaxWildcardDepth(12)).toBe(12);
      expect(OptionsValidator.validateMaxWildcardDepth(Infinity)).toBe(Infinity);
    });

    it('rejects non-numbers', () => {
      expect(() => OptionsValidator.validateMaxWildcardDepth('3')).toThrow(
        'maxWildcardDepth must be a number',
      );
      expect(() => OptionsValidator.validateMaxWildcardDepth(NaN)).toThrow(ValidationError);
    });

    it('rejects negative and fractional values', () => {
      expect(() => OptionsValidator.validateMaxWildcardDepth(-1)).toThrow(
        'maxWildcardDepth must be a non-negative integer or Infinity',
      );
      expect(() => OptionsValidator.validateMaxWildcardDepth(1.5)).toThrow(ValidationError);
      expect(() => OptionsValidator.validateMaxWildcardDepth(-Infinity)).toThrow(ValidationError);
    });

    it('reports the rejected value in the error context', () => {
      let error: ValidationError | undefined;
      try {
        OptionsValidator.validateMaxWildcardDepth(true);
      } catch (e) {
        if (!(e instanceof ValidationError)) throw e;
        error = e;
      }
      expect(error?.context).toEqual({ value: true, type: 'boolean' });
    });
  });

  describe('validateResolverOptions', () => {
    it('fills in defaults', () => {
      expect(OptionsValidator.validateResolverOptions()).toEqual(DEFAULT_RESOLVER_OPTIONS);
      expect(OptionsValidator.validateResolverOptions({}).logger).toBe(noLogger);
    });

    it('keeps provided values', () => {
      const logger = new TestLogger();
      expect(OptionsValidator.validateResolverOptions({ logger, maxWildcardDepth: 2 })).toEqual({
        logger,
        maxWildcardDepth: 2,
      });
    });
  });
});
