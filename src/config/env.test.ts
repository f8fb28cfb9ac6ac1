import { describe, expect, it } from 'vitest';
import fc from 'fast-check';
import {
  EnvCoercionError,
  readEnvOverrides,
  applyEnvOverrides,
  getEnvVarDocumentation,
  mergeConfig,
} from './env.js';
import { DEFAULT_CONFIG, parseConfig } from './index.js';

describe('Environment Variable Overrides', () => {
  describe('readEnvOverrides', () => {
    it('should read the branching order', () => {
      const result = readEnvOverrides({ ARGSOLVE_SEARCH_ORDER: ' name ' });

      expect(result.overrides.search?.order).toBe('name');
      expect(result.appliedVars).toEqual(['ARGSOLVE_SEARCH_ORDER']);
      expect(result.errors).toEqual([]);
    });

    it('should read the step limit with number coercion', () => {
      const result = readEnvOverrides({ ARGSOLVE_SEARCH_MAX_STEPS: '5000' });

      expect(result.overrides.search).toEqual({ max_steps: 5000 });
    });

    it('should combine fields of the same section', () => {
      const result = readEnvOverrides({
        ARGSOLVE_SEARCH_ORDER: 'name',
        ARGSOLVE_SEARCH_MAX_STEPS: '7',
      });

      expect(result.overrides.search).toEqual({ order: 'name', max_steps: 7 });
    });

    it('should let ARGSOLVE_DEBUG win over ARGSOLVE_LOG_DEBUG', () => {
      const result = readEnvOverrides({ ARGSOLVE_LOG_DEBUG: 'false', ARGSOLVE_DEBUG: '1' });

      expect(result.overrides.log?.debug).toBe(true);
      expect(result.appliedVars).toEqual(['ARGSOLVE_LOG_DEBUG', 'ARGSOLVE_DEBUG']);
    });

    it('should ignore unset, empty and unrelated variables', () => {
      const result = readEnvOverrides({
        ARGSOLVE_SEARCH_ORDER: '',
        ARGSOLVE_LOG_DEBUG: undefined,
        HOME: '/home/test',
      });

      expect(result.overrides).toEqual({});
      expect(result.appliedVars).toEqual([]);
    });

    describe('boolean coercion', () => {
      it.each([
        ['true', true],
        ['YES', true],
        ['On', true],
        ['1', true],
        ['false', false],
        ['no', false],
        ['OFF', false],
        ['0', false],
      ])('should coerce %s to %s', (value, expected) => {
        expect(readEnvOverrides({ ARGSOLVE_LOG_DEBUG: value }).overrides.log?.debug).toBe(
          expected
        );
      });

      it('should reject other values', () => {
        expect(() => readEnvOverrides({ ARGSOLVE_DEBUG: 'maybe' })).toThrow(
          "Cannot coerce 'ARGSOLVE_DEBUG' value 'maybe' to boolean. " +
            'Expected one of: true, 1, yes, on, false, 0, no, off'
        );
      });
    });

    describe('invalid values', () => {
      it('should reject a non-numeric step limit', () => {
        try {
          readEnvOverrides({ ARGSOLVE_SEARCH_MAX_STEPS: 'abc' });
          expect.fail('expected EnvCoercionError');
        } catch (error) {
          expect(error).toBeInstanceOf(EnvCoercionError);
          expect((error as EnvCoercionError).envVar).toBe('ARGSOLVE_SEARCH_MAX_STEPS');
          expect((error as EnvCoercionError).rawValue).toBe('abc');
          expect((error as EnvCoercionError).expectedType).toBe('number');
          expect((error as EnvCoercionError).message).toBe(
            "Cannot coerce environment variable 'ARGSOLVE_SEARCH_MAX_STEPS' value 'abc' to number"
          );
        }
      });

      it('should report config validation failures as coercion errors', () => {
        try {
          readEnvOverrides({ ARGSOLVE_SEARCH_MAX_STEPS: '-1' });
          expect.fail('expected EnvCoercionError');
        } catch (error) {
          expect(error).toBeInstanceOf(EnvCoercionError);
          expect((error as EnvCoercionError).expectedType).toBe('non-negative integer');
          expect((error as EnvCoercionError).message).toBe(
            "Invalid value for 'ARGSOLVE_SEARCH_MAX_STEPS': " +
              "Invalid value for 'search.max_steps': must be a non-negative integer, got -1"
          );
        }
        expect(() => readEnvOverrides({ ARGSOLVE_SEARCH_ORDER: 'random' })).toThrow(
          EnvCoercionError
        );
      });

      it('should collect errors and keep valid overrides when asked', () => {
        const result = readEnvOverrides(
          {
            ARGSOLVE_SEARCH_ORDER: 'random',
            ARGSOLVE_SEARCH_MAX_STEPS: '12',
            ARGSOLVE_LOG_DEBUG: 'perhaps',
          },
          { collectErrors: true }
        );

        expect(result.overrides).toEqual({ search: { max_steps: 12 } });
        expect(result.appliedVars).toEqual(['ARGSOLVE_SEARCH_MAX_STEPS']);
        expect(result.errors.map((error) => error.envVar)).toEqual([
          'ARGSOLVE_SEARCH_ORDER',
          'ARGSOLVE_LOG_DEBUG',
        ]);
      });
    });

    it('should never throw when collecting errors', () => {
      fc.assert(
        fc.property(
          fc.record({
            ARGSOLVE_SEARCH_ORDER: fc.string(),
            ARGSOLVE_SEARCH_MAX_STEPS: fc.string(),
            ARGSOLVE_DEBUG: fc.string(),
          }),
          (env) => {
            const result = readEnvOverrides(env, { collectErrors: true });
            expect(result.appliedVars.length + result.errors.length).toBeLessThanOrEqual(3);
          }
        )
      );
    });
  });

  describe('applyEnvOverrides', () => {
    it('should override config file values', () => {
      const fileConfig = parseConfig('[search]\norder = "name"\nmax_steps = 10\n');
      const config = applyEnvOverrides(fileConfig, { ARGSOLVE_SEARCH_MAX_STEPS: '0' });

      expect(config).toEqual({
        search: { order: 'name', max_steps: 0 },
        log: { debug: false },
      });
    });

    it('should leave the base config untouched', () => {
      const config = applyEnvOverrides(DEFAULT_CONFIG, { ARGSOLVE_DEBUG: 'true' });

      expect(config.log.debug).toBe(true);
      expect(DEFAULT_CONFIG.log.debug).toBe(false);
    });

    it('should throw on invalid values', () => {
      expect(() => applyEnvOverrides(DEFAULT_CONFIG, { ARGSOLVE_SEARCH_ORDER: 'x' })).toThrow(
        EnvCoercionError
      );
    });
  });

  describe('mergeConfig', () => {
    it('should return the base values when nothing is overridden', () => {
      expect(mergeConfig(DEFAULT_CONFIG, {})).toEqual(DEFAULT_CONFIG);
    });
  });

  describe('getEnvVarDocumentation', () => {
    it('should document every supported variable', () => {
      const docs = getEnvVarDocumentation();

      expect(Object.keys(docs)).toEqual([
        'ARGSOLVE_SEARCH_ORDER',
        'ARGSOLVE_SEARCH_MAX_STEPS',
        'ARGSOLVE_LOG_DEBUG',
        'ARGSOLVE_DEBUG',
      ]);
      expect(docs.ARGSOLVE_SEARCH_MAX_STEPS?.type).toBe('number');
      expect(docs.ARGSOLVE_DEBUG?.type).toBe('boolean');
    });
  });
});
