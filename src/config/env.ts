/**
 * Environment variable overrides for configuration.
 *
 * Provides support for ARGSOLVE_* environment variables to override
 * configuration values at runtime.
 *
 * Override precedence: env > config file > defaults
 *
 * @packageDocumentation
 */

import { ConfigParseError, validateBranchOrder, validateStepLimit } from './parser.js';
import type { Config, PartialConfig } from './types.js';

/**
 * Type for environment record (matching process.env structure).
 */
export type EnvRecord = Record<string, string | undefined>;

/**
 * Error class for environment variable coercion errors.
 */
export class EnvCoercionError extends Error {
  /** The environment variable name that failed coercion. */
  public readonly envVar: string;
  /** The raw value from the environment variable. */
  public readonly rawValue: string;
  /** The expected type for the value. */
  public readonly expectedType: string;

  /**
   * Creates a new EnvCoercionError.
   *
   * @param envVar - The environment variable name.
   * @param rawValue - The raw string value from the environment.
   * @param expectedType - The type the value should be coerced to.
   * @param message - Optional detailed error message.
   */
  constructor(envVar: string, rawValue: string, expectedType: string, message?: string) {
    const defaultMessage = `Cannot coerce environment variable '${envVar}' value '${rawValue}' to ${expectedType}`;
    super(message ?? defaultMessage);
    this.name = 'EnvCoercionError';
    this.envVar = envVar;
    this.rawValue = rawValue;
    this.expectedType = expectedType;
  }
}

/**
 * Coerces a string value to a number.
 *
 * @throws EnvCoercionError if the value cannot be converted to a valid number.
 */
function coerceToNumber(value: string, envVar: string): number {
  const trimmed = value.trim();

  if (trimmed === '') {
    throw new EnvCoercionError(envVar, value, 'number', `Empty value for '${envVar}'`);
  }

  const num = Number(trimmed);

  if (Number.isNaN(num)) {
    throw new EnvCoercionError(envVar, value, 'number');
  }

  return num;
}

/**
 * Coerces a string value to a boolean.
 *
 * Accepts 'true', '1', 'yes', 'on' for true and 'false', '0', 'no', 'off'
 * for false, case-insensitively.
 *
 * @throws EnvCoercionError if the value cannot be converted to a boolean.
 */
function coerceToBoolean(value: string, envVar: string): boolean {
  const trimmed = value.trim().toLowerCase();

  const truthy = ['true', '1', 'yes', 'on'];
  const falsy = ['false', '0', 'no', 'off'];

  if (truthy.includes(trimmed)) {
    return true;
  }

  if (falsy.includes(trimmed)) {
    return false;
  }

  throw new EnvCoercionError(
    envVar,
    value,
    'boolean',
    `Cannot coerce '${envVar}' value '${value}' to boolean. Expected one of: ${[...truthy, ...falsy].join(', ')}`
  );
}

/**
 * Reruns a config-file validator, reporting failures as coercion errors.
 */
function withinEnv<T>(envVar: string, value: string, expectedType: string, check: () => T): T {
  try {
    return check();
  } catch (error) {
    if (error instanceof ConfigParseError) {
      throw new EnvCoercionError(
        envVar,
        value,
        expectedType,
        `Invalid value for '${envVar}': ${error.message}`
      );
    }
    throw error;
  }
}

interface EnvMapping {
  readonly description: string;
  readonly type: 'string' | 'number' | 'boolean';
  readonly apply: (overrides: PartialConfig, value: string, envVar: string) => void;
}

/**
 * Mapping from environment variable names to config fields.
 *
 * Format: ARGSOLVE_<SECTION>_<FIELD> maps to config.<section>.<field>;
 * ARGSOLVE_DEBUG is a shortcut for ARGSOLVE_LOG_DEBUG.
 */
const ENV_VAR_MAPPINGS: ReadonlyMap<string, EnvMapping> = new Map<string, EnvMapping>([
  [
    'ARGSOLVE_SEARCH_ORDER',
    {
      description: 'Override the branching order (insertion, name)',
      type: 'string',
      apply: (overrides, value, envVar) => {
        const order = withinEnv(envVar, value, 'branch order', () =>
          validateBranchOrder(value.trim(), 'search.order')
        );
        overrides.search = { ...overrides.search, order };
      },
    },
  ],
  [
    'ARGSOLVE_SEARCH_MAX_STEPS',
    {
      description: 'Override the search step limit (0 = unlimited)',
      type: 'number',
      apply: (overrides, value, envVar) => {
        const maxSteps = withinEnv(envVar, value, 'non-negative integer', () =>
          validateStepLimit(coerceToNumber(value, envVar), 'search.max_steps')
        );
        overrides.search = { ...overrides.search, max_steps: maxSteps };
      },
    },
  ],
  [
    'ARGSOLVE_LOG_DEBUG',
    {
      description: 'Enable or disable debug logging (true/false)',
      type: 'boolean',
      apply: (overrides, value, envVar) => {
        overrides.log = { ...overrides.log, debug: coerceToBoolean(value, envVar) };
      },
    },
  ],
  [
    'ARGSOLVE_DEBUG',
    {
      description: 'Enable or disable debug logging (shortcut for ARGSOLVE_LOG_DEBUG)',
      type: 'boolean',
      apply: (overrides, value, envVar) => {
        overrides.log = { ...overrides.log, debug: coerceToBoolean(value, envVar) };
      },
    },
  ],
]);

/**
 * Result of reading environment variable overrides.
 */
export interface EnvOverrideResult {
  /** Partial configuration with values from environment variables. */
  overrides: PartialConfig;
  /** List of environment variables that were applied. */
  appliedVars: string[];
  /** List of any coercion errors encountered. */
  errors: EnvCoercionError[];
}

/**
 * Reads environment variables and returns configuration overrides.
 *
 * Variables are applied in table order, so a later entry wins when two
 * variables target the same field.
 *
 * @param env - The environment object to read from.
 * @param options - Set `collectErrors` to gather coercion errors instead of throwing.
 * @returns Result containing overrides and any errors.
 *
 * @example
 * ```typescript
 * const result = readEnvOverrides({ ARGSOLVE_SEARCH_ORDER: 'name' });
 * result.overrides.search?.order; // "name"
 * ```
 */
export function readEnvOverrides(
  env: EnvRecord,
  options: { collectErrors?: boolean } = {}
): EnvOverrideResult {
  const { collectErrors = false } = options;

  const overrides: PartialConfig = {};
  const appliedVars: string[] = [];
  const errors: EnvCoercionError[] = [];

  for (const [envVar, mapping] of ENV_VAR_MAPPINGS) {
    const value = env[envVar];

    if (value === undefined || value === '') {
      continue;
    }

    try {
      mapping.apply(overrides, value, envVar);
      appliedVars.push(envVar);
    } catch (error) {
      if (error instanceof EnvCoercionError && collectErrors) {
        errors.push(error);
      } else {
        throw error;
      }
    }
  }

  return { overrides, appliedVars, errors };
}

/**
 * Applies environment variable overrides to a configuration.
 *
 * @param config - The base configuration to override.
 * @param env - The environment object to read from.
 * @returns A new configuration with environment overrides applied.
 * @throws EnvCoercionError if an environment variable cannot be coerced.
 */
export function applyEnvOverrides(config: Config, env: EnvRecord): Config {
  const { overrides } = readEnvOverrides(env);

  return mergeConfig(config, overrides);
}

/**
 * Merges a partial configuration into a full configuration.
 *
 * @param base - The base configuration.
 * @param partial - The partial configuration to merge.
 * @returns A new configuration with partial values merged in.
 */
export function mergeConfig(base: Config, partial: PartialConfig): Config {
  return {
    search: {
      ...base.search,
      ...partial.search,
    },
    log: {
      ...base.log,
      ...partial.log,
    },
  };
}

/**
 * Gets documentation for all supported environment variables.
 *
 * @returns Documentation object mapping env var names to descriptions.
 */
export function getEnvVarDocumentation(): Record<string, { description: string; type: string }> {
  const docs: Record<string, { description: string; type: string }> = {};
  for (const [envVar, mapping] of ENV_VAR_MAPPINGS) {
    docs[envVar] = { description: mapping.description, type: mapping.type };
  }
  return docs;
}
