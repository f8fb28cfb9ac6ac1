/**
 * TOML configuration parser for argsolve.toml.
 *
 * @packageDocumentation
 */

import * as TOML from '@iarna/toml';
import { BRANCH_ORDERS, isBranchOrder, type BranchOrder } from '../semantics/index.js';
import { DEFAULT_CONFIG, DEFAULT_LOG, DEFAULT_SEARCH } from './defaults.js';
import type { Config, LogConfig, SearchConfig } from './types.js';

/**
 * Error class for configuration parsing errors.
 */
export class ConfigParseError extends Error {
  /** The original error that caused the parse failure, if any. */
  public readonly cause: Error | undefined;

  /**
   * Creates a new ConfigParseError.
   *
   * @param message - Descriptive error message.
   * @param cause - The underlying error, if any.
   */
  constructor(message: string, cause?: Error) {
    super(message);
    this.name = 'ConfigParseError';
    this.cause = cause;
  }
}

function isTable(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Validates that a value is a TOML table, if present.
 *
 * @param value - Value to validate.
 * @param fieldPath - Path to the field for error messages.
 * @returns The table, or `undefined` when the section is absent.
 * @throws ConfigParseError if value is present but not a table.
 */
function validateTable(value: unknown, fieldPath: string): Record<string, unknown> | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (!isTable(value)) {
    throw new ConfigParseError(
      `Invalid type for '${fieldPath}': expected table, got ${Array.isArray(value) ? 'array' : typeof value}`
    );
  }
  return value;
}

/**
 * Validates that a value is a string.
 *
 * @throws ConfigParseError if value is not a string.
 */
function validateString(value: unknown, fieldPath: string): string {
  if (typeof value !== 'string') {
    throw new ConfigParseError(
      `Invalid type for '${fieldPath}': expected string, got ${typeof value}`
    );
  }
  return value;
}

/**
 * Validates that a value is a number.
 *
 * @throws ConfigParseError if value is not a number.
 */
function validateNumber(value: unknown, fieldPath: string): number {
  if (typeof value !== 'number') {
    throw new ConfigParseError(
      `Invalid type for '${fieldPath}': expected number, got ${typeof value}`
    );
  }
  return value;
}

/**
 * Validates that a value is a boolean.
 *
 * @throws ConfigParseError if value is not a boolean.
 */
function validateBoolean(value: unknown, fieldPath: string): boolean {
  if (typeof value !== 'boolean') {
    throw new ConfigParseError(
      `Invalid type for '${fieldPath}': expected boolean, got ${typeof value}`
    );
  }
  return value;
}

/**
 * Validates a branching order name.
 *
 * @throws ConfigParseError if value is not a supported order.
 */
export function validateBranchOrder(value: string, fieldPath: string): BranchOrder {
  if (!isBranchOrder(value)) {
    throw new ConfigParseError(
      `Invalid value for '${fieldPath}': expected ${BRANCH_ORDERS.map((o) => `'${o}'`).join(' or ')}, got '${value}'`
    );
  }
  return value;
}

/**
 * Validates a step limit: a non-negative integer.
 *
 * @throws ConfigParseError if value is negative or fractional.
 */
export function validateStepLimit(value: number, fieldPath: string): number {
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new ConfigParseError(
      `Invalid value for '${fieldPath}': must be a non-negative integer, got ${String(value)}`
    );
  }
  return value;
}

/**
 * Parses search settings from raw TOML data.
 *
 * @param raw - Raw TOML object for the search section.
 * @returns Validated search settings merged with defaults.
 */
function parseSearch(raw: Record<string, unknown> | undefined): SearchConfig {
  const result: SearchConfig = { ...DEFAULT_SEARCH };
  if (raw === undefined) {
    return result;
  }

  if ('order' in raw) {
    result.order = validateBranchOrder(validateString(raw.order, 'search.order'), 'search.order');
  }
  if ('max_steps' in raw) {
    result.max_steps = validateStepLimit(
      validateNumber(raw.max_steps, 'search.max_steps'),
      'search.max_steps'
    );
  }

  return result;
}

/**
 * Parses logging settings from raw TOML data.
 *
 * @param raw - Raw TOML object for the log section.
 * @returns Validated logging settings merged with defaults.
 */
function parseLog(raw: Record<string, unknown> | undefined): LogConfig {
  const result: LogConfig = { ...DEFAULT_LOG };
  if (raw === undefined) {
    return result;
  }

  if ('debug' in raw) {
    result.debug = validateBoolean(raw.debug, 'log.debug');
  }

  return result;
}

/**
 * Parses a TOML string into a validated Config object.
 *
 * Unknown sections and keys are ignored.
 *
 * @param tomlContent - Raw TOML content as a string.
 * @returns Validated configuration object with defaults applied for missing fields.
 * @throws ConfigParseError for invalid TOML syntax or invalid field values.
 *
 * @example
 * ```typescript
 * const config = parseConfig(`
 * [search]
 * order = "name"
 * max_steps = 100000
 * `);
 * config.search.order; // "name"
 * config.log.debug; // false
 * ```
 */
export function parseConfig(tomlContent: string): Config {
  let parsed: Record<string, unknown>;

  try {
    parsed = TOML.parse(tomlContent);
  } catch (error) {
    const tomlError = error instanceof Error ? error : new Error(String(error));
    throw new ConfigParseError(`Invalid TOML syntax: ${tomlError.message}`, tomlError);
  }

  return {
    search: parseSearch(validateTable(parsed.search, 'search')),
    log: parseLog(validateTable(parsed.log, 'log')),
  };
}

/**
 * Returns a fresh copy of the default configuration.
 */
export function getDefaultConfig(): Config {
  return {
    search: { ...DEFAULT_CONFIG.search },
    log: { ...DEFAULT_CONFIG.log },
  };
}
