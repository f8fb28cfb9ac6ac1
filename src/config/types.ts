/**
 * Configuration types for argsolve.toml.
 *
 * @packageDocumentation
 */

import type { BranchOrder } from '../semantics/index.js';

/**
 * Labelling search settings.
 */
export interface SearchConfig {
  /** Branching order over arguments. */
  order: BranchOrder;
  /** Maximum number of search nodes per query; 0 means unlimited. */
  max_steps: number;
}

/**
 * Logging settings.
 */
export interface LogConfig {
  /** Whether debug entries are written to stderr. */
  debug: boolean;
}

/**
 * Complete configuration object parsed from argsolve.toml.
 */
export interface Config {
  /** Labelling search settings. */
  search: SearchConfig;
  /** Logging settings. */
  log: LogConfig;
}

/**
 * Partial configuration for merging with defaults.
 * All fields are optional.
 */
export interface PartialConfig {
  search?: Partial<SearchConfig>;
  log?: Partial<LogConfig>;
}
