/**
 * Default configuration values for argsolve.toml.
 *
 * @packageDocumentation
 */

import type { Config, LogConfig, SearchConfig } from './types.js';

/**
 * Name of the configuration file looked up in the working directory.
 */
export const CONFIG_FILE_NAME = 'argsolve.toml';

/**
 * Default search settings: insertion order, no step limit.
 */
export const DEFAULT_SEARCH: SearchConfig = {
  order: 'insertion',
  max_steps: 0,
};

/**
 * Default logging settings (debug off).
 */
export const DEFAULT_LOG: LogConfig = {
  debug: false,
};

/**
 * Complete default configuration.
 */
export const DEFAULT_CONFIG: Config = {
  search: DEFAULT_SEARCH,
  log: DEFAULT_LOG,
};
