/**
 * Configuration module for argsolve.toml parsing and validation.
 *
 * Override precedence: env > config file > defaults
 *
 * @packageDocumentation
 */

export {
  ConfigParseError,
  getDefaultConfig,
  parseConfig,
  validateBranchOrder,
  validateStepLimit,
} from './parser.js';
export type { Config, LogConfig, PartialConfig, SearchConfig } from './types.js';
export { CONFIG_FILE_NAME, DEFAULT_CONFIG, DEFAULT_LOG, DEFAULT_SEARCH } from './defaults.js';
export {
  EnvCoercionError,
  applyEnvOverrides,
  getEnvVarDocumentation,
  mergeConfig,
  readEnvOverrides,
} from './env.js';
export type { EnvOverrideResult, EnvRecord } from './env.js';
