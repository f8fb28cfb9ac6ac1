/**
 * Application context for the argsolve CLI.
 */

import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import {
  CONFIG_FILE_NAME,
  ConfigParseError,
  getDefaultConfig,
  mergeConfig,
  parseConfig,
  readEnvOverrides,
  type Config,
  type EnvRecord,
} from '../config/index.js';
import { Logger } from '../utils/logger.js';
import type { CliContext } from './types.js';

/**
 * Options for creating the CLI context.
 */
export interface CliAppOptions {
  /** Command-line arguments. @defaultValue process.argv.slice(2) */
  args?: string[] | undefined;
  /** Working directory holding argsolve.toml. @defaultValue process.cwd() */
  cwd?: string | undefined;
  /** Environment for ARGSOLVE_* overrides. @defaultValue process.env */
  env?: EnvRecord | undefined;
  /** Destination for log lines. @defaultValue stderr */
  write?: ((line: string) => void) | undefined;
}

/**
 * Creates and initializes the CLI application context.
 *
 * Reads argsolve.toml from the working directory when present, then
 * applies ARGSOLVE_* environment overrides. An unreadable config file or an
 * invalid environment value is reported as a warning and skipped.
 *
 * @param options - Overrides for process-level inputs.
 * @returns The CLI context.
 */
export function createCliApp(options: CliAppOptions = {}): CliContext {
  const cwd = options.cwd ?? process.cwd();
  const env = options.env ?? process.env;
  const warnings: { event: string; data: Record<string, unknown> }[] = [];

  let config: Config = getDefaultConfig();
  const configFilePath = join(cwd, CONFIG_FILE_NAME);

  if (existsSync(configFilePath)) {
    try {
      config = parseConfig(readFileSync(configFilePath, 'utf-8'));
    } catch (error) {
      const errorMessage = error instanceof ConfigParseError ? error.message : String(error);
      warnings.push({
        event: 'config_load_failed',
        data: { path: configFilePath, error: errorMessage },
      });
    }
  }

  const { overrides, errors } = readEnvOverrides(env, { collectErrors: true });
  config = mergeConfig(config, overrides);
  for (const error of errors) {
    warnings.push({
      event: 'env_override_ignored',
      data: { envVar: error.envVar, error: error.message },
    });
  }

  const logger = new Logger({ component: 'cli', debugMode: config.log.debug, write: options.write });
  for (const { event, data } of warnings) {
    logger.warn(event, data);
  }
  logger.debug('config_loaded', { search: config.search, log: config.log });

  return {
    args: options.args ?? process.argv.slice(2),
    cwd,
    config,
    logger,
  };
}
