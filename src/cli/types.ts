/**
 * CLI types and interfaces for the argsolve CLI.
 */

import type { Config } from '../config/index.js';
import type { Logger } from '../utils/logger.js';

/**
 * CLI command context.
 */
export interface CliContext {
  /**
   * Command-line arguments, without the node executable and script path.
   */
  args: string[];

  /**
   * Directory relative paths are resolved against.
   */
  cwd: string;

  /**
   * Effective configuration (defaults, argsolve.toml, then environment).
   */
  config: Config;

  /**
   * Logger for diagnostics on stderr.
   */
  logger: Logger;
}

/**
 * Result of a CLI command execution.
 */
export interface CliCommandResult {
  /**
   * Exit code (0 for success, non-zero for error).
   */
  exitCode: number;
}
