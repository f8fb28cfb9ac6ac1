/**
 * Shared error handling utilities for CLI commands.
 */

import type { CliCommandResult } from '../types.js';

/**
 * Runs a command handler and converts its outcome to an exit code.
 *
 * On success the result's exit code is returned. Any thrown error is
 * printed as `Error: <message>` on stderr and yields exit code 1.
 *
 * @param fn - The function to run (sync or async).
 * @returns The exit code.
 */
export async function runWithErrorHandling(
  fn: () => CliCommandResult | Promise<CliCommandResult>
): Promise<number> {
  try {
    const result = await fn();
    return result.exitCode;
  } catch (error) {
    if (error instanceof Error) {
      console.error(`Error: ${error.message}`);
    } else {
      console.error(`Error: ${String(error)}`);
    }
    return 1;
  }
}
