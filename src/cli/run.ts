/**
 * Command dispatch for the argsolve CLI.
 */

import { PROBLEM_CODES } from '../query/index.js';
import { createCliApp, type CliAppOptions } from './app.js';
import { handleSolveCommand } from './commands/solve.js';
import { getVersionFromPackageJson, handleVersionCommand } from './commands/version.js';
import { runWithErrorHandling } from './utils/errorHandling.js';

/**
 * Returns the usage text.
 */
export function helpText(): string {
  return `
argsolve v${getVersionFromPackageJson()}

Decides acceptance and verification problems over abstract argumentation
frameworks under complete and stable semantics.

USAGE:
  argsolve -f <file> -p <problem> [-a <arguments>]

OPTIONS:
  -f, --file <file>            APX file with 'arg(name).' and 'att(name1,name2).' lines
  -p, --problem <problem>      One of ${PROBLEM_CODES.join(', ')}
  -a, --arguments <a1,a2,...>  Query set for VE-* problems (omit for the empty set),
                               exactly one argument for DC-* and DS-* problems
  -h, --help                   Show this help message
  -v, --version                Show version information

CONFIGURATION:
  argsolve.toml in the working directory ([search] order, max_steps; [log] debug),
  overridden by ARGSOLVE_SEARCH_ORDER, ARGSOLVE_SEARCH_MAX_STEPS, ARGSOLVE_LOG_DEBUG.

EXAMPLES:
  argsolve -f af.apx -p VE-CO -a a,c
  argsolve -f af.apx -p DC-ST -a a
  argsolve -f af.apx -p VE-ST
`;
}

/**
 * Runs the CLI and returns the exit code.
 *
 * Prints `YES` or `NO` for a query, help or version text on request, and
 * `Error: <message>` on stderr for any failure.
 *
 * @param options - Process-level inputs; defaults to the real process.
 * @returns The exit code.
 */
export async function runCli(options: CliAppOptions = {}): Promise<number> {
  const args = options.args ?? process.argv.slice(2);

  if (args.length === 0 || args.includes('--help') || args.includes('-h')) {
    console.log(helpText());
    return 0;
  }

  if (args.includes('--version') || args.includes('-v')) {
    return runWithErrorHandling(() => handleVersionCommand());
  }

  return runWithErrorHandling(async () => {
    const context = createCliApp({ ...options, args });
    return await handleSolveCommand(context);
  });
}
