/**
 * Solve command: answers one query over an APX file.
 *
 * Prints `YES` or `NO` on stdout.
 */

import { existsSync } from 'node:fs';
import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { readFramework } from '../../apx/index.js';
import { ArityError, describeProblem, evaluate, parseProblemCode } from '../../query/index.js';
import { CliUsageError, parseSolveArgs } from '../args.js';
import type { CliCommandResult, CliContext } from '../types.js';

/**
 * Formats an answer the way the solver prints it.
 */
export function formatAnswer(answer: boolean): 'YES' | 'NO' {
  return answer ? 'YES' : 'NO';
}

/**
 * Handles the solve command.
 *
 * Options and the target arity are checked before the file is read.
 *
 * @param context - The CLI context.
 * @returns A promise resolving to the command result.
 * @throws CliUsageError, QueryError, ApxParseError, MalformedFrameworkError or
 *   SearchAbortedError; the caller reports them.
 */
export async function handleSolveCommand(context: CliContext): Promise<CliCommandResult> {
  const options = parseSolveArgs(context.args);
  const problem = parseProblemCode(options.problem);
  const target = new Set(options.arguments);

  if (describeProblem(problem).arity === 'single' && target.size !== 1) {
    throw new ArityError(problem, target.size);
  }

  const filePath = resolve(context.cwd, options.file);
  if (!existsSync(filePath)) {
    throw new CliUsageError(`The file ${options.file} does not exist.`);
  }

  const framework = readFramework(await readFile(filePath, 'utf-8'));
  context.logger.debug('framework_loaded', {
    file: options.file,
    arguments: framework.size(),
    attacks: framework.attacks.length,
  });

  const answer = evaluate(framework, problem, target, {
    order: context.config.search.order,
    maxSteps: context.config.search.max_steps,
    logger: context.logger,
  });

  console.log(formatAnswer(answer));
  return { exitCode: 0 };
}
