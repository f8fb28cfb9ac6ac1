/**
 * Query engine: evaluates a problem code against a framework.
 *
 * VE-* problems check the candidate set directly. DC-* and DS-* problems
 * drive the labelling search seeded with a label for the target: credulous
 * queries seed it IN and stop at the first extension, skeptical queries look
 * for a counterexample seeded OUT or UNDEC (OUT only under stable
 * semantics). When no stable extension exists DC-ST answers `false` and
 * DS-ST answers `true` (the universal claim holds vacuously).
 *
 * @packageDocumentation
 */

import type { Argument, Framework } from '../framework/index.js';
import {
  findLabelling,
  isComplete,
  isStable,
  type Label,
  type SearchOptions,
  type Semantics,
} from '../semantics/index.js';
import { logger as defaultLogger } from '../utils/logger.js';
import { ArityError, UnknownArgumentError } from './errors.js';
import { describeProblem, type ProblemCode, type ProblemDescriptor } from './problems.js';

/**
 * Options for {@link evaluate}. Semantics and seed come from the query.
 */
export type EvaluateOptions = Omit<SearchOptions, 'semantics' | 'seed'>;

/**
 * A validated query target.
 */
type Target =
  | { readonly arity: 'set'; readonly members: ReadonlySet<Argument> }
  | { readonly arity: 'single'; readonly argument: Argument };

function resolveTarget(
  framework: Framework,
  problem: ProblemDescriptor,
  target: Iterable<Argument>
): Target {
  const members = new Set(target);

  if (problem.arity === 'single' && members.size !== 1) {
    throw new ArityError(problem.code, members.size);
  }

  const missing = [...members].filter((argument) => !framework.contains(argument));
  if (missing.length > 0) {
    throw new UnknownArgumentError(missing);
  }

  if (problem.arity === 'single') {
    const argument = [...members][0];
    if (argument === undefined) {
      throw new ArityError(problem.code, 0);
    }
    return { arity: 'single', argument };
  }
  return { arity: 'set', members };
}

function verify(
  framework: Framework,
  semantics: Semantics,
  members: ReadonlySet<Argument>
): boolean {
  return semantics === 'stable' ? isStable(framework, members) : isComplete(framework, members);
}

/**
 * Whether some labelling gives `argument` one of `labels`. Each label seeds
 * its own search, so propagation from the target prunes before branching
 * and the first labelling found is a witness.
 */
function hasLabelling(
  framework: Framework,
  argument: Argument,
  labels: readonly Label[],
  options: SearchOptions
): boolean {
  return labels.some(
    (label) =>
      findLabelling(framework, () => true, {
        ...options,
        seed: new Map([[argument, label]]),
      }) !== undefined
  );
}

/**
 * Decides a query.
 *
 * @param framework - The framework to query.
 * @param problem - One of the six problem codes.
 * @param target - Candidate extension for VE-*, exactly one argument for DC-* and DS-*.
 * @param options - Branching order, step budget, abort signal and logger for the search.
 * @returns The answer: `true` for YES, `false` for NO.
 * @throws ArityError if a DC-* or DS-* target does not hold exactly one argument.
 * @throws UnknownArgumentError if the target names arguments outside the framework.
 * @throws SearchAbortedError if a search exceeds its budget or is cancelled.
 *   Skeptical complete queries may run two searches, each with the full budget.
 *
 * @example
 * ```typescript
 * const af = Framework.build({ arguments: ['a', 'b'], attacks: [['a', 'b'], ['b', 'a']] });
 * evaluate(af, 'DC-ST', ['a']); // true
 * evaluate(af, 'DS-ST', ['a']); // false
 * ```
 */
export function evaluate(
  framework: Framework,
  problem: ProblemCode,
  target: Iterable<Argument>,
  options: EvaluateOptions = {}
): boolean {
  const descriptor = describeProblem(problem);
  const resolved = resolveTarget(framework, descriptor, target);
  const log = (options.logger ?? defaultLogger).child('QueryEngine');
  const searchOptions: SearchOptions = { ...options, semantics: descriptor.semantics };

  let answer: boolean;
  if (resolved.arity === 'set') {
    answer = verify(framework, descriptor.semantics, resolved.members);
  } else if (descriptor.kind === 'credulous') {
    answer = hasLabelling(framework, resolved.argument, ['IN'], searchOptions);
  } else {
    const counterLabels: readonly Label[] =
      descriptor.semantics === 'stable' ? ['OUT'] : ['OUT', 'UNDEC'];
    answer = !hasLabelling(framework, resolved.argument, counterLabels, searchOptions);
  }

  log.debug('query_evaluated', { problem, answer });
  return answer;
}
