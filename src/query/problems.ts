/**
 * Problem codes and their descriptors.
 *
 * Each code pairs a query kind with a semantics. The descriptor table is the
 * single place that says how a code is evaluated and how many target
 * arguments it takes.
 *
 * @packageDocumentation
 */

import type { Semantics } from '../semantics/index.js';
import { QueryError } from './errors.js';

/**
 * All supported problem codes.
 */
export const PROBLEM_CODES = ['VE-CO', 'DC-CO', 'DS-CO', 'VE-ST', 'DC-ST', 'DS-ST'] as const;

/**
 * A supported problem code.
 */
export type ProblemCode = (typeof PROBLEM_CODES)[number];

/**
 * What a problem asks.
 *
 * - `verify`: is the target set an extension?
 * - `credulous`: does some extension contain the target argument?
 * - `skeptical`: does every extension contain the target argument?
 */
export type ProblemKind = 'verify' | 'credulous' | 'skeptical';

/**
 * Number of target arguments a problem takes.
 *
 * - `set`: zero or more arguments
 * - `single`: exactly one argument
 */
export type TargetArity = 'set' | 'single';

/**
 * How a problem code is evaluated.
 */
export interface ProblemDescriptor {
  readonly code: ProblemCode;
  readonly kind: ProblemKind;
  readonly semantics: Semantics;
  readonly arity: TargetArity;
}

const PROBLEMS: Readonly<Record<ProblemCode, ProblemDescriptor>> = {
  'VE-CO': { code: 'VE-CO', kind: 'verify', semantics: 'complete', arity: 'set' },
  'DC-CO': { code: 'DC-CO', kind: 'credulous', semantics: 'complete', arity: 'single' },
  'DS-CO': { code: 'DS-CO', kind: 'skeptical', semantics: 'complete', arity: 'single' },
  'VE-ST': { code: 'VE-ST', kind: 'verify', semantics: 'stable', arity: 'set' },
  'DC-ST': { code: 'DC-ST', kind: 'credulous', semantics: 'stable', arity: 'single' },
  'DS-ST': { code: 'DS-ST', kind: 'skeptical', semantics: 'stable', arity: 'single' },
};

/**
 * Type guard for problem codes.
 */
export function isProblemCode(value: string): value is ProblemCode {
  return PROBLEM_CODES.some((code) => code === value);
}

/**
 * Validates a problem code string.
 *
 * @param value - Raw problem code, e.g. from the command line.
 * @returns The validated code.
 * @throws QueryError with code `UNKNOWN_PROBLEM` if `value` is not a supported code.
 */
export function parseProblemCode(value: string): ProblemCode {
  if (!isProblemCode(value)) {
    throw new QueryError(
      `Unknown problem '${value}': expected one of ${PROBLEM_CODES.join(', ')}`,
      'UNKNOWN_PROBLEM'
    );
  }
  return value;
}

/**
 * Returns the descriptor of a problem code.
 */
export function describeProblem(code: ProblemCode): ProblemDescriptor {
  return PROBLEMS[code];
}
