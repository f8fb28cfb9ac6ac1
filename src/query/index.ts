/**
 * Query engine: the six acceptance and verification problems.
 *
 * @packageDocumentation
 */

export { evaluate } from './engine.js';
export type { EvaluateOptions } from './engine.js';
export { ArityError, QueryError, UnknownArgumentError } from './errors.js';
export type { QueryErrorCode } from './errors.js';
export {
  describeProblem,
  isProblemCode,
  parseProblemCode,
  PROBLEM_CODES,
} from './problems.js';
export type { ProblemCode, ProblemDescriptor, ProblemKind, TargetArity } from './problems.js';
