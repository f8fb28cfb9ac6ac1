/**
 * argsolve
 *
 * Acceptance and verification over abstract argumentation frameworks under
 * complete and stable semantics.
 *
 * @packageDocumentation
 */

/**
 * Library version string.
 */
export const VERSION = '0.1.0';

export { Framework, MalformedFrameworkError } from './framework/index.js';
export type { Argument, Attack, FrameworkInput } from './framework/index.js';

export {
  BRANCH_ORDERS,
  SearchAbortedError,
  canBeIn,
  defendedBy,
  defends,
  enumerateExtensions,
  extensionOf,
  findLabelling,
  forcedLabel,
  groundedExtension,
  groundedLabelling,
  isAdmissible,
  isBranchOrder,
  isComplete,
  isCompleteLabelling,
  isConflictFree,
  isStable,
  isStableLabelling,
  labellingFromExtension,
  mustBeOut,
  searchLabellings,
} from './semantics/index.js';
export type {
  BranchOrder,
  Extension,
  Label,
  Labelling,
  SearchAbortReason,
  SearchOptions,
  Semantics,
} from './semantics/index.js';

export {
  ArityError,
  PROBLEM_CODES,
  QueryError,
  UnknownArgumentError,
  describeProblem,
  evaluate,
  isProblemCode,
  parseProblemCode,
} from './query/index.js';
export type {
  EvaluateOptions,
  ProblemCode,
  ProblemDescriptor,
  ProblemKind,
  QueryErrorCode,
  TargetArity,
} from './query/index.js';

export { ApxParseError, parseApx, readFramework } from './apx/index.js';
export type { ApxDocument } from './apx/index.js';

export { Logger } from './utils/logger.js';
export type { LogEntry, LogLevel, LoggerOptions } from './utils/logger.js';
