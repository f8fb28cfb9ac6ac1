/**
 * Semantics engine: labellings, extension predicates and labelling search.
 *
 * @packageDocumentation
 */

export type { Extension, Label, Labelling, Semantics } from './types.js';
export {
  canBeIn,
  extensionOf,
  forcedLabel,
  isCompleteLabelling,
  isStableLabelling,
  labellingFromExtension,
  mustBeOut,
} from './labelling.js';
export {
  defendedBy,
  defends,
  isAdmissible,
  isComplete,
  isConflictFree,
  isStable,
} from './predicates.js';
export {
  BRANCH_ORDERS,
  branchingOrder,
  enumerateExtensions,
  findLabelling,
  groundedExtension,
  groundedLabelling,
  isBranchOrder,
  propagate,
  SearchAbortedError,
  searchLabellings,
} from './search.js';
export type { BranchOrder, SearchAbortReason, SearchOptions } from './search.js';
