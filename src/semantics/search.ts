/**
 * Backtracking search over complete labellings.
 *
 * The search walks the arguments in a fixed order. At every node it first
 * propagates the labels forced by the local-consistency rules to a fixed
 * point, discarding the branch on a contradiction, and then branches on the
 * first unassigned argument. Total labellings that pass the completeness
 * check are yielded one at a time, so a caller can stop as soon as it has
 * the answer it needs.
 *
 * Every branch works on its own copy of the labelling; nothing mutable is
 * shared between branches or between searches.
 *
 * @packageDocumentation
 */

import type { Argument, Framework } from '../framework/index.js';
import { logger as defaultLogger, type Logger } from '../utils/logger.js';
import { extensionOf, forcedLabel, isCompleteLabelling, isStableLabelling } from './labelling.js';
import type { Extension, Label, Labelling, Semantics } from './types.js';

/**
 * Supported branching orders.
 */
export const BRANCH_ORDERS = ['insertion', 'name'] as const;

/**
 * Order in which the search picks the next argument to branch on.
 *
 * - `insertion`: framework insertion order
 * - `name`: ascending code-unit order of argument names
 *
 * Only performance and the order of yielded labellings depend on it.
 */
export type BranchOrder = (typeof BRANCH_ORDERS)[number];

/**
 * Type guard for branching orders.
 */
export function isBranchOrder(value: string): value is BranchOrder {
  return BRANCH_ORDERS.some((order) => order === value);
}

/**
 * Options for a labelling search.
 */
export interface SearchOptions {
  /**
   * Labellings to produce. Under `stable`, UNDEC is never assigned.
   * @defaultValue 'complete'
   */
  readonly semantics?: Semantics | undefined;

  /**
   * Branching order over arguments.
   * @defaultValue 'insertion'
   */
  readonly order?: BranchOrder | undefined;

  /**
   * Maximum number of search nodes to visit. `0` or `undefined` means no limit.
   */
  readonly maxSteps?: number | undefined;

  /** Cancels the search between steps once aborted. */
  readonly signal?: AbortSignal | undefined;

  /** Receives debug events about the search. */
  readonly logger?: Logger | undefined;

  /**
   * Labels fixed before the search starts. Propagation runs from them, so
   * only labellings that agree with the seed are produced. Entries for
   * arguments outside the framework are ignored.
   */
  readonly seed?: ReadonlyMap<Argument, Label> | undefined;
}

/**
 * Why a search stopped before exhausting its space.
 */
export type SearchAbortReason = 'STEP_LIMIT' | 'CANCELLED';

/**
 * Raised when a search is stopped by its step budget or its abort signal.
 */
export class SearchAbortedError extends Error {
  /** The reason the search stopped. */
  public readonly code: SearchAbortReason;
  /** Number of search nodes visited before stopping. */
  public readonly steps: number;

  /**
   * Creates a new SearchAbortedError.
   *
   * @param code - The reason the search stopped.
   * @param steps - Search nodes visited so far.
   */
  constructor(code: SearchAbortReason, steps: number) {
    super(
      code === 'STEP_LIMIT'
        ? `Search step limit reached after ${String(steps)} steps`
        : `Search cancelled after ${String(steps)} steps`
    );
    this.name = 'SearchAbortedError';
    this.code = code;
    this.steps = steps;
  }
}

const COMPLETE_BRANCHES: readonly Label[] = ['UNDEC', 'IN', 'OUT'];
const STABLE_BRANCHES: readonly Label[] = ['IN', 'OUT'];

/**
 * Returns the arguments of `framework` in the given branching order.
 */
export function branchingOrder(framework: Framework, order: BranchOrder): readonly Argument[] {
  if (order === 'name') {
    return [...framework.arguments].sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
  }
  return framework.arguments;
}

/**
 * Applies forced labels to `labelling` until nothing changes.
 *
 * Besides the forward rules of {@link forcedLabel}, two backward rules hold
 * in every complete labelling and are applied as well:
 * - every attacker of an IN argument is OUT
 * - an OUT argument whose only possible IN attacker is still unassigned
 *   needs that attacker IN
 *
 * @param framework - The framework being labelled.
 * @param order - Arguments in scan order.
 * @param labelling - The branch's own partial labelling; updated in place.
 * @param semantics - Under `stable`, a forced UNDEC is a contradiction.
 * @returns `false` if the labelling cannot be extended to a complete one.
 */
export function propagate(
  framework: Framework,
  order: readonly Argument[],
  labelling: Map<Argument, Label>,
  semantics: Semantics
): boolean {
  let changed = true;
  while (changed) {
    changed = false;
    for (const argument of order) {
      const current = labelling.get(argument);
      const forced = forcedLabel(framework, argument, labelling);

      if (current === undefined) {
        if (forced === undefined) {
          continue;
        }
        if (forced === 'UNDEC' && semantics === 'stable') {
          return false;
        }
        labelling.set(argument, forced);
        changed = true;
        continue;
      }

      if (forced !== undefined && forced !== current) {
        return false;
      }

      if (current === 'IN') {
        for (const attacker of framework.attackersOf(argument)) {
          const label = labelling.get(attacker);
          if (label === undefined) {
            labelling.set(attacker, 'OUT');
            changed = true;
          } else if (label !== 'OUT') {
            return false;
          }
        }
      } else if (current === 'OUT') {
        let candidate: Argument | undefined;
        let candidates = 0;
        for (const attacker of framework.attackersOf(argument)) {
          const label = labelling.get(attacker);
          if (label === 'IN') {
            candidates = -1;
            break;
          }
          if (label === undefined) {
            candidate = attacker;
            candidates++;
          }
        }
        if (candidates === 0) {
          return false;
        }
        if (candidates === 1 && candidate !== undefined) {
          labelling.set(candidate, 'IN');
          changed = true;
        }
      }
    }
  }
  return true;
}

/**
 * Enumerates the complete (or stable) labellings of a framework.
 *
 * The generator is lazy: breaking out of a `for...of` loop, or calling
 * `return()`, ends the search. For a fixed framework and options the
 * labellings and their order are deterministic. Within a branch point the
 * labels are tried UNDEC, IN, OUT (UNDEC skipped under stable semantics).
 * A seed restricts the search to labellings that extend it.
 *
 * @param framework - The framework to label.
 * @param options - Semantics, branching order, seed and cancellation settings.
 * @returns A generator of total labellings in framework order.
 * @throws SearchAbortedError when the step budget runs out or the signal aborts.
 *
 * @example
 * ```typescript
 * for (const labelling of searchLabellings(af, { semantics: 'stable' })) {
 *   console.log(extensionOf(labelling));
 * }
 * ```
 */
export function* searchLabellings(
  framework: Framework,
  options: SearchOptions = {}
): Generator<Labelling, void, undefined> {
  const semantics = options.semantics ?? 'complete';
  const order = branchingOrder(framework, options.order ?? 'insertion');
  const maxSteps = options.maxSteps ?? 0;
  const signal = options.signal;
  const log = (options.logger ?? defaultLogger).child('LabellingSearch');
  const branches = semantics === 'stable' ? STABLE_BRANCHES : COMPLETE_BRANCHES;

  let steps = 0;
  let found = 0;
  let exhausted = false;

  const tick = (): void => {
    if (signal?.aborted === true) {
      throw new SearchAbortedError('CANCELLED', steps);
    }
    if (maxSteps > 0 && steps >= maxSteps) {
      throw new SearchAbortedError('STEP_LIMIT', steps);
    }
    steps++;
  };

  const accept = (labelling: Labelling): boolean =>
    semantics === 'stable'
      ? isStableLabelling(framework, labelling)
      : isCompleteLabelling(framework, labelling);

  function* visit(labelling: Map<Argument, Label>): Generator<Labelling, void, undefined> {
    tick();
    if (!propagate(framework, order, labelling, semantics)) {
      return;
    }

    const next = order.find((argument) => !labelling.has(argument));
    if (next === undefined) {
      const total = inFrameworkOrder(framework, labelling);
      if (accept(total)) {
        found++;
        log.debug('labelling_found', { extension: [...extensionOf(total)] });
        yield total;
      }
      return;
    }

    for (const label of branches) {
      const child = new Map(labelling);
      child.set(next, label);
      yield* visit(child);
    }
  }

  const root = new Map<Argument, Label>();
  for (const [argument, label] of options.seed ?? []) {
    if (framework.contains(argument)) {
      root.set(argument, label);
    }
  }

  log.debug('search_started', {
    semantics,
    arguments: framework.size(),
    order: options.order ?? 'insertion',
    seeded: root.size,
  });
  // No stable labelling has an UNDEC argument.
  const unsatisfiable = semantics === 'stable' && [...root.values()].includes('UNDEC');
  try {
    if (!unsatisfiable) {
      yield* visit(root);
    }
    exhausted = true;
  } finally {
    log.debug('search_finished', { semantics, steps, labellings: found, exhausted });
  }
}

/**
 * Returns the first labelling the search produces that satisfies `predicate`.
 *
 * The search stops at the first match.
 *
 * @returns The matching labelling, or `undefined` if the search exhausts.
 */
export function findLabelling(
  framework: Framework,
  predicate: (labelling: Labelling) => boolean,
  options: SearchOptions = {}
): Labelling | undefined {
  for (const labelling of searchLabellings(framework, options)) {
    if (predicate(labelling)) {
      return labelling;
    }
  }
  return undefined;
}

/**
 * Returns every extension of `framework` under `semantics`, in search order.
 */
export function enumerateExtensions(
  framework: Framework,
  semantics: Semantics,
  options: Omit<SearchOptions, 'semantics'> = {}
): Extension[] {
  const extensions: Extension[] = [];
  for (const labelling of searchLabellings(framework, { ...options, semantics })) {
    extensions.push(extensionOf(labelling));
  }
  return extensions;
}

/**
 * Computes the grounded labelling: propagation from the empty labelling
 * with no branching, every argument left open labelled UNDEC.
 *
 * The grounded labelling is always complete.
 */
export function groundedLabelling(framework: Framework): Labelling {
  const labelling = new Map<Argument, Label>();
  propagate(framework, framework.arguments, labelling, 'complete');
  for (const argument of framework.arguments) {
    if (!labelling.has(argument)) {
      labelling.set(argument, 'UNDEC');
    }
  }
  return inFrameworkOrder(framework, labelling);
}

/**
 * The grounded extension: IN arguments of the grounded labelling.
 */
export function groundedExtension(framework: Framework): Extension {
  return extensionOf(groundedLabelling(framework));
}

function inFrameworkOrder(framework: Framework, labelling: ReadonlyMap<Argument, Label>): Labelling {
  const ordered = new Map<Argument, Label>();
  for (const argument of framework.arguments) {
    const label = labelling.get(argument);
    if (label !== undefined) {
      ordered.set(argument, label);
    }
  }
  return ordered;
}
