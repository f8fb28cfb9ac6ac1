/**
 * Extension predicates over candidate argument sets.
 *
 * These check a fixed candidate directly and need no search. They back the
 * VE-CO and VE-ST problems.
 *
 * @packageDocumentation
 */

import type { Argument, Framework } from '../framework/index.js';

/**
 * Whether no member of `candidate` attacks another member (or itself).
 */
export function isConflictFree(framework: Framework, candidate: ReadonlySet<Argument>): boolean {
  for (const member of candidate) {
    for (const target of framework.attackedBy(member)) {
      if (candidate.has(target)) {
        return false;
      }
    }
  }
  return true;
}

/**
 * Whether `candidate` defends `argument`: every attacker of `argument` is
 * attacked by some member of `candidate`.
 */
export function defends(
  framework: Framework,
  candidate: ReadonlySet<Argument>,
  argument: Argument
): boolean {
  for (const attacker of framework.attackersOf(argument)) {
    if (!isAttackedBySet(framework, candidate, attacker)) {
      return false;
    }
  }
  return true;
}

/**
 * The characteristic function: every argument of the framework that
 * `candidate` defends, in framework order.
 */
export function defendedBy(framework: Framework, candidate: ReadonlySet<Argument>): Set<Argument> {
  const defended = new Set<Argument>();
  for (const argument of framework.arguments) {
    if (defends(framework, candidate, argument)) {
      defended.add(argument);
    }
  }
  return defended;
}

/**
 * Whether `candidate` is conflict-free and defends each of its members.
 */
export function isAdmissible(framework: Framework, candidate: ReadonlySet<Argument>): boolean {
  if (!isConflictFree(framework, candidate)) {
    return false;
  }
  for (const member of candidate) {
    if (!defends(framework, candidate, member)) {
      return false;
    }
  }
  return true;
}

/**
 * Whether `candidate` is a complete extension: admissible and containing
 * every argument it defends, i.e. a conflict-free fixed point of
 * {@link defendedBy}.
 */
export function isComplete(framework: Framework, candidate: ReadonlySet<Argument>): boolean {
  if (!isAdmissible(framework, candidate)) {
    return false;
  }
  for (const argument of framework.arguments) {
    if (!candidate.has(argument) && defends(framework, candidate, argument)) {
      return false;
    }
  }
  return true;
}

/**
 * Whether `candidate` is a stable extension: conflict-free and attacking
 * every argument outside it.
 */
export function isStable(framework: Framework, candidate: ReadonlySet<Argument>): boolean {
  if (!isConflictFree(framework, candidate)) {
    return false;
  }
  for (const argument of framework.arguments) {
    if (!candidate.has(argument) && !isAttackedBySet(framework, candidate, argument)) {
      return false;
    }
  }
  return true;
}

function isAttackedBySet(
  framework: Framework,
  candidate: ReadonlySet<Argument>,
  argument: Argument
): boolean {
  for (const attacker of framework.attackersOf(argument)) {
    if (candidate.has(attacker)) {
      return true;
    }
  }
  return false;
}
