/**
 * Labellings and the local-consistency rules of complete semantics.
 *
 * For every argument `a` of a complete labelling:
 * - `a` is IN iff every attacker of `a` is OUT
 * - `a` is OUT iff some attacker of `a` is IN
 * - `a` is UNDEC otherwise
 *
 * The same rules, read over a partial labelling, drive propagation in the
 * labelling search.
 *
 * @packageDocumentation
 */

import type { Argument, Framework } from '../framework/index.js';
import type { Extension, Label, Labelling } from './types.js';

/**
 * Whether `argument` may be labelled IN: every attacker is labelled OUT.
 *
 * Unassigned attackers make this false.
 */
export function canBeIn(framework: Framework, argument: Argument, labelling: Labelling): boolean {
  for (const attacker of framework.attackersOf(argument)) {
    if (labelling.get(attacker) !== 'OUT') {
      return false;
    }
  }
  return true;
}

/**
 * Whether `argument` must be labelled OUT: some attacker is labelled IN.
 */
export function mustBeOut(framework: Framework, argument: Argument, labelling: Labelling): boolean {
  for (const attacker of framework.attackersOf(argument)) {
    if (labelling.get(attacker) === 'IN') {
      return true;
    }
  }
  return false;
}

/**
 * The label the attackers of `argument` force on it, if any.
 *
 * Returns OUT when some attacker is IN and IN when every attacker is OUT.
 * When every attacker is labelled but neither holds, the only consistent
 * label is UNDEC. Otherwise the label is still open and `undefined` is
 * returned.
 *
 * @param framework - The framework the labelling belongs to.
 * @param argument - The argument to inspect.
 * @param labelling - A partial or total labelling.
 * @returns The forced label, or `undefined` while unresolved.
 */
export function forcedLabel(
  framework: Framework,
  argument: Argument,
  labelling: Labelling
): Label | undefined {
  let allOut = true;
  let allAssigned = true;
  for (const attacker of framework.attackersOf(argument)) {
    const label = labelling.get(attacker);
    if (label === 'IN') {
      return 'OUT';
    }
    if (label === undefined) {
      allAssigned = false;
      allOut = false;
    } else if (label === 'UNDEC') {
      allOut = false;
    }
  }
  if (allOut) {
    return 'IN';
  }
  return allAssigned ? 'UNDEC' : undefined;
}

/**
 * Whether `labelling` is a complete labelling of `framework`.
 *
 * The labelling must be total over the framework's arguments and every
 * argument's label must equal the label its attackers force.
 */
export function isCompleteLabelling(framework: Framework, labelling: Labelling): boolean {
  if (labelling.size !== framework.size()) {
    return false;
  }
  for (const argument of framework.arguments) {
    const label = labelling.get(argument);
    if (label === undefined || forcedLabel(framework, argument, labelling) !== label) {
      return false;
    }
  }
  return true;
}

/**
 * Whether `labelling` is a stable labelling: complete with no UNDEC argument.
 */
export function isStableLabelling(framework: Framework, labelling: Labelling): boolean {
  for (const label of labelling.values()) {
    if (label === 'UNDEC') {
      return false;
    }
  }
  return isCompleteLabelling(framework, labelling);
}

/**
 * Returns the extension of a labelling: its IN arguments, in labelling order.
 */
export function extensionOf(labelling: Labelling): Extension {
  const extension = new Set<Argument>();
  for (const [argument, label] of labelling) {
    if (label === 'IN') {
      extension.add(argument);
    }
  }
  return extension;
}

/**
 * Builds the labelling induced by a set of arguments.
 *
 * Members of `extension` are IN, arguments attacked by a member are OUT and
 * the rest are UNDEC. Members that also are attacked by a member stay IN, so
 * the result of a set with conflicts is never complete.
 *
 * @param framework - The framework to label.
 * @param extension - The candidate set of IN arguments.
 * @returns A total labelling in framework order.
 */
export function labellingFromExtension(
  framework: Framework,
  extension: Iterable<Argument>
): Labelling {
  const members = new Set(extension);
  const accepted = inLabelling(members);
  const labelling = new Map<Argument, Label>();
  for (const argument of framework.arguments) {
    if (members.has(argument)) {
      labelling.set(argument, 'IN');
    } else if (mustBeOut(framework, argument, accepted)) {
      labelling.set(argument, 'OUT');
    } else {
      labelling.set(argument, 'UNDEC');
    }
  }
  return labelling;
}

function inLabelling(members: ReadonlySet<Argument>): Labelling {
  const labelling = new Map<Argument, Label>();
  for (const member of members) {
    labelling.set(member, 'IN');
  }
  return labelling;
}
