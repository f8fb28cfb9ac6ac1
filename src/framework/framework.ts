/**
 * Immutable argumentation framework with precomputed attack indices.
 *
 * @packageDocumentation
 */

import { MalformedFrameworkError } from './errors.js';
import type { Argument, Attack, FrameworkInput } from './types.js';

const EMPTY: ReadonlySet<Argument> = new Set<Argument>();

function toAttack(raw: Attack | readonly [Argument, Argument]): Attack {
  if ('source' in raw) {
    return { source: raw.source, target: raw.target };
  }
  return { source: raw[0], target: raw[1] };
}

/**
 * An abstract argumentation framework `(Arguments, Attacks)`.
 *
 * Instances are built once through {@link Framework.build} and never mutated.
 * Arguments keep their first-seen insertion order; duplicate arguments and
 * duplicate attacks collapse.
 *
 * @example
 * ```typescript
 * const af = Framework.build({
 *   arguments: ['a', 'b'],
 *   attacks: [['a', 'b']],
 * });
 * af.attackersOf('b'); // Set { 'a' }
 * ```
 */
export class Framework {
  /** Arguments in insertion order. */
  public readonly arguments: readonly Argument[];
  /** Attacks in insertion order, without duplicates. */
  public readonly attacks: readonly Attack[];

  private readonly members: ReadonlySet<Argument>;
  private readonly attackers: ReadonlyMap<Argument, ReadonlySet<Argument>>;
  private readonly attacked: ReadonlyMap<Argument, ReadonlySet<Argument>>;

  private constructor(
    args: readonly Argument[],
    attacks: readonly Attack[],
    attackers: ReadonlyMap<Argument, ReadonlySet<Argument>>,
    attacked: ReadonlyMap<Argument, ReadonlySet<Argument>>
  ) {
    this.arguments = args;
    this.attacks = attacks;
    this.members = new Set(args);
    this.attackers = attackers;
    this.attacked = attacked;
  }

  /**
   * Builds a framework from arguments and attacks.
   *
   * @param input - The argument set and the attack relation.
   * @returns The immutable framework.
   * @throws MalformedFrameworkError if an attack references an undeclared argument.
   */
  static build(input: FrameworkInput): Framework {
    const args: Argument[] = [];
    const seen = new Set<Argument>();
    for (const argument of input.arguments) {
      if (!seen.has(argument)) {
        seen.add(argument);
        args.push(argument);
      }
    }

    const attackers = new Map<Argument, Set<Argument>>();
    const attacked = new Map<Argument, Set<Argument>>();
    for (const argument of args) {
      attackers.set(argument, new Set());
      attacked.set(argument, new Set());
    }

    const attacks: Attack[] = [];
    for (const raw of input.attacks) {
      const attack = toAttack(raw);
      const sourceTargets = attacked.get(attack.source);
      const targetAttackers = attackers.get(attack.target);
      if (sourceTargets === undefined || targetAttackers === undefined) {
        const undeclared = [attack.source, attack.target].filter((name) => !seen.has(name));
        throw new MalformedFrameworkError(attack, [...new Set(undeclared)]);
      }
      if (sourceTargets.has(attack.target)) {
        continue;
      }
      sourceTargets.add(attack.target);
      targetAttackers.add(attack.source);
      attacks.push(attack);
    }

    return new Framework(args, attacks, attackers, attacked);
  }

  /**
   * Returns the arguments attacking `argument`.
   *
   * Unknown arguments have no attackers.
   */
  attackersOf(argument: Argument): ReadonlySet<Argument> {
    return this.attackers.get(argument) ?? EMPTY;
  }

  /**
   * Returns the arguments attacked by `argument`.
   */
  attackedBy(argument: Argument): ReadonlySet<Argument> {
    return this.attacked.get(argument) ?? EMPTY;
  }

  /** Whether `source` attacks `target`. */
  hasAttack(source: Argument, target: Argument): boolean {
    return this.attackedBy(source).has(target);
  }

  /** Number of arguments. */
  size(): number {
    return this.arguments.length;
  }

  /** Whether `argument` belongs to the framework. */
  contains(argument: Argument): boolean {
    return this.members.has(argument);
  }
}
