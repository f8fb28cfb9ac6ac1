/**
 * Errors raised while building a framework.
 *
 * @packageDocumentation
 */

import type { Attack } from './types.js';

/**
 * Raised when an attack references an argument that was not declared.
 */
export class MalformedFrameworkError extends Error {
  /** The attack that referenced an undeclared argument. */
  public readonly attack: Attack;
  /** The undeclared argument names referenced by the attack. */
  public readonly undeclared: readonly string[];

  /**
   * Creates a new MalformedFrameworkError.
   *
   * @param attack - The offending attack.
   * @param undeclared - Endpoints of the attack missing from the argument set.
   */
  constructor(attack: Attack, undeclared: readonly string[]) {
    super(
      `Attack (${attack.source}, ${attack.target}) references undeclared argument(s): ${undeclared.join(', ')}`
    );
    this.name = 'MalformedFrameworkError';
    this.attack = attack;
    this.undeclared = undeclared;
  }
}
