/**
 * Core types for abstract argumentation frameworks.
 *
 * @packageDocumentation
 */

/**
 * An argument identifier.
 *
 * Arguments are opaque, case-sensitive tokens compared by value.
 */
export type Argument = string;

/**
 * A directed attack: `source` attacks `target`.
 *
 * Self-attacks (`source === target`) are allowed.
 */
export interface Attack {
  /** The attacking argument. */
  readonly source: Argument;
  /** The attacked argument. */
  readonly target: Argument;
}

/**
 * Input accepted by {@link Framework.build}.
 *
 * Attacks may be given as {@link Attack} objects or as `[source, target]` pairs.
 */
export interface FrameworkInput {
  readonly arguments: Iterable<Argument>;
  readonly attacks: Iterable<Attack | readonly [Argument, Argument]>;
}
