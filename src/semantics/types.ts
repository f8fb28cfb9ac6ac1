/**
 * Labelling and semantics types.
 *
 * @packageDocumentation
 */

import type { Argument } from '../framework/index.js';

/**
 * Label assigned to an argument.
 *
 * - `IN`: accepted
 * - `OUT`: rejected, attacked by some accepted argument
 * - `UNDEC`: neither accepted nor rejected
 */
export type Label = 'IN' | 'OUT' | 'UNDEC';

/**
 * A mapping from arguments to labels.
 *
 * A total labelling maps every argument of its framework; during search a
 * labelling is partial and an absent key means "unassigned".
 */
export type Labelling = ReadonlyMap<Argument, Label>;

/**
 * Extension semantics supported by the solver.
 */
export type Semantics = 'complete' | 'stable';

/**
 * An extension: the set of arguments jointly accepted.
 */
export type Extension = ReadonlySet<Argument>;
