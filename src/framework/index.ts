/**
 * Framework model: arguments, attacks and their derived indices.
 *
 * @packageDocumentation
 */

export { Framework } from './framework.js';
export { MalformedFrameworkError } from './errors.js';
export type { Argument, Attack, FrameworkInput } from './types.js';
