/**
 * Shared fixtures and generators for framework tests.
 */

import fc, { type Arbitrary } from 'fast-check';
import { Framework } from '../../src/framework/index.js';
import type { Extension } from '../../src/semantics/index.js';

/**
 * Builds a framework from `[source, target]` pairs over the given arguments.
 */
export function af(args: string[], attacks: [string, string][] = []): Framework {
  return Framework.build({ arguments: args, attacks });
}

/**
 * Canonical string for an extension: sorted names joined by commas.
 */
export function key(extension: Iterable<string>): string {
  return [...extension].sort().join(',');
}

/**
 * Canonical sorted list of extension keys.
 */
export function keys(extensions: Iterable<Extension>): string[] {
  return [...extensions].map(key).sort();
}

/**
 * Every subset of `items`.
 */
export function powerset<T>(items: readonly T[]): T[][] {
  let subsets: T[][] = [[]];
  for (const item of items) {
    subsets = subsets.concat(subsets.map((subset) => [...subset, item]));
  }
  return subsets;
}

/**
 * Random frameworks with up to `maxArguments` arguments named a0, a1, ...
 * and an arbitrary attack relation, self-attacks included.
 */
export function arbitraryFramework(maxArguments = 6): Arbitrary<Framework> {
  return fc.integer({ min: 0, max: maxArguments }).chain((size) => {
    const args = Array.from({ length: size }, (_, i) => `a${String(i)}`);
    const pairs: [string, string][] = args.flatMap((source) =>
      args.map((target): [string, string] => [source, target])
    );
    return fc.subarray(pairs).map((attacks) => af(args, attacks));
  });
}

/**
 * Random non-empty frameworks paired with one of their arguments.
 */
export function arbitraryFrameworkWithArgument(
  maxArguments = 6
): Arbitrary<{ framework: Framework; argument: string }> {
  return arbitraryFramework(maxArguments)
    .filter((framework) => framework.size() > 0)
    .chain((framework) =>
      fc.constantFrom(...framework.arguments).map((argument) => ({ framework, argument }))
    );
}
