import { describe, expect, it } from 'vitest';
import fc from 'fast-check';
import {
  af,
  arbitraryFramework,
  arbitraryFrameworkWithArgument,
  key,
  keys,
  powerset,
} from '../../tests/support/frameworks.js';
import { Logger } from '../utils/logger.js';
import { extensionOf, isCompleteLabelling, isStableLabelling } from './labelling.js';
import { isComplete, isStable } from './predicates.js';
import {
  branchingOrder,
  enumerateExtensions,
  findLabelling,
  groundedExtension,
  groundedLabelling,
  SearchAbortedError,
  searchLabellings,
} from './search.js';
import type { Label } from './types.js';

const selfLoop = af(['a'], [['a', 'a']]);
const twoCycle = af(['a', 'b'], [
  ['a', 'b'],
  ['b', 'a'],
]);
const oddCycle = af(['a', 'b', 'c'], [
  ['a', 'b'],
  ['b', 'c'],
  ['c', 'a'],
]);
const chain = af(['a', 'b', 'c'], [
  ['a', 'b'],
  ['b', 'c'],
]);
// a <-> b <-> c
const doubleCycle = af(['a', 'b', 'c'], [
  ['a', 'b'],
  ['b', 'a'],
  ['b', 'c'],
  ['c', 'b'],
]);

describe('groundedLabelling', () => {
  it('should label a self-attacking argument UNDEC', () => {
    expect([...groundedLabelling(selfLoop)]).toEqual([['a', 'UNDEC']]);
  });

  it('should leave both sides of a two-cycle UNDEC', () => {
    expect([...groundedLabelling(twoCycle)]).toEqual([
      ['a', 'UNDEC'],
      ['b', 'UNDEC'],
    ]);
  });

  it('should resolve a chain completely', () => {
    expect([...groundedLabelling(chain)]).toEqual([
      ['a', 'IN'],
      ['b', 'OUT'],
      ['c', 'IN'],
    ]);
    expect(key(groundedExtension(chain))).toBe('a,c');
  });

  it('should keep an isolated argument IN next to a cycle', () => {
    const mixed = af(['a', 'b', 'c'], [
      ['b', 'c'],
      ['c', 'b'],
    ]);
    expect([...groundedLabelling(mixed)]).toEqual([
      ['a', 'IN'],
      ['b', 'UNDEC'],
      ['c', 'UNDEC'],
    ]);
  });

  it('should label the empty framework with nothing', () => {
    expect(groundedLabelling(af([])).size).toBe(0);
  });
});

describe('searchLabellings', () => {
  it('should yield the complete labellings of a two-cycle in branch order', () => {
    const found = [...searchLabellings(twoCycle)].map((labelling) => [...labelling]);

    expect(found).toEqual([
      [
        ['a', 'UNDEC'],
        ['b', 'UNDEC'],
      ],
      [
        ['a', 'IN'],
        ['b', 'OUT'],
      ],
      [
        ['a', 'OUT'],
        ['b', 'IN'],
      ],
    ]);
  });

  it('should yield only the stable labellings under stable semantics', () => {
    const found = [...searchLabellings(twoCycle, { semantics: 'stable' })].map((labelling) =>
      key(extensionOf(labelling))
    );

    expect(found).toEqual(['a', 'b']);
  });

  it('should find the single empty extension of an odd cycle', () => {
    expect(enumerateExtensions(oddCycle, 'complete').map(key)).toEqual(['']);
    expect(enumerateExtensions(oddCycle, 'stable')).toEqual([]);
  });

  it('should find no stable labelling for a self-attacking argument', () => {
    expect(enumerateExtensions(selfLoop, 'complete').map(key)).toEqual(['']);
    expect(enumerateExtensions(selfLoop, 'stable')).toEqual([]);
  });

  it('should enumerate the extensions of two joined cycles', () => {
    expect(enumerateExtensions(doubleCycle, 'complete').map(key)).toEqual(['', 'a,c', 'b']);
    expect(enumerateExtensions(doubleCycle, 'stable').map(key)).toEqual(['a,c', 'b']);
  });

  it('should yield one empty labelling for the empty framework', () => {
    expect(enumerateExtensions(af([]), 'complete').map(key)).toEqual(['']);
    expect(enumerateExtensions(af([]), 'stable').map(key)).toEqual(['']);
  });

  it('should follow the name order when requested', () => {
    const reversed = af(['b', 'a'], [
      ['a', 'b'],
      ['b', 'a'],
    ]);

    expect(branchingOrder(reversed, 'name')).toEqual(['a', 'b']);
    expect(branchingOrder(reversed, 'insertion')).toEqual(['b', 'a']);
    expect(enumerateExtensions(reversed, 'complete', { order: 'name' }).map(key)).toEqual([
      '',
      'a',
      'b',
    ]);
    expect(enumerateExtensions(reversed, 'complete').map(key)).toEqual(['', 'b', 'a']);
  });

  it('should stop when the consumer stops', () => {
    const lines: string[] = [];
    const logger = new Logger({
      component: 'test',
      debugMode: true,
      write: (line) => lines.push(line),
    });

    const first = findLabelling(twoCycle, (labelling) => labelling.get('a') === 'IN', {
      logger,
    });

    expect(first === undefined ? undefined : [...first]).toEqual([
      ['a', 'IN'],
      ['b', 'OUT'],
    ]);
    const finished = lines
      .map((line) => JSON.parse(line) as { event: string; data?: Record<string, unknown> })
      .find((entry) => entry.event === 'search_finished');
    expect(finished?.data).toEqual({
      semantics: 'complete',
      steps: 3,
      labellings: 2,
      exhausted: false,
    });
  });

  it('should return undefined when no labelling matches', () => {
    expect(findLabelling(selfLoop, (labelling) => labelling.get('a') === 'IN')).toBeUndefined();
  });

  describe('seed', () => {
    it('should only produce labellings that extend the seed', () => {
      const seed = new Map<string, Label>([['a', 'IN']]);
      const found = [...searchLabellings(twoCycle, { seed })].map((labelling) => [...labelling]);

      expect(found).toEqual([
        [
          ['a', 'IN'],
          ['b', 'OUT'],
        ],
      ]);
    });

    it('should end at the root when the seed contradicts propagation', () => {
      const seed = new Map<string, Label>([['a', 'IN']]);

      expect([...searchLabellings(selfLoop, { seed, maxSteps: 1 })]).toEqual([]);
    });

    it('should produce nothing for an UNDEC seed under stable semantics', () => {
      const seed = new Map<string, Label>([['a', 'UNDEC']]);

      expect([...searchLabellings(twoCycle, { semantics: 'stable', seed })]).toEqual([]);
    });

    it('should ignore seed entries outside the framework', () => {
      const seed = new Map<string, Label>([['z', 'IN']]);

      expect([...searchLabellings(twoCycle, { seed })]).toHaveLength(3);
    });
  });

  describe('cancellation', () => {
    it('should abort once the step budget is spent', () => {
      expect(() => [...searchLabellings(twoCycle, { maxSteps: 1 })]).toThrow(SearchAbortedError);

      try {
        [...searchLabellings(twoCycle, { maxSteps: 2 })];
        expect.fail('expected SearchAbortedError');
      } catch (error) {
        expect(error).toBeInstanceOf(SearchAbortedError);
        expect((error as SearchAbortedError).code).toBe('STEP_LIMIT');
        expect((error as SearchAbortedError).steps).toBe(2);
      }
    });

    it('should treat a zero budget as unlimited', () => {
      expect([...searchLabellings(twoCycle, { maxSteps: 0 })]).toHaveLength(3);
    });

    it('should abort when the signal is aborted', () => {
      const controller = new AbortController();
      controller.abort();

      try {
        [...searchLabellings(twoCycle, { signal: controller.signal })];
        expect.fail('expected SearchAbortedError');
      } catch (error) {
        expect(error).toBeInstanceOf(SearchAbortedError);
        expect((error as SearchAbortedError).code).toBe('CANCELLED');
        expect((error as SearchAbortedError).steps).toBe(0);
      }
    });
  });

  describe('properties', () => {
    it('seeded search should keep exactly the unseeded labellings that agree with the seed', () => {
      fc.assert(
        fc.property(
          arbitraryFrameworkWithArgument(),
          fc.constantFrom<Label>('IN', 'OUT', 'UNDEC'),
          fc.constantFrom('complete' as const, 'stable' as const),
          ({ framework, argument }, label, semantics) => {
            const seeded = [
              ...searchLabellings(framework, { semantics, seed: new Map([[argument, label]]) }),
            ].map((labelling) => key(extensionOf(labelling)));
            const filtered = [...searchLabellings(framework, { semantics })]
              .filter((labelling) => labelling.get(argument) === label)
              .map((labelling) => key(extensionOf(labelling)));

            expect(seeded.sort()).toEqual(filtered.sort());
          }
        ),
        { numRuns: 150 }
      );
    });

    function bruteForce(framework: ReturnType<typeof af>, stable: boolean): string[] {
      return powerset(framework.arguments)
        .filter((subset) =>
          stable
            ? isStable(framework, new Set(subset))
            : isComplete(framework, new Set(subset))
        )
        .map(key)
        .sort();
    }

    it('should find exactly the complete extensions', () => {
      fc.assert(
        fc.property(arbitraryFramework(), (framework) => {
          const found = keys(enumerateExtensions(framework, 'complete'));
          expect(found).toEqual(bruteForce(framework, false));
        }),
        { numRuns: 150 }
      );
    });

    it('should find exactly the stable extensions', () => {
      fc.assert(
        fc.property(arbitraryFramework(), (framework) => {
          const found = keys(enumerateExtensions(framework, 'stable'));
          expect(found).toEqual(bruteForce(framework, true));
        }),
        { numRuns: 150 }
      );
    });

    it('should yield only complete labellings, stable ones under stable semantics', () => {
      fc.assert(
        fc.property(arbitraryFramework(), (framework) => {
          for (const labelling of searchLabellings(framework)) {
            expect(isCompleteLabelling(framework, labelling)).toBe(true);
          }
          for (const labelling of searchLabellings(framework, { semantics: 'stable' })) {
            expect(isStableLabelling(framework, labelling)).toBe(true);
          }
        }),
        { numRuns: 100 }
      );
    });

    it('should have a complete grounded labelling contained in every complete extension', () => {
      fc.assert(
        fc.property(arbitraryFramework(), (framework) => {
          const grounded = groundedLabelling(framework);
          expect(isCompleteLabelling(framework, grounded)).toBe(true);

          const groundedIn = extensionOf(grounded);
          for (const extension of enumerateExtensions(framework, 'complete')) {
            for (const argument of groundedIn) {
              expect(extension.has(argument)).toBe(true);
            }
          }
        }),
        { numRuns: 100 }
      );
    });

    it('should not depend on branching order', () => {
      fc.assert(
        fc.property(arbitraryFramework(), (framework) => {
          expect(keys(enumerateExtensions(framework, 'complete', { order: 'name' }))).toEqual(
            keys(enumerateExtensions(framework, 'complete'))
          );
        }),
        { numRuns: 50 }
      );
    });

    it('should never yield the same labelling twice', () => {
      fc.assert(
        fc.property(arbitraryFramework(), (framework) => {
          const seen = new Set<string>();
          for (const labelling of searchLabellings(framework)) {
            const signature = [...labelling]
              .map(([argument, label]: [string, Label]) => `${argument}=${label}`)
              .join(';');
            expect(seen.has(signature)).toBe(false);
            seen.add(signature);
          }
        }),
        { numRuns: 50 }
      );
    });
  });
});
