/**
 * Property-based tests with fast-check
 *
 * 1. Build/decode round-trip
 * 2. Canonical pool: distinct and ascending
 * 3. References always stay within the pool, through any sequence of writes
 * 4. Shared pools: equal values iff equal references
 */

import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import { buildPool } from '../factory.js';
import { buildSharedPool } from '../shared-pool.js';
import { maxRef } from '../refs.js';
import { NUMBER_TRAITS, STRING_TRAITS } from '../traits.js';
import { NA } from '../types.js';

const maybeString = fc.option(fc.constantFrom('a', 'b', 'c', 'd', 'e', 'f'), { nil: null });
const maybeInt = fc.option(fc.integer({ min: -50, max: 50 }), { nil: null });

describe('Property: build/decode round-trip', () => {
  it('should decode to the input with null at missing positions', () => {
    fc.assert(
      fc.property(fc.array(maybeString), values => {
        const column = buildPool(values, undefined, { traits: STRING_TRAITS });
        expect(column.toArray()).toEqual(values);
      })
    );
  });

  it('should respect the mask', () => {
    fc.assert(
      fc.property(
        fc.array(fc.tuple(maybeInt, fc.boolean())),
        pairs => {
          const values = pairs.map(([value]) => value);
          const mask = pairs.map(([, masked]) => masked);
          const column = buildPool(values, mask, { traits: NUMBER_TRAITS });

          expect(column.toArray()).toEqual(pairs.map(([value, masked]) => (masked ? NA : value)));
        }
      )
    );
  });
});

describe('Property: canonical pool', () => {
  it('should hold distinct values in ascending order', () => {
    fc.assert(
      fc.property(fc.array(maybeInt), values => {
        const { pool } = buildPool(values, undefined, { traits: NUMBER_TRAITS });

        expect(new Set(pool).size).toBe(pool.length);
        for (let i = 1; i < pool.length; i++) {
          expect(pool[i - 1]).toBeLessThan(pool[i]);
        }
      })
    );
  });

  it('should not depend on input order', () => {
    fc.assert(
      fc.property(fc.array(maybeString), values => {
        const forward = buildPool(values, undefined, { traits: STRING_TRAITS });
        const reversed = buildPool([...values].reverse(), undefined, { traits: STRING_TRAITS });
        expect(reversed.pool).toEqual(forward.pool);
      })
    );
  });
});

describe('Property: references stay within the pool', () => {
  type Write =
    | { kind: 'set'; index: number; value: string | null }
    | { kind: 'replace'; from: string | null; to: string | null }
    | { kind: 'setMissing'; index: number };

  const write: fc.Arbitrary<Write> = fc.oneof(
    fc.record({ kind: fc.constant('set' as const), index: fc.nat(), value: maybeString }),
    fc.record({ kind: fc.constant('replace' as const), from: maybeString, to: maybeString }),
    fc.record({ kind: fc.constant('setMissing' as const), index: fc.nat() })
  );

  it('should keep max(refs) <= pool size after any writes', () => {
    fc.assert(
      fc.property(fc.array(maybeString, { minLength: 1 }), fc.array(write), (values, writes) => {
        const column = buildPool(values, undefined, { traits: STRING_TRAITS });

        for (const op of writes) {
          if (op.kind === 'set') {
            column.set(op.index % column.length, op.value);
          } else if (op.kind === 'setMissing') {
            column.setMissing([op.index % column.length]);
          } else if (op.from === NA || column.indexOf(op.from) !== 0) {
            column.replace(op.from, op.to);
          }
          expect(maxRef(column.refs)).toBeLessThanOrEqual(column.pool.length);
        }
      })
    );
  });

  it('should decode a written value back', () => {
    fc.assert(
      fc.property(fc.array(maybeString, { minLength: 1 }), fc.nat(), maybeString, (values, index, value) => {
        const column = buildPool(values, undefined, { traits: STRING_TRAITS });
        const target = index % column.length;
        column.set(target, value);
        expect(column.get(target)).toBe(value);
      })
    );
  });
});

describe('Property: shared pool equality', () => {
  it('should give equal values equal references and different values different ones', () => {
    fc.assert(
      fc.property(fc.array(maybeInt), fc.array(maybeInt), (leftValues, rightValues) => {
        const [left, right] = buildSharedPool(leftValues, rightValues, { traits: NUMBER_TRAITS });

        expect(left.pool).toEqual(right.pool);
        for (let i = 0; i < leftValues.length; i++) {
          for (let j = 0; j < rightValues.length; j++) {
            const a = leftValues[i];
            const b = rightValues[j];
            if (a === null || b === null) continue;
            expect(left.refs[i] === right.refs[j]).toBe(a === b);
          }
        }
      })
    );
  });
});
