/**
 * Property tests for finding aggregation.
 */
import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import { aggregateFindings, compareFindings } from '../../src/core/findings/aggregator.js';
import type { Finding } from '../../src/core/findings/types.js';

const findingArb: fc.Arbitrary<Finding> = fc.record({
  severity: fc.constantFrom('error' as const, 'warning' as const),
  file: fc.constantFrom('/p/a.c', '/p/b.c', '/p/sub/c.h'),
  line: fc.nat({ max: 20 }),
  rule: fc.constantFrom('poi.include', 'prx.include', 'layout.required'),
  message: fc.string({ maxLength: 10 }),
});

const keyOf = (f: Finding): string => `${f.file}|${f.line}|${f.rule}`;

describe('aggregateFindings properties', () => {
  it('should be idempotent', () => {
    fc.assert(
      fc.property(fc.array(findingArb, { maxLength: 30 }), (findings) => {
        const once = aggregateFindings(findings);
        expect(aggregateFindings(once)).toEqual(once);
      })
    );
  });

  it('should be strictly ordered and keep one finding per key', () => {
    fc.assert(
      fc.property(fc.array(findingArb, { maxLength: 30 }), (findings) => {
        const result = aggregateFindings(findings);
        for (let i = 1; i < result.length; i++) {
          expect(compareFindings(result[i - 1], result[i])).toBeLessThan(0);
        }
        expect(new Set(result.map(keyOf))).toEqual(new Set(findings.map(keyOf)));
      })
    );
  });

  it('should not depend on input order', () => {
    fc.assert(
      fc.property(fc.array(findingArb, { maxLength: 30 }), (findings) => {
        const unique = aggregateFindings(findings);
        expect(aggregateFindings([...unique].reverse())).toEqual(unique);
      })
    );
  });
});
