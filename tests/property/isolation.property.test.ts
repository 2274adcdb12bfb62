/**
 * Property tests for cross-feature isolation.
 */
import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import { checkCrossFeature, SHARED_RESOURCE_PREFIXES } from '../../src/core/isolation/cross-feature.js';
import { file } from '../helpers/factories.js';

const featureArb = fc.stringMatching(/^[A-Za-z][A-Za-z0-9]{0,7}$/).filter((f) => f.toLowerCase() !== 'core');

describe('checkCrossFeature properties', () => {
  it('should never fire between files of the same feature, whatever the case', () => {
    fc.assert(
      fc.property(featureArb, (feature) => {
        const other = feature.toUpperCase();
        const source = file(`src/prx_${feature}.vb`);
        const target = file(`src/poi_${other}.vb`);
        expect(checkCrossFeature(source, [source, target], `Dim x = poi_${other}.Run()`)).toEqual([]);
      })
    );
  });

  it('should never fire from shared resource files', () => {
    fc.assert(
      fc.property(fc.constantFrom(...SHARED_RESOURCE_PREFIXES), featureArb, featureArb, (prefix, own, foreign) => {
        const source = file(`src/${prefix}${own}.vb`);
        const target = file(`src/poi_${foreign}.vb`);
        expect(checkCrossFeature(source, [source, target], `Dim x = poi_${foreign}.Run()`)).toEqual([]);
      })
    );
  });

  it('should fire once per line for different features', () => {
    fc.assert(
      fc.property(featureArb, featureArb, (own, foreign) => {
        fc.pre(own.toLowerCase() !== foreign.toLowerCase());
        const source = file(`src/prx_${own}.vb`);
        const target = file(`src/poi_${foreign}.vb`);
        const findings = checkCrossFeature(source, [source, target], `Dim x = poi_${foreign}.Run()`);
        expect(findings.map((f) => [f.line, f.rule])).toEqual([[1, 'cross-feature-layer-ref']]);
      })
    );
  });
});
