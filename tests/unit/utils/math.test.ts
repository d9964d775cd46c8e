/**
 * Math utilities tests
 */

import { describe, it, expect } from 'vitest';
import { lerp, round, mean, sampleVariance, sampleStandardDeviation } from '../../../src/utils/math';

describe('lerp', () => {
  it('should interpolate between values', () => {
    expect(lerp(0, 10, 0.5)).toBe(5);
    expect(lerp(2, 4, 0.25)).toBe(2.5);
  });
});

describe('round', () => {
  it('should round to decimal places', () => {
    expect(round(3.14159, 2)).toBe(3.14);
    expect(round(2.5)).toBe(3);
  });
});

describe('mean', () => {
  it('should average values', () => {
    expect(mean([1, 2, 3])).toBe(2);
  });

  it('should return NaN for an empty array', () => {
    expect(mean([])).toBeNaN();
  });
});

describe('sample statistics', () => {
  it('should use n - 1 degrees of freedom', () => {
    expect(sampleVariance([1, 2, 3])).toBe(1);
    expect(sampleStandardDeviation([1, 2, 3])).toBe(1);
    expect(sampleVariance([2, 4, 4, 4, 5, 5, 7, 9])).toBeCloseTo(32 / 7, 12);
  });

  it('should be undefined for fewer than 2 values', () => {
    expect(sampleVariance([4])).toBeNaN();
    expect(sampleStandardDeviation([])).toBeNaN();
  });
});
