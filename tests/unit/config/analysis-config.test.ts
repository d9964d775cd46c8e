import { describe, it, expect } from 'vitest';
import {
  resolveAnalysisConfig,
  parseMeanShift,
  parseCrossingDirection,
} from '../../../src/config/analysis-config';
import { DEFAULT_ANALYSIS_CONFIG } from '../../../src/config/defaults';
import { CROSSING_DIRECTIONS } from '../../../src/types';

describe('resolveAnalysisConfig', () => {
  it('should return the defaults without input', () => {
    const config = resolveAnalysisConfig();

    expect(config).toEqual(DEFAULT_ANALYSIS_CONFIG);
    expect(config.intervals).toBe(100);
    expect(config.inspirationStart).toBe('pos-to-neg');
    expect(config.windows).toEqual({ lookAhead: 30, lookBackOffset: 41, lookBackWidth: 20 });
    expect(config.meanShift).toBe('auto');
  });

  it('should merge partial windows over the defaults', () => {
    const config = resolveAnalysisConfig({ intervals: 20, windows: { lookAhead: 5 } });

    expect(config.intervals).toBe(20);
    expect(config.windows).toEqual({ lookAhead: 5, lookBackOffset: 41, lookBackWidth: 20 });
  });

  it('should not share the default windows object', () => {
    const config = resolveAnalysisConfig();
    expect(config.windows).not.toBe(DEFAULT_ANALYSIS_CONFIG.windows);
  });

  it('should reject invalid values', () => {
    expect(() => resolveAnalysisConfig({ intervals: 0 })).toThrow('intervals: Must be at least 1');
    expect(() => resolveAnalysisConfig({ intervals: 2.5 })).toThrow('intervals: Must be an integer');
    expect(() => resolveAnalysisConfig({ windows: { lookBackWidth: 0 } })).toThrow(
      'windows.lookBackWidth: Must be at least 1'
    );
    expect(() => resolveAnalysisConfig({ windows: { lookBackOffset: -1 } })).toThrow(
      'windows.lookBackOffset: Must be at least 0'
    );
    expect(() => resolveAnalysisConfig({ minSamplesPerPhase: 1 })).toThrow(
      'minSamplesPerPhase: Must be at least 2'
    );
    expect(() => resolveAnalysisConfig({ meanShift: NaN })).toThrow('meanShift: Must be a finite number');
  });

  it('should accept a numeric mean shift', () => {
    expect(resolveAnalysisConfig({ meanShift: -0.25 }).meanShift).toBe(-0.25);
  });
});

describe('parseMeanShift', () => {
  it('should parse auto and numbers', () => {
    expect(parseMeanShift('auto')).toBe('auto');
    expect(parseMeanShift(' AUTO ')).toBe('auto');
    expect(parseMeanShift('1.5')).toBe(1.5);
    expect(parseMeanShift('-2')).toBe(-2);
  });

  it('should reject other text', () => {
    expect(() => parseMeanShift('abc')).toThrow("meanShift: Must be 'auto' or a number");
    expect(() => parseMeanShift('')).toThrow("meanShift: Must be 'auto' or a number");
  });
});

describe('parseCrossingDirection', () => {
  it('should parse both directions', () => {
    expect(parseCrossingDirection('pos-to-neg')).toBe('pos-to-neg');
    expect(parseCrossingDirection('NEG-TO-POS')).toBe('neg-to-pos');
  });

  it('should reject unknown directions', () => {
    expect(() => parseCrossingDirection('up')).toThrow(
      'inspirationStart: Must be one of pos-to-neg, neg-to-pos'
    );
  });

  it('should list the default direction first', () => {
    expect(CROSSING_DIRECTIONS).toEqual(['pos-to-neg', 'neg-to-pos']);
    expect(CROSSING_DIRECTIONS[0]).toBe(DEFAULT_ANALYSIS_CONFIG.inspirationStart);
  });
});
