/**
 * Analysis configuration resolution
 * @module config/analysis-config
 */

import type { AnalysisConfig, AnalysisConfigInput, CrossingDirection } from '../types';
import { CROSSING_DIRECTIONS } from '../types';
import { ValidationError, validateFinite, validateInteger } from '../utils/validation';
import { DEFAULT_ANALYSIS_CONFIG } from './defaults';

function isCrossingDirection(value: string): value is CrossingDirection {
  return CROSSING_DIRECTIONS.some(d => d === value);
}

/**
 * Merge caller input over the defaults and validate the result
 */
export function resolveAnalysisConfig(input: AnalysisConfigInput = {}): AnalysisConfig {
  const config: AnalysisConfig = {
    intervals: input.intervals ?? DEFAULT_ANALYSIS_CONFIG.intervals,
    inspirationStart: input.inspirationStart ?? DEFAULT_ANALYSIS_CONFIG.inspirationStart,
    windows: { ...DEFAULT_ANALYSIS_CONFIG.windows, ...input.windows },
    minSamplesPerPhase: input.minSamplesPerPhase ?? DEFAULT_ANALYSIS_CONFIG.minSamplesPerPhase,
    meanShift: input.meanShift ?? DEFAULT_ANALYSIS_CONFIG.meanShift,
  };

  validateAnalysisConfig(config);
  return config;
}

/**
 * Validate a complete configuration
 */
export function validateAnalysisConfig(config: AnalysisConfig): boolean {
  validateInteger(config.intervals, 'intervals', 1);

  if (!isCrossingDirection(config.inspirationStart)) {
    throw new ValidationError(
      `Must be one of ${CROSSING_DIRECTIONS.join(', ')}`,
      'inspirationStart',
      config.inspirationStart
    );
  }

  validateInteger(config.windows.lookAhead, 'windows.lookAhead', 1);
  validateInteger(config.windows.lookBackOffset, 'windows.lookBackOffset', 0);
  validateInteger(config.windows.lookBackWidth, 'windows.lookBackWidth', 1);
  validateInteger(config.minSamplesPerPhase, 'minSamplesPerPhase', 2);

  if (config.meanShift !== 'auto') {
    validateFinite(config.meanShift, 'meanShift');
  }

  return true;
}

/**
 * Parse a mean shift option given as text ('auto' or a number)
 */
export function parseMeanShift(value: string): AnalysisConfig['meanShift'] {
  const trimmed = value.trim().toLowerCase();
  if (trimmed === 'auto') return 'auto';

  const parsed = Number(trimmed);
  if (trimmed === '' || !Number.isFinite(parsed)) {
    throw new ValidationError("Must be 'auto' or a number", 'meanShift', value);
  }
  return parsed;
}

/**
 * Parse a crossing direction given as text
 */
export function parseCrossingDirection(value: string): CrossingDirection {
  const trimmed = value.trim().toLowerCase();
  if (!isCrossingDirection(trimmed)) {
    throw new ValidationError(
      `Must be one of ${CROSSING_DIRECTIONS.join(', ')}`,
      'inspirationStart',
      value
    );
  }
  return trimmed;
}
