/**
 * Analysis configuration types
 * @module types/config
 */

import type { CrossingDirection } from './waveform';

/**
 * Sample windows used to confirm a flow sign change
 */
export interface CrossingValidationWindows {
  /** Samples after i + 1 that must all carry the post-crossing sign */
  lookAhead: number;
  /** Distance from i to the nearest look-back sample */
  lookBackOffset: number;
  /** Number of look-back samples averaged */
  lookBackWidth: number;
}

/**
 * Constant added to the averaged time-bin volume.
 * 'auto' uses the mean inspiration/expiration transition volume.
 */
export type MeanShift = number | 'auto';

/**
 * Full analysis configuration
 */
export interface AnalysisConfig {
  /** Intervals per phase; grids hold intervals + 1 points */
  intervals: number;

  /** Crossing direction that begins inspiration */
  inspirationStart: CrossingDirection;

  windows: CrossingValidationWindows;

  /** Measured samples a phase needs to be kept */
  minSamplesPerPhase: number;

  meanShift: MeanShift;
}

/**
 * Caller-supplied configuration; anything omitted takes the default
 */
export interface AnalysisConfigInput {
  intervals?: number;
  inspirationStart?: CrossingDirection;
  windows?: Partial<CrossingValidationWindows>;
  minSamplesPerPhase?: number;
  meanShift?: MeanShift;
}
