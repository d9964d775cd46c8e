/**
 * Default configuration values
 * @module config/defaults
 */

import type { AnalysisConfig, CrossingValidationWindows } from '../types';

/**
 * Default crossing validation windows (samples).
 * Look-back covers i - 41 ... i - 60.
 */
export const DEFAULT_VALIDATION_WINDOWS: Readonly<CrossingValidationWindows> = {
  lookAhead: 30,
  lookBackOffset: 41,
  lookBackWidth: 20,
};

/**
 * Default analysis configuration
 */
export const DEFAULT_ANALYSIS_CONFIG: Readonly<AnalysisConfig> = {
  intervals: 100,
  inspirationStart: 'pos-to-neg',
  windows: DEFAULT_VALIDATION_WINDOWS,
  minSamplesPerPhase: 2,
  meanShift: 'auto',
};

/**
 * Header fragments that locate waveform columns (case-insensitive)
 */
export const WAVEFORM_COLUMN_PATTERNS = {
  time: ['time'],
  volume: ['vol'],
  flow: ['flow'],
} as const;

export type WaveformColumnPatterns = {
  readonly [K in keyof typeof WAVEFORM_COLUMN_PATTERNS]: readonly string[];
};

/**
 * Header fragments that locate a reference loop's columns
 */
export const REFERENCE_LOOP_PATTERNS = {
  volume: ['vol'],
  flow: ['flow'],
} as const;

/**
 * Header fragments that locate the averaged loop in a result table
 */
export const AVERAGE_LOOP_PATTERNS = {
  inspiratoryVolume: ['insp', 'vol'],
  inspiratoryFlow: ['insp', 'flow'],
  expiratoryVolume: ['exp', 'vol'],
  expiratoryFlow: ['exp', 'flow'],
} as const;

/**
 * Result table names
 */
export const TABLE_NAMES = {
  PHASE_BOUNDARIES: 'Phase Boundaries',
  ORIGINAL_BREATH: 'Original Breath',
  RAW_TIME_BINS: 'Not Normalized Time Bin Breath',
  NORMALIZED_TIME_BINS: 'Normalized Time Bin Breath',
  VOLUME_BINS: 'Volume Bin Breath',
  COMPARISON_TIME_BINS: 'Comparison Time Bin',
  COMPARISON_VOLUME_BINS: 'Comparison Volume Bin',
  TIMINGS: 'Tidal Volume and Time Data',
  AVERAGE_TIME_BINS: 'Avg Time Bin Data',
  AVERAGE_VOLUME_BINS: 'Avg Vol Bin Data',
  DISCARDED: 'Discarded Breaths',
  SUMMARY: 'Summary',
} as const;

/**
 * Column headers of the averaged loop tables
 */
export const AVERAGE_LOOP_COLUMNS = {
  inspiratoryVolume: 'Avg_Insp_Vol_Graph',
  inspiratoryFlow: 'Avg_Insp_Flow_Graph',
  expiratoryVolume: 'Avg_Exp_Vol_Graph',
  expiratoryFlow: 'Avg_Exp_Flow_Graph',
} as const;

/**
 * Raw device export layout
 */
export const RAW_EXPORT = {
  /** Seconds between samples */
  sampleInterval: 0.01,
  /** First-column cell (substring, case-insensitive) that opens the flow block */
  flowMarker: 'ltr/s',
  /** First-column cell (exact, case-insensitive) that opens the volume block */
  volumeMarker: 'ltr',
  /** Suffix of the converted file's base name */
  outputSuffix: '_formatted',
} as const;

/**
 * Comparison output layouts
 */
export const COMPARISON_LAYOUTS = ['horizontal', 'separate'] as const;

export type ComparisonLayout = (typeof COMPARISON_LAYOUTS)[number];
