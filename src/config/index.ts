/**
 * Configuration exports
 * @module config
 */

// Defaults
export {
  DEFAULT_VALIDATION_WINDOWS,
  DEFAULT_ANALYSIS_CONFIG,
  WAVEFORM_COLUMN_PATTERNS,
  REFERENCE_LOOP_PATTERNS,
  AVERAGE_LOOP_PATTERNS,
  AVERAGE_LOOP_COLUMNS,
  TABLE_NAMES,
  RAW_EXPORT,
  COMPARISON_LAYOUTS,
  type WaveformColumnPatterns,
  type ComparisonLayout,
} from './defaults';

// Resolution
export {
  resolveAnalysisConfig,
  validateAnalysisConfig,
  parseMeanShift,
  parseCrossingDirection,
} from './analysis-config';
