/**
 * breath-averager - Respiratory breath segmentation and averaging
 *
 * Splits flow/volume recordings into breaths at validated zero-flow
 * crossings, resamples every breath onto equal-time and equal-volume
 * grids and averages the grids across breaths.
 *
 * @packageDocumentation
 */

// Version
export const VERSION = '0.1.0';

// ============================================================================
// Type Exports
// ============================================================================

export type {
  // Waveform types
  WaveformSample,
  Waveform,
  ReferenceLoop,
  CrossingDirection,
  ZeroCrossingEvent,
  // Breath types
  PhaseKind,
  Phase,
  Breath,
  DiscardReason,
  DiscardedBreath,
  BreathTiming,
  // Configuration types
  CrossingValidationWindows,
  MeanShift,
  AnalysisConfig,
  AnalysisConfigInput,
  // Analysis result types
  TimeBinGrid,
  VolumeBinGrid,
  BreathGrids,
  GridQuantity,
  AggregateRecord,
  AggregateSeries,
  PhaseAggregate,
  MethodAggregate,
  TimeBinResult,
  VolumeBinResult,
  CompletedAnalysis,
  EmptyAnalysis,
  AnalysisResult,
  // Table types
  TableCell,
  ResultTable,
  ParsedTable,
} from './types';

export { CROSSING_DIRECTIONS, PHASES, oppositeDirection, postCrossingSign } from './types';

// ============================================================================
// Configuration
// ============================================================================

export {
  DEFAULT_ANALYSIS_CONFIG,
  DEFAULT_VALIDATION_WINDOWS,
  TABLE_NAMES,
  COMPARISON_LAYOUTS,
  resolveAnalysisConfig,
  type ComparisonLayout,
} from './config';

// ============================================================================
// Signal Processing
// ============================================================================

export {
  analyzeWaveform,
  detectZeroCrossings,
  segmentBreaths,
  createPhase,
  resampleTimeBins,
  resampleBreathTimeBins,
  normalizeTimeBins,
  resampleVolumeBins,
  resampleBreathVolumeBins,
  AggregationError,
  aggregateGrids,
  aggregateColumns,
  aggregatePhase,
  shiftAggregate,
  rescaleAggregate,
  generateBreathingWaveform,
  generateLinearPhaseWaveform,
  generateFlatWaveform,
  parseCSV,
  findColumn,
  parseWaveformCSV,
  loadWaveformFile,
  convertRawExport,
  formatRawExportFile,
  parseReferenceLoopCSV,
  loadReferenceLoopFile,
} from './signal';

// ============================================================================
// Export, Comparison & Rendering
// ============================================================================

export {
  CSVExporter,
  exportTableToCSV,
  buildAnalysisTables,
  writeResultTables,
  type CSVExportOptions,
} from './export';

export {
  extractSubjectId,
  readAverageLoop,
  compareSubjects,
  compareSubjectFiles,
  type AverageLoop,
  type SubjectLoop,
  type ComparisonReport,
} from './comparison';

export { renderLoopPlot, savePlot, LoopPlotRenderer, type LoopPlotOptions } from './renderer';

export {
  processWaveformFile,
  processWaveformFiles,
  type BatchOptions,
  type BatchReport,
  type FileOutcome,
} from './batch';

// ============================================================================
// Utilities
// ============================================================================

export {
  ValidationError,
  validateWaveform,
  Logger,
  LogLevel,
  createLogger,
  createSilentLogger,
  configureLogger,
  setLogLevel,
} from './utils';
