/**
 * Signal processing exports
 * @module signal
 */

// Pipeline
export { analyzeWaveform } from './pipeline';

// Zero-crossing detection
export {
  detectZeroCrossings,
  confirmCrossing,
  candidateDirection,
  interpolateCrossing,
} from './zero-crossing';

// Segmentation
export {
  segmentBreaths,
  createPhase,
  measuredSampleCount,
  summarizeTiming,
  type SegmentationOptions,
  type SegmentationResult,
} from './segmenter';

// Resampling
export {
  resampleTimeBins,
  resampleBreathTimeBins,
  normalizeTimeBins,
  type TimeBinNormalization,
} from './time-bins';
export { resampleVolumeBins, resampleBreathVolumeBins, locateVolume } from './volume-bins';
export { interpolateAt, findBracket, evenTargets } from './interpolation';

// Aggregation
export {
  AggregationError,
  aggregateGrids,
  aggregateColumns,
  aggregatePhase,
  summarizeValues,
  shiftAggregate,
  rescaleAggregate,
} from './aggregator';

// Synthetic signal generation
export {
  generateBreathingWaveform,
  generateLinearPhaseWaveform,
  generateFlatWaveform,
  type BreathingWaveformOptions,
  type LinearPhaseWaveformOptions,
} from './synthetic';

// Signal loaders
export {
  parseCSV,
  splitCSVLine,
  findColumn,
  parseNumber,
  parseWaveformCSV,
  loadWaveformFile,
  convertRawExport,
  formattedTable,
  formatRawExportFile,
  parseReferenceLoopCSV,
  loadReferenceLoopFile,
  type CSVParseOptions,
  type FormattedExport,
} from './loader';
