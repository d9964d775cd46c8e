/**
 * breath-averager type definitions
 *
 * @module types
 */

// Waveform types
export type {
  WaveformSample,
  Waveform,
  ReferenceLoop,
  CrossingDirection,
  ZeroCrossingEvent,
} from './waveform';

export {
  CROSSING_DIRECTIONS,
  oppositeDirection,
  postCrossingSign,
  sampleAt,
} from './waveform';

// Breath types
export type {
  PhaseKind,
  Phase,
  Breath,
  DiscardReason,
  DiscardedBreath,
  BreathTiming,
} from './breath';

export { PHASES } from './breath';

// Configuration types
export type {
  CrossingValidationWindows,
  MeanShift,
  AnalysisConfig,
  AnalysisConfigInput,
} from './config';

// Analysis result types
export type {
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
} from './analysis';

// Table types
export type { TableCell, ResultTable, ParsedTable } from './table';
