/**
 * Resampling and aggregation result types
 * @module types/analysis
 */

import type { Breath, BreathTiming, DiscardedBreath, PhaseKind } from './breath';
import type { AnalysisConfig } from './config';
import type { ZeroCrossingEvent } from './waveform';

/**
 * Phase resampled at equal time fractions.
 * Time is relative to the phase start.
 */
export interface TimeBinGrid {
  time: number[];
  volume: number[];
  flow: number[];
}

/**
 * Phase resampled at equal volume fractions.
 * Time is relative to the phase start.
 */
export interface VolumeBinGrid {
  volume: number[];
  time: number[];
  flow: number[];
}

/**
 * Grids of one breath for one resampling method
 */
export interface BreathGrids<G> {
  breathIndex: number;
  inspiration: G;
  expiration: G;
}

/**
 * Quantity stored in a grid
 */
export type GridQuantity = 'time' | 'volume' | 'flow';

/**
 * Cross-breath statistics at one grid index
 */
export interface AggregateRecord {
  index: number;
  mean: number;
  /** Sample standard deviation (n - 1); NaN when count < 2 */
  std: number;
  /** std / sqrt(count); NaN when count < 2 */
  sem: number;
  count: number;
}

export type AggregateSeries = AggregateRecord[];

/**
 * Aggregates of one phase
 */
export interface PhaseAggregate {
  volume: AggregateSeries;
  flow: AggregateSeries;
}

/**
 * Aggregates of one resampling method
 */
export type MethodAggregate = Record<PhaseKind, PhaseAggregate>;

/**
 * Time-bin output, before and after tidal-volume normalization
 */
export interface TimeBinResult {
  breaths: BreathGrids<TimeBinGrid>[];
  normalized: BreathGrids<TimeBinGrid>[];
  averageInspiratoryTidalVolume: number;
  averageExpiratoryTidalVolume: number;
  /** Constant added to the averaged volume */
  meanShift: number;
}

/**
 * Volume-bin output
 */
export interface VolumeBinResult {
  breaths: BreathGrids<VolumeBinGrid>[];
}

interface AnalysisBase {
  config: AnalysisConfig;
  sampleCount: number;
  events: ZeroCrossingEvent[];
  breaths: Breath[];
  discarded: DiscardedBreath[];
  timings: BreathTiming[];
}

/**
 * At least one breath was analyzed
 */
export interface CompletedAnalysis extends AnalysisBase {
  status: 'complete';
  timeBins: TimeBinResult;
  volumeBins: VolumeBinResult;
  aggregates: {
    timeBins: MethodAggregate;
    volumeBins: MethodAggregate;
  };
}

/**
 * The waveform held no complete breath
 */
export interface EmptyAnalysis extends AnalysisBase {
  status: 'no-breaths';
}

export type AnalysisResult = CompletedAnalysis | EmptyAnalysis;
