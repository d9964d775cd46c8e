/**
 * Cross-breath aggregation
 *
 * Per grid index: mean, sample standard deviation (n - 1),
 * standard error (std / sqrt(n)) and count.
 *
 * @module signal/aggregator
 */

import type {
  AggregateRecord,
  AggregateSeries,
  BreathGrids,
  GridQuantity,
  PhaseKind,
} from '../types';
import { mean, sampleStandardDeviation } from '../utils/math';

/**
 * Aggregation over an invalid set of grids
 */
export class AggregationError extends Error {
  constructor(
    message: string,
    public gridCount: number
  ) {
    super(message);
    this.name = 'AggregationError';
  }
}

/**
 * Statistics of the values at one index.
 * std and sem are NaN for fewer than 2 values.
 */
export function summarizeValues(index: number, values: readonly number[]): AggregateRecord {
  const std = sampleStandardDeviation(values);

  return {
    index,
    mean: mean(values),
    std,
    sem: std / Math.sqrt(values.length),
    count: values.length,
  };
}

/**
 * Aggregate equal-length grids index by index
 */
export function aggregateGrids(grids: readonly (readonly number[])[]): AggregateSeries {
  if (grids.length === 0) {
    throw new AggregationError('Cannot aggregate zero grids', 0);
  }

  const length = grids[0].length;
  if (grids.some(g => g.length !== length)) {
    throw new AggregationError(
      `Grids differ in length (expected ${length})`,
      grids.length
    );
  }

  const series: AggregateSeries = [];
  for (let j = 0; j < length; j++) {
    series.push(summarizeValues(j, grids.map(g => g[j])));
  }
  return series;
}

/**
 * Aggregate ragged columns; missing or non-finite cells are skipped
 */
export function aggregateColumns(
  columns: readonly (readonly (number | null | undefined)[])[]
): AggregateSeries {
  const length = Math.max(0, ...columns.map(c => c.length));
  const series: AggregateSeries = [];

  for (let j = 0; j < length; j++) {
    const values: number[] = [];
    for (const column of columns) {
      const value = column[j];
      if (typeof value === 'number' && Number.isFinite(value)) {
        values.push(value);
      }
    }
    series.push(summarizeValues(j, values));
  }

  return series;
}

/**
 * Aggregate one quantity of one phase across breaths
 */
export function aggregatePhase<G extends Record<GridQuantity, readonly number[]>>(
  grids: readonly BreathGrids<G>[],
  phase: PhaseKind,
  quantity: GridQuantity
): AggregateSeries {
  return aggregateGrids(grids.map(g => g[phase][quantity]));
}

/**
 * Add a constant to every mean
 */
export function shiftAggregate(series: AggregateSeries, shift: number): AggregateSeries {
  return series.map(r => ({ ...r, mean: r.mean + shift }));
}

/**
 * Map percentage statistics to absolute units: value * scale / 100
 */
export function rescaleAggregate(series: AggregateSeries, scale: number): AggregateSeries {
  const factor = scale / 100;
  return series.map(r => ({
    ...r,
    mean: r.mean * factor,
    std: r.std * factor,
    sem: r.sem * factor,
  }));
}
