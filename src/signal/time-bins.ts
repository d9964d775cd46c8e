/**
 * Time-Bin Resampler
 *
 * Resamples each phase at equal fractions of its duration, then
 * normalizes volume grids to the average tidal volume.
 *
 * @module signal/time-bins
 */

import type { Breath, BreathGrids, MeanShift, Phase, TimeBinGrid } from '../types';
import { mean } from '../utils/math';
import { evenTargets, interpolateAt } from './interpolation';

/**
 * Resample one phase onto intervals + 1 equally spaced times.
 * Grid time is relative to the phase start.
 */
export function resampleTimeBins(phase: Phase, intervals: number): TimeBinGrid {
  const origin = phase.start.time;
  const times = phase.samples.map(s => s.time - origin);
  const volumes = phase.samples.map(s => s.volume);
  const flows = phase.samples.map(s => s.flow);

  const time = evenTargets(0, phase.duration, intervals);

  return {
    time,
    volume: time.map(t => interpolateAt(times, volumes, t)),
    flow: time.map(t => interpolateAt(times, flows, t)),
  };
}

export function resampleBreathTimeBins(
  breath: Breath,
  intervals: number
): BreathGrids<TimeBinGrid> {
  return {
    breathIndex: breath.index,
    inspiration: resampleTimeBins(breath.inspiration, intervals),
    expiration: resampleTimeBins(breath.expiration, intervals),
  };
}

/**
 * Tidal-volume normalization output
 */
export interface TimeBinNormalization {
  normalized: BreathGrids<TimeBinGrid>[];
  averageInspiratoryTidalVolume: number;
  averageExpiratoryTidalVolume: number;
  /** Resolved constant to add to the averaged volume */
  meanShift: number;
}

function gridTidalVolume(grid: TimeBinGrid): number {
  return Math.abs(grid.volume[grid.volume.length - 1] - grid.volume[0]);
}

function rescaleVolume(grid: TimeBinGrid, reference: number, scale: number): TimeBinGrid {
  return {
    time: [...grid.time],
    volume: grid.volume.map(v => (v - reference) * scale),
    flow: [...grid.flow],
  };
}

/**
 * Reference each breath to its inspiration/expiration transition volume
 * and scale it to the average tidal volume of the phase.
 *
 * Inspiration grids are referenced to their last point, expiration grids to
 * their first. With `meanShift: 'auto'` the shift is the mean of those
 * reference volumes over both phases of every breath.
 */
export function normalizeTimeBins(
  grids: readonly BreathGrids<TimeBinGrid>[],
  meanShift: MeanShift
): TimeBinNormalization {
  const inspiratoryVolumes = grids.map(g => gridTidalVolume(g.inspiration));
  const expiratoryVolumes = grids.map(g => gridTidalVolume(g.expiration));
  const averageInspiratoryTidalVolume = mean(inspiratoryVolumes);
  const averageExpiratoryTidalVolume = mean(expiratoryVolumes);

  const references: number[] = [];

  const normalized = grids.map((g, i) => {
    const inspirationReference = g.inspiration.volume[g.inspiration.volume.length - 1];
    const expirationReference = g.expiration.volume[0];
    references.push(inspirationReference, expirationReference);

    return {
      breathIndex: g.breathIndex,
      inspiration: rescaleVolume(
        g.inspiration,
        inspirationReference,
        averageInspiratoryTidalVolume / inspiratoryVolumes[i]
      ),
      expiration: rescaleVolume(
        g.expiration,
        expirationReference,
        averageExpiratoryTidalVolume / expiratoryVolumes[i]
      ),
    };
  });

  return {
    normalized,
    averageInspiratoryTidalVolume,
    averageExpiratoryTidalVolume,
    meanShift: meanShift === 'auto' ? mean(references) : meanShift,
  };
}
