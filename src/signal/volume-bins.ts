/**
 * Volume-Bin Resampler
 *
 * Resamples each phase at equal fractions of its volume excursion.
 * Time is recovered by inverse interpolation along volume; flow is then
 * interpolated at that time between the same pair of samples.
 *
 * @module signal/volume-bins
 */

import type { Breath, BreathGrids, Phase, VolumeBinGrid, WaveformSample } from '../types';
import { evenTargets } from './interpolation';

interface VolumePoint {
  time: number;
  flow: number;
}

/**
 * First sample pair (in sample order) whose volumes bracket the target.
 * Exact hits return the sample itself.
 */
export function locateVolume(
  samples: readonly WaveformSample[],
  target: number
): VolumePoint | null {
  for (let k = 0; k < samples.length - 1; k++) {
    const a = samples[k];
    const b = samples[k + 1];

    if (a.volume === target) {
      return { time: a.time, flow: a.flow };
    }

    if ((a.volume - target) * (b.volume - target) < 0) {
      const time = a.time + ((target - a.volume) / (b.volume - a.volume)) * (b.time - a.time);
      const flow = a.flow + ((b.flow - a.flow) / (b.time - a.time)) * (time - a.time);
      return { time, flow };
    }
  }

  const last = samples[samples.length - 1];
  if (last.volume === target) {
    return { time: last.time, flow: last.flow };
  }

  return null;
}

/**
 * Resample one phase onto intervals + 1 equally spaced volumes,
 * from the start volume to the end volume.
 * Grid time is relative to the phase start.
 */
export function resampleVolumeBins(phase: Phase, intervals: number): VolumeBinGrid {
  const { samples } = phase;
  const first = samples[0];
  const last = samples[samples.length - 1];
  const origin = phase.start.time;

  const volume = evenTargets(phase.start.volume, phase.end.volume, intervals);
  const time: number[] = [];
  const flow: number[] = [];

  for (const target of volume) {
    // Overshoot past both ends clamps to the nearer boundary
    const point =
      locateVolume(samples, target) ??
      (Math.abs(target - first.volume) <= Math.abs(target - last.volume) ? first : last);

    time.push(point.time - origin);
    flow.push(point.flow);
  }

  return { volume, time, flow };
}

export function resampleBreathVolumeBins(
  breath: Breath,
  intervals: number
): BreathGrids<VolumeBinGrid> {
  return {
    breathIndex: breath.index,
    inspiration: resampleVolumeBins(breath.inspiration, intervals),
    expiration: resampleVolumeBins(breath.expiration, intervals),
  };
}
