/**
 * Breath Segmenter
 *
 * Groups alternating crossing events into breaths. Each breath is an
 * inspiration (e[k] -> e[k+1]) followed by an expiration (e[k+1] -> e[k+2]);
 * consecutive breaths share their outer boundary event.
 *
 * @module signal/segmenter
 */

import type {
  Breath,
  BreathTiming,
  CrossingDirection,
  DiscardedBreath,
  DiscardReason,
  Phase,
  PhaseKind,
  Waveform,
  WaveformSample,
  ZeroCrossingEvent,
} from '../types';
import { oppositeDirection, sampleAt } from '../types';
import { DEFAULT_ANALYSIS_CONFIG } from '../config/defaults';
import { createLogger, type Logger } from '../utils/logger';

const log = createLogger('signal:segmenter');

/**
 * Segmenter options
 */
export interface SegmentationOptions {
  /** Crossing direction that begins inspiration */
  inspirationStart?: CrossingDirection;
  /** Measured samples a phase needs */
  minSamplesPerPhase?: number;
}

export interface SegmentationResult {
  breaths: Breath[];
  discarded: DiscardedBreath[];
}

function boundarySample(event: ZeroCrossingEvent): WaveformSample {
  return { time: event.time, volume: event.volume, flow: 0 };
}

/**
 * Build a phase from two consecutive events.
 * The waveform is read, never modified.
 */
export function createPhase(
  kind: PhaseKind,
  start: ZeroCrossingEvent,
  end: ZeroCrossingEvent,
  waveform: Waveform
): Phase {
  const firstSampleIndex = start.index + 1;
  const lastSampleIndex = end.index;

  const samples: WaveformSample[] = [boundarySample(start)];
  for (let i = firstSampleIndex; i <= lastSampleIndex; i++) {
    samples.push(sampleAt(waveform, i));
  }
  samples.push(boundarySample(end));

  return {
    kind,
    start,
    end,
    firstSampleIndex,
    lastSampleIndex,
    samples,
    duration: end.time - start.time,
    tidalVolume: Math.abs(end.volume - start.volume),
  };
}

/**
 * Samples measured strictly between the phase boundaries
 */
export function measuredSampleCount(phase: Phase): number {
  return Math.max(0, phase.lastSampleIndex - phase.firstSampleIndex + 1);
}

function findDefect(phase: Phase, minSamples: number): DiscardReason | null {
  if (measuredSampleCount(phase) < minSamples) return 'insufficient-samples';
  if (phase.tidalVolume === 0) return 'zero-tidal-volume';
  return null;
}

/**
 * Partition a waveform into breaths at the given events
 */
export function segmentBreaths(
  waveform: Waveform,
  events: readonly ZeroCrossingEvent[],
  options: SegmentationOptions = {},
  logger: Logger = log
): SegmentationResult {
  const inspirationStart = options.inspirationStart ?? DEFAULT_ANALYSIS_CONFIG.inspirationStart;
  const minSamples = options.minSamplesPerPhase ?? DEFAULT_ANALYSIS_CONFIG.minSamplesPerPhase;

  const breaths: Breath[] = [];
  const discarded: DiscardedBreath[] = [];

  let k = events.findIndex(e => e.direction === inspirationStart);
  if (k === -1) {
    logger.debug('No inspiration start found', { events: events.length });
    return { breaths, discarded };
  }

  const transitionDirection = oppositeDirection(inspirationStart);

  let cycle = 0;
  while (k + 2 < events.length) {
    const start = events[k];
    const transition = events[k + 1];
    const end = events[k + 2];

    if (
      start.direction !== inspirationStart ||
      transition.direction !== transitionDirection ||
      end.direction !== inspirationStart
    ) {
      k += 1;
      continue;
    }

    const inspiration = createPhase('inspiration', start, transition, waveform);
    const expiration = createPhase('expiration', transition, end, waveform);

    let rejected = false;
    for (const phase of [inspiration, expiration]) {
      const reason = findDefect(phase, minSamples);
      if (!reason) continue;

      const entry: DiscardedBreath = {
        cycle,
        startTime: start.time,
        phase: phase.kind,
        reason,
        sampleCount: measuredSampleCount(phase),
      };
      discarded.push(entry);
      logger.warn('Breath discarded', { ...entry });
      rejected = true;
      break;
    }

    if (!rejected) {
      breaths.push({ index: breaths.length, inspiration, expiration });
    }

    cycle++;
    k += 2;
  }

  logger.debug('Segmentation complete', {
    cycles: cycle,
    breaths: breaths.length,
    discarded: discarded.length,
  });

  return { breaths, discarded };
}

/**
 * Tidal volume and duration of each phase
 */
export function summarizeTiming(breath: Breath): BreathTiming {
  return {
    breathIndex: breath.index,
    inspiratoryTidalVolume: breath.inspiration.tidalVolume,
    expiratoryTidalVolume: breath.expiration.tidalVolume,
    inspiratoryTime: breath.inspiration.duration,
    expiratoryTime: breath.expiration.duration,
  };
}
