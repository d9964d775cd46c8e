/**
 * Breath analysis pipeline
 *
 * validate -> detect crossings -> segment -> time-bin + volume-bin
 * resampling -> aggregation for both phases.
 *
 * @module signal/pipeline
 */

import type {
  AnalysisConfigInput,
  AnalysisResult,
  BreathGrids,
  MethodAggregate,
  TimeBinGrid,
  VolumeBinGrid,
  Waveform,
} from '../types';
import { resolveAnalysisConfig } from '../config/analysis-config';
import { createLogger, type Logger } from '../utils/logger';
import { validateWaveform } from '../utils/validation';
import { aggregatePhase, shiftAggregate } from './aggregator';
import { segmentBreaths, summarizeTiming } from './segmenter';
import { normalizeTimeBins, resampleBreathTimeBins } from './time-bins';
import { resampleBreathVolumeBins } from './volume-bins';
import { detectZeroCrossings } from './zero-crossing';

const log = createLogger('signal:pipeline');

function aggregateTimeBins(
  normalized: readonly BreathGrids<TimeBinGrid>[],
  meanShift: number
): MethodAggregate {
  return {
    inspiration: {
      volume: shiftAggregate(aggregatePhase(normalized, 'inspiration', 'volume'), meanShift),
      flow: aggregatePhase(normalized, 'inspiration', 'flow'),
    },
    expiration: {
      volume: shiftAggregate(aggregatePhase(normalized, 'expiration', 'volume'), meanShift),
      flow: aggregatePhase(normalized, 'expiration', 'flow'),
    },
  };
}

function aggregateVolumeBins(grids: readonly BreathGrids<VolumeBinGrid>[]): MethodAggregate {
  return {
    inspiration: {
      volume: aggregatePhase(grids, 'inspiration', 'volume'),
      flow: aggregatePhase(grids, 'inspiration', 'flow'),
    },
    expiration: {
      volume: aggregatePhase(grids, 'expiration', 'volume'),
      flow: aggregatePhase(grids, 'expiration', 'flow'),
    },
  };
}

/**
 * Analyze a complete recording.
 *
 * Throws `ValidationError` for malformed input or configuration.
 * A recording without a complete breath returns `status: 'no-breaths'`.
 */
export function analyzeWaveform(
  waveform: Waveform,
  input: AnalysisConfigInput = {},
  logger: Logger = log
): AnalysisResult {
  validateWaveform(waveform);
  const config = resolveAnalysisConfig(input);

  const events = detectZeroCrossings(waveform, config.windows, logger.child('zero-crossing'));
  const { breaths, discarded } = segmentBreaths(waveform, events, config, logger.child('segmenter'));

  const base = {
    config,
    sampleCount: waveform.time.length,
    events,
    breaths,
    discarded,
    timings: breaths.map(summarizeTiming),
  };

  if (breaths.length === 0) {
    logger.warn('No breaths found', {
      samples: base.sampleCount,
      events: events.length,
      discarded: discarded.length,
    });
    return { status: 'no-breaths', ...base };
  }

  const timeBinGrids = breaths.map(b => resampleBreathTimeBins(b, config.intervals));
  const normalization = normalizeTimeBins(timeBinGrids, config.meanShift);
  const volumeBinGrids = breaths.map(b => resampleBreathVolumeBins(b, config.intervals));

  logger.info('Analysis complete', {
    samples: base.sampleCount,
    events: events.length,
    breaths: breaths.length,
    discarded: discarded.length,
    intervals: config.intervals,
  });

  return {
    status: 'complete',
    ...base,
    timeBins: {
      breaths: timeBinGrids,
      normalized: normalization.normalized,
      averageInspiratoryTidalVolume: normalization.averageInspiratoryTidalVolume,
      averageExpiratoryTidalVolume: normalization.averageExpiratoryTidalVolume,
      meanShift: normalization.meanShift,
    },
    volumeBins: { breaths: volumeBinGrids },
    aggregates: {
      timeBins: aggregateTimeBins(normalization.normalized, normalization.meanShift),
      volumeBins: aggregateVolumeBins(volumeBinGrids),
    },
  };
}
