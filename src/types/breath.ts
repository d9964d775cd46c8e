/**
 * Breath and phase types
 * @module types/breath
 */

import type { WaveformSample, ZeroCrossingEvent } from './waveform';

/**
 * Respiratory phase
 */
export type PhaseKind = 'inspiration' | 'expiration';

/**
 * Both phases in breath order
 */
export const PHASES: readonly PhaseKind[] = ['inspiration', 'expiration'] as const;

/**
 * One phase of a breath, delimited by two consecutive validated crossings
 */
export interface Phase {
  kind: PhaseKind;
  start: ZeroCrossingEvent;
  end: ZeroCrossingEvent;
  /** Waveform index of the first measured sample inside the phase */
  firstSampleIndex: number;
  /** Waveform index of the last measured sample inside the phase */
  lastSampleIndex: number;
  /**
   * Start boundary, measured samples, end boundary.
   * Boundaries carry the interpolated time/volume and zero flow.
   */
  samples: readonly WaveformSample[];
  /** end.time - start.time */
  duration: number;
  /** |end.volume - start.volume| */
  tidalVolume: number;
}

/**
 * A complete breath: inspiration followed by expiration
 */
export interface Breath {
  /** Position among kept breaths, in time order, from 0 */
  index: number;
  inspiration: Phase;
  expiration: Phase;
}

/**
 * Why a candidate breath was dropped
 */
export type DiscardReason = 'insufficient-samples' | 'zero-tidal-volume';

/**
 * A candidate breath that did not make it into the analysis
 */
export interface DiscardedBreath {
  /** Position among all candidate cycles, from 0 */
  cycle: number;
  /** Time of the inspiration start boundary */
  startTime: number;
  /** Phase that failed */
  phase: PhaseKind;
  reason: DiscardReason;
  /** Measured samples in the failing phase */
  sampleCount: number;
}

/**
 * Per-breath duration and tidal volume summary
 */
export interface BreathTiming {
  breathIndex: number;
  inspiratoryTidalVolume: number;
  expiratoryTidalVolume: number;
  inspiratoryTime: number;
  expiratoryTime: number;
}
