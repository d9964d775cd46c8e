/**
 * Synthetic Breathing Waveform Generator
 *
 * Generates flow/volume recordings with known crossings for testing
 * and demonstration.
 *
 * @module signal/synthetic
 */

import type { Waveform } from '../types';

/**
 * Sinusoidal breathing options
 */
export interface BreathingWaveformOptions {
  /** Complete breaths after the lead-in */
  breaths?: number;
  /** Breath period in seconds */
  period?: number;
  /** Peak flow (L/s) */
  amplitude?: number;
  /** Seconds between samples */
  sampleInterval?: number;
  /** Seconds of expiration before the first inspiration starts */
  leadIn?: number;
  /** Seconds recorded after the last breath ends */
  leadOut?: number;
  /** Mid-breath volume (L) */
  baseline?: number;
  /** Peak uniform noise added to flow (L/s) */
  noise?: number;
  /** Random source in [0, 1) */
  random?: () => number;
}

/**
 * Add uniform noise in [-level, level]
 */
function addNoise(values: number[], level: number, random: () => number): number[] {
  return values.map(v => v + (random() * 2 - 1) * level);
}

/**
 * Generate sinusoidal breathing.
 *
 * flow = -A sin(2π (t - leadIn) / period), so inspiration (negative flow,
 * falling volume) starts at t = leadIn and crossings fall every half period.
 * Volume is the exact integral of flow around the baseline.
 */
export function generateBreathingWaveform(options: BreathingWaveformOptions = {}): Waveform {
  const {
    breaths = 3,
    period = 3,
    amplitude = 0.5,
    sampleInterval = 0.01,
    leadIn = 0.755,
    leadOut = 0.545,
    baseline = 2,
    noise = 0,
    random = Math.random,
  } = options;

  const duration = leadIn + breaths * period + leadOut;
  const totalSamples = Math.round(duration / sampleInterval);
  const omega = (2 * Math.PI) / period;
  const excursion = amplitude / omega;

  const time: number[] = [];
  const volume: number[] = [];
  let flow: number[] = [];

  for (let i = 0; i < totalSamples; i++) {
    const t = i * sampleInterval;
    const phase = omega * (t - leadIn);
    time.push(t);
    flow.push(-amplitude * Math.sin(phase));
    volume.push(baseline + excursion * Math.cos(phase));
  }

  if (noise > 0) {
    flow = addNoise(flow, noise, random);
  }

  return { time, volume, flow };
}

/**
 * Constant-flow options
 */
export interface LinearPhaseWaveformOptions {
  /** Alternating phases, starting with expiration */
  phases?: number;
  samplesPerPhase?: number;
  sampleInterval?: number;
  /** Flow magnitude (L/s) */
  flow?: number;
  /** Volume of the first sample (L) */
  baseline?: number;
}

/**
 * Generate square-wave flow with triangular volume.
 * Even phases carry positive flow, odd phases negative flow; volume is the
 * trapezoidal integral of flow.
 */
export function generateLinearPhaseWaveform(options: LinearPhaseWaveformOptions = {}): Waveform {
  const {
    phases = 7,
    samplesPerPhase = 100,
    sampleInterval = 0.01,
    flow: magnitude = 0.5,
    baseline = 2,
  } = options;

  const totalSamples = phases * samplesPerPhase;
  const time: number[] = [];
  const volume: number[] = [];
  const flow: number[] = [];

  for (let i = 0; i < totalSamples; i++) {
    const sign = Math.floor(i / samplesPerPhase) % 2 === 0 ? 1 : -1;
    const f = sign * magnitude;

    time.push(i * sampleInterval);
    flow.push(f);
    volume.push(
      i === 0 ? baseline : volume[i - 1] + ((flow[i - 1] + f) / 2) * sampleInterval
    );
  }

  return { time, volume, flow };
}

/**
 * Generate a recording with zero flow (for testing)
 */
export function generateFlatWaveform(
  totalSamples: number = 200,
  sampleInterval: number = 0.01,
  baseline: number = 2
): Waveform {
  const time: number[] = [];
  for (let i = 0; i < totalSamples; i++) {
    time.push(i * sampleInterval);
  }

  return {
    time,
    volume: new Array<number>(totalSamples).fill(baseline),
    flow: new Array<number>(totalSamples).fill(0),
  };
}
