import { describe, it, expect } from 'vitest';
import {
  generateBreathingWaveform,
  generateLinearPhaseWaveform,
  generateFlatWaveform,
} from '../../../src/signal/synthetic';

describe('generateBreathingWaveform', () => {
  it('should cover lead-in, breaths and lead-out', () => {
    const waveform = generateBreathingWaveform();

    expect(waveform.time).toHaveLength(1030);
    expect(waveform.volume).toHaveLength(1030);
    expect(waveform.flow).toHaveLength(1030);
    expect(waveform.time[1]).toBe(0.01);
  });

  it('should start with positive flow and turn negative at the lead-in', () => {
    const { flow } = generateBreathingWaveform();

    expect(flow[0]).toBeGreaterThan(0);
    expect(flow[75]).toBeGreaterThan(0);
    expect(flow[76]).toBeLessThan(0);
  });

  it('should swing volume by 2A/ω around the baseline', () => {
    const { volume } = generateBreathingWaveform({ breaths: 1, leadIn: 0, leadOut: 0.5 });

    // phase 0 is the volume peak, phase π the trough
    expect(volume[0]).toBeCloseTo(2 + 0.75 / Math.PI, 12);
    expect(volume[150]).toBeCloseTo(2 - 0.75 / Math.PI, 12);
  });

  it('should add bounded noise from the random source', () => {
    const clean = generateBreathingWaveform();
    const noisy = generateBreathingWaveform({ noise: 0.1, random: () => 0.75 });

    expect(noisy.flow[10]).toBeCloseTo(clean.flow[10] + 0.05, 12);
    expect(noisy.volume).toEqual(clean.volume);
  });
});

describe('generateLinearPhaseWaveform', () => {
  it('should alternate constant flow between phases', () => {
    const { time, flow } = generateLinearPhaseWaveform();

    expect(time).toHaveLength(700);
    expect(flow[0]).toBe(0.5);
    expect(flow[99]).toBe(0.5);
    expect(flow[100]).toBe(-0.5);
    expect(flow[200]).toBe(0.5);
  });

  it('should integrate flow into volume', () => {
    const { volume } = generateLinearPhaseWaveform();

    expect(volume[0]).toBe(2);
    expect(volume[99]).toBeCloseTo(2.495, 9);
    expect(volume[100]).toBeCloseTo(2.495, 9);
    expect(volume[199]).toBeCloseTo(2, 9);
  });
});

describe('generateFlatWaveform', () => {
  it('should hold zero flow and constant volume', () => {
    const waveform = generateFlatWaveform(50, 0.02, 1.5);

    expect(waveform.time).toHaveLength(50);
    expect(waveform.time[2]).toBe(0.04);
    expect(waveform.flow.every(f => f === 0)).toBe(true);
    expect(waveform.volume.every(v => v === 1.5)).toBe(true);
  });
});
