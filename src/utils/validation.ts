/**
 * Input validation utilities
 * @module utils/validation
 */

import type { Waveform } from '../types';

/**
 * Validation error with details
 */
export class ValidationError extends Error {
  constructor(
    message: string,
    public field: string,
    public value: unknown
  ) {
    super(`${field}: ${message}`);
    this.name = 'ValidationError';
  }
}

/**
 * Validate a recording before analysis.
 * Sequences must be equal length, hold at least 2 finite samples,
 * and time must be strictly increasing.
 */
export function validateWaveform(waveform: Waveform): true {
  const { time, volume, flow } = waveform;

  if (volume.length !== time.length || flow.length !== time.length) {
    throw new ValidationError(
      'Time, volume and flow must have the same length',
      'waveform',
      { time: time.length, volume: volume.length, flow: flow.length }
    );
  }

  if (time.length < 2) {
    throw new ValidationError('At least 2 samples are required', 'waveform', time.length);
  }

  const columns = { time, volume, flow };
  for (const [field, values] of Object.entries(columns)) {
    const bad = values.findIndex(v => !Number.isFinite(v));
    if (bad !== -1) {
      throw new ValidationError(`Sample ${bad} is not a finite number`, field, values[bad]);
    }
  }

  for (let i = 1; i < time.length; i++) {
    if (time[i] <= time[i - 1]) {
      throw new ValidationError(
        `Time must be strictly increasing (sample ${i}: ${time[i]} after ${time[i - 1]})`,
        'time',
        time[i]
      );
    }
  }

  return true;
}

/**
 * Validate an integer option against a lower bound
 */
export function validateInteger(value: number, field: string, min: number): boolean {
  if (!Number.isInteger(value)) {
    throw new ValidationError('Must be an integer', field, value);
  }

  if (value < min) {
    throw new ValidationError(`Must be at least ${min}`, field, value);
  }

  return true;
}

/**
 * Validate that a value is a finite number
 */
export function validateFinite(value: number, field: string): boolean {
  if (!Number.isFinite(value)) {
    throw new ValidationError('Must be a finite number', field, value);
  }

  return true;
}
