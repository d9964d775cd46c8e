/**
 * Mathematical utilities
 * @module utils/math
 */

/**
 * Linear interpolation between two values
 */
export function lerp(a: number, b: number, t: number): number {
  return a + (b - a) * t;
}

/**
 * Round to specified decimal places
 */
export function round(value: number, decimals: number = 0): number {
  const factor = Math.pow(10, decimals);
  return Math.round(value * factor) / factor;
}

/**
 * Calculate mean of an array; NaN when empty
 */
export function mean(values: readonly number[]): number {
  if (values.length === 0) return NaN;
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

/**
 * Sample variance with n - 1 degrees of freedom; NaN for fewer than 2 values
 */
export function sampleVariance(values: readonly number[]): number {
  if (values.length < 2) return NaN;

  const avg = mean(values);
  const sumSquareDiffs = values.reduce((sum, v) => sum + (v - avg) * (v - avg), 0);

  return sumSquareDiffs / (values.length - 1);
}

/**
 * Sample standard deviation (n - 1); NaN for fewer than 2 values
 */
export function sampleStandardDeviation(values: readonly number[]): number {
  return Math.sqrt(sampleVariance(values));
}
