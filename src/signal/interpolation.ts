/**
 * Piecewise-linear lookups over sorted samples
 * @module signal/interpolation
 */

/**
 * Index `k` of the pair with xs[k] <= x < xs[k + 1].
 * Caller guarantees xs[0] <= x < xs[xs.length - 1].
 */
export function findBracket(xs: readonly number[], x: number): number {
  let left = 0;
  let right = xs.length - 1;

  while (right - left > 1) {
    const mid = Math.floor((left + right) / 2);
    if (xs[mid] <= x) {
      left = mid;
    } else {
      right = mid;
    }
  }

  return left;
}

/**
 * Interpolate ys at x over ascending xs.
 * Values at or beyond either end clamp to the boundary sample.
 */
export function interpolateAt(xs: readonly number[], ys: readonly number[], x: number): number {
  const last = xs.length - 1;
  if (x <= xs[0]) return ys[0];
  if (x >= xs[last]) return ys[last];

  const k = findBracket(xs, x);
  const x1 = xs[k];
  const x2 = xs[k + 1];
  const y1 = ys[k];
  const y2 = ys[k + 1];

  return y1 + ((y2 - y1) / (x2 - x1)) * (x - x1);
}

/**
 * Equally spaced targets from `start` to `end`, inclusive.
 * The last target is exactly `end`.
 */
export function evenTargets(start: number, end: number, intervals: number): number[] {
  const targets: number[] = [];
  const step = (end - start) / intervals;

  for (let j = 0; j <= intervals; j++) {
    targets.push(j === intervals ? end : start + step * j);
  }

  return targets;
}
