/**
 * Zero-Crossing Detector
 *
 * Finds sustained flow sign changes and interpolates the zero-flow instant.
 * A candidate between samples i and i + 1 is kept when:
 * - samples i + 2 ... i + 1 + lookAhead all carry the new sign, and
 * - the mean of the look-back window (i - offset - width + 1 ... i - offset)
 *   carries the old sign.
 *
 * @module signal/zero-crossing
 */

import type { CrossingDirection, CrossingValidationWindows, Waveform, ZeroCrossingEvent } from '../types';
import { postCrossingSign } from '../types';
import { DEFAULT_VALIDATION_WINDOWS } from '../config/defaults';
import { createLogger, type Logger } from '../utils/logger';
import { lerp } from '../utils/math';

const log = createLogger('signal:zero-crossing');

/**
 * Direction of a strict sign change from a to b, if any
 */
export function candidateDirection(a: number, b: number): CrossingDirection | null {
  if (a < 0 && b > 0) return 'neg-to-pos';
  if (a > 0 && b < 0) return 'pos-to-neg';
  return null;
}

/**
 * Check the look-ahead and look-back windows of a candidate at index i
 */
export function confirmCrossing(
  flow: readonly number[],
  i: number,
  direction: CrossingDirection,
  windows: CrossingValidationWindows = DEFAULT_VALIDATION_WINDOWS
): boolean {
  const sign = postCrossingSign(direction);

  // Look-ahead must be complete
  const aheadEnd = i + 1 + windows.lookAhead;
  if (aheadEnd >= flow.length) return false;

  for (let k = i + 2; k <= aheadEnd; k++) {
    if (Math.sign(flow[k]) !== sign) return false;
  }

  // Look-back uses whatever part of the window exists
  const backEnd = i - windows.lookBackOffset;
  const backStart = Math.max(0, backEnd - windows.lookBackWidth + 1);
  if (backEnd < 0) return false;

  let sum = 0;
  for (let k = backStart; k <= backEnd; k++) {
    sum += flow[k];
  }
  const backMean = sum / (backEnd - backStart + 1);

  return Math.sign(backMean) === -sign;
}

/**
 * Build the event for a confirmed crossing between samples i and i + 1
 */
export function interpolateCrossing(
  waveform: Waveform,
  i: number,
  direction: CrossingDirection
): ZeroCrossingEvent {
  const { time, volume, flow } = waveform;
  const f1 = flow[i];
  const f2 = flow[i + 1];
  const fraction = -f1 / (f2 - f1);

  return {
    index: i,
    time: lerp(time[i], time[i + 1], fraction),
    volume: lerp(volume[i], volume[i + 1], fraction),
    direction,
    interpolated: true,
  };
}

/**
 * Detect validated zero-flow crossings in time order.
 * Emitted events strictly alternate in direction.
 */
export function detectZeroCrossings(
  waveform: Waveform,
  windows: CrossingValidationWindows = DEFAULT_VALIDATION_WINDOWS,
  logger: Logger = log
): ZeroCrossingEvent[] {
  const { flow } = waveform;
  const events: ZeroCrossingEvent[] = [];
  let candidates = 0;
  let rejected = 0;
  let repeated = 0;

  for (let i = 0; i < flow.length - 1; i++) {
    const direction = candidateDirection(flow[i], flow[i + 1]);
    if (!direction) continue;
    candidates++;

    if (!confirmCrossing(flow, i, direction, windows)) {
      rejected++;
      continue;
    }

    const previous = events[events.length - 1];
    if (previous && previous.direction === direction) {
      repeated++;
      continue;
    }

    events.push(interpolateCrossing(waveform, i, direction));
  }

  logger.debug('Zero-crossing scan complete', {
    samples: flow.length,
    candidates,
    rejected,
    repeated,
    events: events.length,
  });

  return events;
}
