/**
 * Core waveform types
 * @module types/waveform
 */

/**
 * One digitized sample of a respiratory recording
 */
export interface WaveformSample {
  /** Seconds */
  time: number;
  /** Liters */
  volume: number;
  /** Liters per second; the sign encodes direction */
  flow: number;
}

/**
 * A complete recording as three index-aligned sequences.
 * Time must be strictly increasing.
 */
export interface Waveform {
  time: readonly number[];
  volume: readonly number[];
  flow: readonly number[];
}

/**
 * A volume/flow loop recorded outside the analysis, such as a maximal
 * flow-volume manoeuvre, drawn for comparison with the averages
 */
export interface ReferenceLoop {
  volume: readonly number[];
  flow: readonly number[];
}

/**
 * Direction of a flow sign change
 */
export type CrossingDirection = 'neg-to-pos' | 'pos-to-neg';

/**
 * Both crossing directions, default inspiration start first
 */
export const CROSSING_DIRECTIONS: readonly CrossingDirection[] = [
  'pos-to-neg',
  'neg-to-pos',
] as const;

/**
 * A validated zero-flow crossing
 */
export interface ZeroCrossingEvent {
  /** Index of the last sample before the crossing */
  index: number;
  /** Interpolated zero-flow time, strictly between time[index] and time[index + 1] */
  time: number;
  /** Volume interpolated at the same fraction as time */
  volume: number;
  direction: CrossingDirection;
  interpolated: true;
}

/**
 * The other crossing direction
 */
export function oppositeDirection(direction: CrossingDirection): CrossingDirection {
  return direction === 'neg-to-pos' ? 'pos-to-neg' : 'neg-to-pos';
}

/**
 * Sign of the flow after a crossing in the given direction
 */
export function postCrossingSign(direction: CrossingDirection): 1 | -1 {
  return direction === 'neg-to-pos' ? 1 : -1;
}

/**
 * Read sample `index` of a waveform as a record
 */
export function sampleAt(waveform: Waveform, index: number): WaveformSample {
  return {
    time: waveform.time[index],
    volume: waveform.volume[index],
    flow: waveform.flow[index],
  };
}
