/**
 * precip-radial — type definitions
 */

import type { Angle, Velocity } from './units';

// ─── Decoding ─────────────────────────────────────────────────────────────────

/**
 * Result of consuming a prefix of a byte buffer: the decoded value and a
 * zero-copy view of whatever follows it.
 */
export type Decoded<T> = readonly [value: T, tail: Uint8Array];

/** Closed interval; both bounds are legal values. */
export interface InclusiveRange {
  readonly start: number;
  readonly end:   number;
}

// ─── Radial ───────────────────────────────────────────────────────────────────

/**
 * Precipitation rates measured along one sweep of the radar beam.
 *
 * Built in full by decodeRadial() and never modified afterwards. The rate
 * array is owned by the record; it does not alias the input buffer.
 */
export interface Radial {
  /** Bearing along which this radial points. */
  readonly azimuth:     Angle;
  /** Angle the beam made with the horizontal. */
  readonly elevation:   Angle;
  /** Angular size of this radial. */
  readonly width:       Angle;
  /**
   * Rate in each bin, ascending distance from the radar.
   * A rate of zero is a measurement, not a missing-data marker.
   */
  readonly precipRates: readonly Velocity[];
}
