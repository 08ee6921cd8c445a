/**
 * precip-radial — Radial encoding
 *
 * encodeRadial() writes the exact layout decodeRadial() reads. It is used to
 * build fixtures and to re-serialize records after inspection.
 *
 * All validation runs before the output buffer is allocated: a record that
 * fails any check produces no bytes at all.
 */

import {
  INT32_SIZE,
  RADIAL_FIXED_HEADER_SIZE,
  RADIAL_RANGES,
  RADIAL_RECORD_NAME,
  RATE_SCALE,
  RATE_SLOT_SIZE,
  RATE_VALUE_OFFSET,
  RATE_WIRE_MAX,
  RESERVED_SIZE,
} from './constants';
import { paddedLength } from './cursor';
import type { Radial } from './types';
import { checkRangeInclusive } from './validate';

const utf8Encoder = new TextEncoder();

const RATE_WIRE_RANGE = { start: 0, end: RATE_WIRE_MAX } as const;

// ─── Public types ─────────────────────────────────────────────────────────────

export interface EncodeRadialOptions {
  /**
   * Free-form attributes string stored ahead of the rate array.
   * Decoders skip it. Defaults to the empty string.
   */
  readonly attributes?: string;
}

// ─── Sizing ───────────────────────────────────────────────────────────────────

/**
 * Exact byte length of an encoded Radial.
 *
 * @param attributesByteLength  UTF-8 byte length of the attributes string,
 *                              before padding.
 */
export function encodedRadialLength(binCount: number, attributesByteLength: number): number {
  return RADIAL_FIXED_HEADER_SIZE +
    INT32_SIZE + paddedLength(attributesByteLength) +
    RESERVED_SIZE +
    binCount * RATE_SLOT_SIZE;
}

// ─── encodeRadial ─────────────────────────────────────────────────────────────

/**
 * Serialize a Radial.
 *
 * Angles are written in degrees as f32. The reserved word carries the bin
 * count again; decoders ignore it. Each rate is rounded to the nearest
 * 1/1000 in/h and stored in the trailing u16 of its slot, leading bytes zero.
 *
 * @throws RangeViolationError  if an angle or the bin count is outside
 *                              RADIAL_RANGES, or a rate does not fit a u16
 *                              after scaling (negative or above 65.535 in/h).
 */
export function encodeRadial(radial: Radial, options: EncodeRadialOptions = {}): Uint8Array {
  const azimuth   = Math.fround(radial.azimuth.degrees);
  const elevation = Math.fround(radial.elevation.degrees);
  const width     = Math.fround(radial.width.degrees);
  const binCount  = radial.precipRates.length;

  checkRangeInclusive(RADIAL_RANGES.azimuth,   azimuth,   'azimuth',   RADIAL_RECORD_NAME);
  checkRangeInclusive(RADIAL_RANGES.elevation, elevation, 'elevation', RADIAL_RECORD_NAME);
  checkRangeInclusive(RADIAL_RANGES.width,     width,     'width',     RADIAL_RECORD_NAME);
  checkRangeInclusive(RADIAL_RANGES.binCount,  binCount,  'bin count', RADIAL_RECORD_NAME);

  const wireRates = radial.precipRates.map(rate => {
    const raw = Math.round(rate.inchesPerHour * RATE_SCALE);
    checkRangeInclusive(RATE_WIRE_RANGE, raw, 'precip rate', RADIAL_RECORD_NAME);
    return raw;
  });

  const attributes = utf8Encoder.encode(options.attributes ?? '');
  const out        = new Uint8Array(encodedRadialLength(binCount, attributes.length));
  const dv         = new DataView(out.buffer);

  // ── Fixed header ─────────────────────────────────────────────────────────

  dv.setFloat32( 0, azimuth,   /* littleEndian */ false);
  dv.setFloat32( 4, elevation, false);
  dv.setFloat32( 8, width,     false);
  dv.setInt32  (12, binCount,  false);

  // ── Attributes (zero padding comes from the fresh buffer) ─────────────────

  let offset = RADIAL_FIXED_HEADER_SIZE;
  dv.setUint32(offset, attributes.length, false);
  offset += INT32_SIZE;
  out.set(attributes, offset);
  offset += paddedLength(attributes.length);

  // ── Reserved word ─────────────────────────────────────────────────────────

  dv.setUint32(offset, binCount, false);
  offset += RESERVED_SIZE;

  // ── Rate slots ────────────────────────────────────────────────────────────

  wireRates.forEach((raw, i) => {
    dv.setUint16(offset + i * RATE_SLOT_SIZE + RATE_VALUE_OFFSET, raw, false);
  });

  return out;
}
