/**
 * precip-radial — Radial decoding
 *
 * decodeRadial()  — parse one Radial from the front of a buffer and return
 *                   it with the bytes that follow.
 * decodeRadials() — parse a run of consecutive Radials, as found in the
 *                   radial list of a precipitation-rate product.
 *
 * Validation order follows wire order: a field is read only after every
 * field before it has been read and range-checked.
 */

import {
  RADIAL_RANGES,
  RADIAL_RECORD_NAME,
  RATE_SCALE,
  RATE_SLOT_SIZE,
  RATE_VALUE_OFFSET,
  RESERVED_SIZE,
} from './constants';
import { takeBytes, takeFloat, takeI32, takeString } from './cursor';
import type { Decoded, Radial } from './types';
import { Angle, Velocity } from './units';
import { checkRangeInclusive } from './validate';

// ─── decodeRadial ─────────────────────────────────────────────────────────────

/**
 * Parse one Radial (azimuth, elevation, width, bin count, attributes,
 * reserved word, rate array) from the start of `input`.
 *
 * Throws, reading nothing further, on the first failure:
 *   - RangeViolationError       a header scalar is outside RADIAL_RANGES
 *   - UnexpectedEndOfDataError  the buffer ends before a field does
 *
 * The bin count is range-checked before the rate array is sized, so a
 * negative or oversized count never reaches an allocation.
 */
export function decodeRadial(input: Uint8Array): Decoded<Radial> {
  const [azimuth, afterAzimuth] = takeFloat(input);
  checkRangeInclusive(RADIAL_RANGES.azimuth, azimuth, 'azimuth', RADIAL_RECORD_NAME);

  const [elevation, afterElevation] = takeFloat(afterAzimuth);
  checkRangeInclusive(RADIAL_RANGES.elevation, elevation, 'elevation', RADIAL_RECORD_NAME);

  const [width, afterWidth] = takeFloat(afterElevation);
  checkRangeInclusive(RADIAL_RANGES.width, width, 'width', RADIAL_RECORD_NAME);

  const [binCount, afterBinCount] = takeI32(afterWidth);
  checkRangeInclusive(RADIAL_RANGES.binCount, binCount, 'bin count', RADIAL_RECORD_NAME);

  // Attributes and the reserved word are consumed but not interpreted.
  const [, afterAttributes] = takeString(afterBinCount);
  const [, afterReserved]   = takeBytes(afterAttributes, RESERVED_SIZE);

  const [rateBytes, tail] = takeBytes(afterReserved, binCount * RATE_SLOT_SIZE);
  const rateView          = new DataView(rateBytes.buffer, rateBytes.byteOffset, rateBytes.byteLength);

  // Only the trailing u16 of each slot carries the rate.
  const precipRates: Velocity[] = new Array<Velocity>(binCount);
  for (let i = 0; i < binCount; i++) {
    const raw = rateView.getUint16(i * RATE_SLOT_SIZE + RATE_VALUE_OFFSET, /* littleEndian */ false);
    precipRates[i] = Velocity.fromInchesPerHour(raw / RATE_SCALE);
  }

  const radial: Radial = {
    azimuth:   Angle.fromDegrees(azimuth),
    elevation: Angle.fromDegrees(elevation),
    width:     Angle.fromDegrees(width),
    precipRates,
  };
  return [radial, tail];
}

// ─── decodeRadials ────────────────────────────────────────────────────────────

/**
 * Parse `count` Radials laid end to end.
 *
 * The first record to fail aborts the run; its error propagates unchanged
 * and no partial list is returned.
 *
 * @throws RangeError if count is not a non-negative integer.
 */
export function decodeRadials(input: Uint8Array, count: number): Decoded<Radial[]> {
  if (!Number.isInteger(count) || count < 0) {
    throw new RangeError(`decodeRadials: count must be a non-negative integer; got ${count}.`);
  }

  const radials: Radial[] = [];
  let   tail              = input;
  for (let i = 0; i < count; i++) {
    const [radial, rest] = decodeRadial(tail);
    radials.push(radial);
    tail = rest;
  }
  return [radials, tail];
}
