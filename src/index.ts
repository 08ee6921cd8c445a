// ─── Types ────────────────────────────────────────────────────────────────────
export type {
  Decoded,
  InclusiveRange,
  Radial,
} from './types';

// ─── Constants ────────────────────────────────────────────────────────────────
export {
  FLOAT_SIZE,
  INT32_SIZE,
  RADIAL_FIXED_HEADER_SIZE,
  STRING_ALIGNMENT,
  RESERVED_SIZE,
  RATE_SLOT_SIZE,
  RATE_VALUE_OFFSET,
  RATE_SCALE,
  RATE_WIRE_MAX,
  RADIAL_RECORD_NAME,
  RADIAL_RANGES,
} from './constants';

// ─── Quantities ───────────────────────────────────────────────────────────────
export {
  Angle,
  Velocity,
  METERS_PER_SECOND_PER_INCH_PER_HOUR,
  METERS_PER_SECOND_PER_MILLIMETER_PER_HOUR,
} from './units';

// ─── Cursor ───────────────────────────────────────────────────────────────────
export {
  takeFloat,
  takeI32,
  takeU32,
  takeBytes,
  takeString,
  paddedLength,
  UnexpectedEndOfDataError,
} from './cursor';

// ─── Validation ───────────────────────────────────────────────────────────────
export { checkRangeInclusive, RangeViolationError } from './validate';

// ─── Radial ───────────────────────────────────────────────────────────────────
export { decodeRadial, decodeRadials } from './radial';

// ─── Writer ───────────────────────────────────────────────────────────────────
export { encodeRadial, encodedRadialLength } from './writer';
export type { EncodeRadialOptions } from './writer';
