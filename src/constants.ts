/**
 * precip-radial — layout constants
 *
 * These constants define the binary contract of one Radial record in a
 * digital precipitation-rate product. All multi-byte values are big-endian.
 *
 *   [0..3]    azimuth     f32  degrees
 *   [4..7]    elevation   f32  degrees
 *   [8..11]   width       f32  degrees
 *   [12..15]  bin_count   i32
 *   [16..]    attributes  u32 byte length + UTF-8 bytes + zero pad to 4
 *   [+4]      reserved    4 bytes, not interpreted
 *   [+n×4]    rates       one 4-byte slot per bin:
 *                           [0..1] unused
 *                           [2..3] rate × 1000, u16
 */

import type { InclusiveRange } from './types';

// ─── Field Widths ─────────────────────────────────────────────────────────────

export const FLOAT_SIZE  = 4; // f32
export const INT32_SIZE  = 4; // i32 / u32

/** Byte length of the fixed prefix: azimuth, elevation, width, bin_count. */
export const RADIAL_FIXED_HEADER_SIZE = 3 * FLOAT_SIZE + INT32_SIZE; // 16

/** Strings are padded with zero bytes up to a multiple of this. */
export const STRING_ALIGNMENT = 4;

/** Reserved word between the attributes string and the rate array. */
export const RESERVED_SIZE = 4;

// ─── Rate Slots ───────────────────────────────────────────────────────────────

export const RATE_SLOT_SIZE   = 4;
/** Offset of the u16 rate inside its slot. Bytes before it are skipped. */
export const RATE_VALUE_OFFSET = 2;

/** Wire rate = round(inch_per_hour × RATE_SCALE). */
export const RATE_SCALE = 1000;

export const RATE_WIRE_MAX = 0xffff; // u16

// ─── Legal Ranges ─────────────────────────────────────────────────────────────

/** Record kind reported by validation errors raised while handling a Radial. */
export const RADIAL_RECORD_NAME = 'radial';

/**
 * Inclusive wire ranges for the scalar Radial header fields.
 * Angles are in degrees, as they appear on the wire.
 */
export const RADIAL_RANGES = {
  azimuth:   { start:  0, end:  360 },
  elevation: { start: -1, end:   45 },
  width:     { start:  0, end:    2 },
  binCount:  { start:  0, end: 1840 },
} as const satisfies Readonly<Record<string, InclusiveRange>>;
