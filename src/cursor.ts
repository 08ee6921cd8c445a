/**
 * precip-radial — big-endian byte cursor
 *
 * Each take*() reads from the front of a Uint8Array and returns the value
 * together with a subarray() view of the rest. Nothing is copied and the
 * input is never written, so callers thread the tail from one read to the
 * next:
 *
 *   const [azimuth, t1] = takeFloat(input);
 *   const [binCount, t2] = takeI32(t1);
 *
 * A read that would run past the end throws UnexpectedEndOfDataError and
 * consumes nothing.
 */

import { FLOAT_SIZE, INT32_SIZE, STRING_ALIGNMENT } from './constants';
import type { Decoded } from './types';

// ─── Errors ───────────────────────────────────────────────────────────────────

/**
 * Thrown when a buffer holds fewer bytes than the next field needs.
 *
 * `needed` is the byte length of the read that failed (for strings, the
 * padded body length once the prefix has been read); `available` is what was
 * left in the buffer at that point.
 */
export class UnexpectedEndOfDataError extends Error {
  constructor(
    readonly needed:    number,
    readonly available: number,
  ) {
    super(
      `Unexpected end of data: need ${needed} bytes, ` +
      `only ${available} remaining.`,
    );
    this.name = 'UnexpectedEndOfDataError';
  }
}

// ─── Internal helpers ─────────────────────────────────────────────────────────

// Stateless outside streaming mode; one instance serves every takeString().
const utf8Decoder = new TextDecoder();

function ensureAvailable(buf: Uint8Array, needed: number): void {
  if (buf.byteLength < needed) {
    throw new UnexpectedEndOfDataError(needed, buf.byteLength);
  }
}

function viewOf(buf: Uint8Array): DataView {
  return new DataView(buf.buffer, buf.byteOffset, buf.byteLength);
}

// ─── Scalars ──────────────────────────────────────────────────────────────────

/** IEEE-754 single precision. */
export function takeFloat(buf: Uint8Array): Decoded<number> {
  ensureAvailable(buf, FLOAT_SIZE);
  return [viewOf(buf).getFloat32(0, /* littleEndian */ false), buf.subarray(FLOAT_SIZE)];
}

export function takeI32(buf: Uint8Array): Decoded<number> {
  ensureAvailable(buf, INT32_SIZE);
  return [viewOf(buf).getInt32(0, false), buf.subarray(INT32_SIZE)];
}

export function takeU32(buf: Uint8Array): Decoded<number> {
  ensureAvailable(buf, INT32_SIZE);
  return [viewOf(buf).getUint32(0, false), buf.subarray(INT32_SIZE)];
}

// ─── Variable length ──────────────────────────────────────────────────────────

/**
 * Take `n` raw bytes. The returned slice is a view into `buf`, not a copy.
 *
 * @throws RangeError if n is not a non-negative integer.
 */
export function takeBytes(buf: Uint8Array, n: number): Decoded<Uint8Array> {
  if (!Number.isInteger(n) || n < 0) {
    throw new RangeError(`takeBytes: length must be a non-negative integer; got ${n}.`);
  }
  ensureAvailable(buf, n);
  return [buf.subarray(0, n), buf.subarray(n)];
}

/** Byte length of a string body once padded to STRING_ALIGNMENT. */
export function paddedLength(byteLength: number): number {
  return Math.ceil(byteLength / STRING_ALIGNMENT) * STRING_ALIGNMENT;
}

/**
 * Length-prefixed UTF-8 string.
 *
 *   [byte_len: u32][bytes: byte_len][zero pad to a multiple of 4]
 *
 * The padding is consumed along with the body; its contents are not checked.
 */
export function takeString(buf: Uint8Array): Decoded<string> {
  const [byteLength, afterPrefix] = takeU32(buf);
  const [padded, tail]            = takeBytes(afterPrefix, paddedLength(byteLength));
  return [utf8Decoder.decode(padded.subarray(0, byteLength)), tail];
}
