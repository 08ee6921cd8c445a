import { describe, it, expect } from 'vitest';
import { checkRangeInclusive, RangeViolationError, RADIAL_RANGES } from '../src/index';

describe('checkRangeInclusive', () => {
  const range = { start: -1, end: 45 };

  it('accepts both bounds and values between them', () => {
    expect(() => checkRangeInclusive(range, -1, 'elevation', 'radial')).not.toThrow();
    expect(() => checkRangeInclusive(range, 0,  'elevation', 'radial')).not.toThrow();
    expect(() => checkRangeInclusive(range, 45, 'elevation', 'radial')).not.toThrow();
  });

  it('rejects values just outside either bound', () => {
    expect(() => checkRangeInclusive(range, -1.1,  'elevation', 'radial')).toThrow(RangeViolationError);
    expect(() => checkRangeInclusive(range, 45.01, 'elevation', 'radial')).toThrow(RangeViolationError);
  });

  it('rejects NaN', () => {
    expect(() => checkRangeInclusive(range, NaN, 'elevation', 'radial')).toThrow(RangeViolationError);
  });

  it('reports the field, record, value and bounds', () => {
    try {
      checkRangeInclusive(RADIAL_RANGES.binCount, -1, 'bin count', 'radial');
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(RangeViolationError);
      expect(err).toBeInstanceOf(Error);
      if (err instanceof RangeViolationError) {
        expect(err.name).toBe('RangeViolationError');
        expect(err.field).toBe('bin count');
        expect(err.record).toBe('radial');
        expect(err.value).toBe(-1);
        expect(err.range).toEqual({ start: 0, end: 1840 });
        expect(err.message).toBe('radial bin count is -1; expected a value in [0, 1840].');
      }
    }
  });
});

describe('RADIAL_RANGES', () => {
  it('holds the legal wire ranges for each header field', () => {
    expect(RADIAL_RANGES).toEqual({
      azimuth:   { start:  0, end:  360 },
      elevation: { start: -1, end:   45 },
      width:     { start:  0, end:    2 },
      binCount:  { start:  0, end: 1840 },
    });
  });
});
