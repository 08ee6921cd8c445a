/**
 * precip-radial — range validation
 */

import type { InclusiveRange } from './types';

// ─── Errors ───────────────────────────────────────────────────────────────────

/**
 * Thrown when a decoded scalar lies outside its physically legal range.
 * The record it belongs to is rejected as a whole.
 */
export class RangeViolationError extends Error {
  constructor(
    readonly field:  string,
    readonly record: string,
    readonly value:  number,
    readonly range:  InclusiveRange,
  ) {
    super(
      `${record} ${field} is ${value}; ` +
      `expected a value in [${range.start}, ${range.end}].`,
    );
    this.name = 'RangeViolationError';
  }
}

// ─── checkRangeInclusive ──────────────────────────────────────────────────────

/**
 * Throw RangeViolationError unless `range.start <= value <= range.end`.
 *
 * Comparison is exact; both bounds are accepted. NaN compares false against
 * everything and is always rejected.
 *
 * @param field   Field name, for the error only.
 * @param record  Record kind the field belongs to, for the error only.
 */
export function checkRangeInclusive(
  range:  InclusiveRange,
  value:  number,
  field:  string,
  record: string,
): void {
  if (!(value >= range.start && value <= range.end)) {
    throw new RangeViolationError(field, record, value, range);
  }
}
