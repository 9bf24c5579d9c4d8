import { isISO8601, matches } from 'class-validator';

/**
 * Calendar date helpers
 *
 * Tariffs are keyed by plain calendar dates (no time, no zone), carried
 * everywhere as ISO `YYYY-MM-DD` strings, which is also how PostgreSQL
 * renders a `date` column.
 */

const ISO_DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

/**
 * Checks that a value is an ISO `YYYY-MM-DD` string naming a day that exists
 *
 * @example
 * ```typescript
 * isCalendarDate('2024-02-29')  // true (leap year)
 * isCalendarDate('2023-02-29')  // false
 * isCalendarDate('2024-1-5')    // false (not zero padded)
 * ```
 */
export function isCalendarDate(value: unknown): value is string {
  return (
    typeof value === 'string' &&
    matches(value, ISO_DATE_PATTERN) &&
    isISO8601(value, { strict: true, strictSeparator: true })
  );
}
