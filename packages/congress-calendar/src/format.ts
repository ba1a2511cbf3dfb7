/**
 * Display formatting for sessions: ordinals and "which Congress" labels.
 */

import { sessionForDate, sessionYears, transitionMonth, utcDate } from './calendar.js';

const ORDINAL_SUFFIXES: Readonly<Record<number, string>> = Object.freeze({
  1: 'st',
  2: 'nd',
  3: 'rd',
});

/**
 * Format a number as an ordinal (1st, 2nd, 3rd, 4th, 11th, 21st, 111th).
 *
 * @throws RangeError if n is not a non-negative integer
 */
export function formatOrdinal(n: number): string {
  if (!Number.isInteger(n) || n < 0) {
    throw new RangeError(`Ordinal requires a non-negative integer, received: ${n}`);
  }

  const lastTwo = n % 100;
  const suffix = lastTwo >= 10 && lastTwo <= 20 ? 'th' : ORDINAL_SUFFIXES[n % 10] ?? 'th';
  return `${n}${suffix}`;
}

/**
 * Describe the Congress(es) in session during a calendar year.
 *
 * Odd years see one session end and the next begin, so both are listed with
 * the month of the handover. Even years fall inside a single session.
 *
 * @example
 * ```typescript
 * formatSessionLabel(2014);
 * // "113th Congress (2013-2015)"
 * formatSessionLabel(2023);
 * // "117th Congress (2021-January 2023) & 118th Congress (January 2023-2025)"
 * formatSessionLabel(1933);
 * // "72nd Congress (1931-March 1933) & 73rd Congress (January 1933-1935)"
 * ```
 */
export function formatSessionLabel(year: number): string {
  if (!Number.isInteger(year)) {
    throw new TypeError(`Year must be an integer, received: ${year}`);
  }

  if (year % 2 === 0) {
    const session = sessionForDate(utcDate(year, 6, 1));
    const { startYear, endYear } = sessionYears(session);
    return `${formatOrdinal(session)} Congress (${startYear}-${endYear})`;
  }

  const previous = sessionForDate(utcDate(year, 0, 1));
  const current = previous + 1;

  const currentEnd = sessionYears(current).endYear;
  const currentMonth = transitionMonth(current, year).name;
  const currentLabel = `${formatOrdinal(current)} Congress (${currentMonth} ${year}-${currentEnd})`;

  // 1789 has no predecessor
  if (previous < 1) {
    return currentLabel;
  }

  const previousStart = sessionYears(previous).startYear;
  const previousMonth = transitionMonth(previous, year).name;
  return `${formatOrdinal(previous)} Congress (${previousStart}-${previousMonth} ${year}) & ${currentLabel}`;
}
