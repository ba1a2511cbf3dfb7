/**
 * Pure-function Congress calendar
 *
 * Provides deterministic, zero-I/O functions for:
 * - Mapping calendar dates to Congress (session) numbers
 * - Computing the calendar years a session spans
 * - Determining the month a session's sitting year begins, across the 1933
 *   switch from March to January
 *
 * Sessions are contiguous two-year periods counted from 1789. Dates are read
 * in UTC so results do not depend on the host timezone.
 */

import type { SessionYears, TransitionMonth, TransitionOverride } from './types.js';

/** Start year of the 1st Congress */
export const FIRST_SESSION_YEAR = 1789;

/** First session whose sitting year begins in January */
export const JANUARY_START_SESSION = 73;

/** Day of January on which a new session begins */
const SESSION_START_DAY = 3;

const MARCH: TransitionMonth = Object.freeze({ name: 'March', month: 3 });
const JANUARY: TransitionMonth = Object.freeze({ name: 'January', month: 1 });

/**
 * Overrides consulted before the general rule.
 *
 * 1933 is the only year in which both rules apply: the 72nd Congress ran out
 * in March under the old calendar, while the 73rd, convened in March, held
 * its first regular sitting the following January under the new one.
 */
const TRANSITION_OVERRIDES: readonly TransitionOverride[] = Object.freeze([
  Object.freeze({ year: 1933, session: 72, transition: MARCH }),
  Object.freeze({ year: 1933, session: 73, transition: JANUARY }),
]);

function assertValidDate(date: Date): void {
  if (!(date instanceof Date) || Number.isNaN(date.getTime())) {
    throw new TypeError(`Expected a valid Date, received: ${String(date)}`);
  }
}

function assertSession(session: number): void {
  if (!Number.isInteger(session) || session < 1) {
    throw new RangeError(`Session must be a positive integer, received: ${session}`);
  }
}

/**
 * Builds a UTC midnight date. Unlike Date.UTC, years below 100 are not
 * shifted into the 1900s.
 *
 * @internal
 */
export function utcDate(year: number, monthIndex: number, day: number): Date {
  const date = new Date(0);
  date.setUTCFullYear(year, monthIndex, day);
  return date;
}

/**
 * Get the Congress number in session on a given date
 *
 * A session starts on January 3 of an odd year; January 1 and 2 of an odd
 * year still belong to the previous session.
 *
 * @param date - Date to look up (UTC)
 * @returns Session number (1 for 1789-1790)
 * @throws TypeError if date is not a valid Date
 *
 * @example
 * ```typescript
 * sessionForDate(new Date('2023-01-02')); // 117
 * sessionForDate(new Date('2023-01-03')); // 118
 * ```
 */
export function sessionForDate(date: Date): number {
  assertValidDate(date);

  const calendarYear = date.getUTCFullYear();
  const isOddYear = calendarYear % 2 !== 0;
  let startYear = isOddYear ? calendarYear : calendarYear - 1;

  if (isOddYear && date.getUTCMonth() === 0 && date.getUTCDate() < SESSION_START_DAY) {
    startYear -= 2;
  }

  return 1 + Math.floor((startYear - FIRST_SESSION_YEAR) / 2);
}

/**
 * Get the Congress in session right now
 *
 * @param now - Clock reading, defaults to the current time
 */
export function currentSession(now: Date = new Date()): number {
  return sessionForDate(now);
}

/**
 * Get the calendar years spanned by a session
 *
 * @example
 * ```typescript
 * sessionYears(118); // { startYear: 2023, endYear: 2025 }
 * ```
 */
export function sessionYears(session: number): SessionYears {
  assertSession(session);
  const startYear = FIRST_SESSION_YEAR + (session - 1) * 2;
  return { startYear, endYear: startYear + 2 };
}

/**
 * Get the month in which a session's sitting year begins
 *
 * Sessions before the 73rd begin in March, later ones in January. Passing
 * the contextual year selects the 1933 overrides, which describe the
 * 72nd/73rd pair as it was seen during that year.
 *
 * @param session - Session number
 * @param year - Optional calendar year the question is asked about
 *
 * @example
 * ```typescript
 * transitionMonth(72, 1933); // { name: 'March', month: 3 }
 * transitionMonth(73, 1933); // { name: 'January', month: 1 }
 * ```
 */
export function transitionMonth(session: number, year?: number): TransitionMonth {
  assertSession(session);
  if (year !== undefined && !Number.isInteger(year)) {
    throw new TypeError(`Year must be an integer, received: ${year}`);
  }

  const override = TRANSITION_OVERRIDES.find(
    (entry) => entry.year === year && entry.session === session
  );
  if (override) {
    return override.transition;
  }

  return session < JANUARY_START_SESSION ? MARCH : JANUARY;
}
