/**
 * Validation of command-line values.
 *
 * Each function takes the raw string commander collected and either returns
 * the typed value or throws a UsageError whose message is shown as is.
 */

import { Chamber, UsageError, parseChamber } from '@congress-roster/contracts';
import { FIRST_SESSION_YEAR } from '@congress-roster/congress-calendar';

const INTEGER = /^-?\d+$/;

/**
 * Parse a `--which` year, accepted from 1789 to next year.
 */
export function parseYear(raw: string, now: Date): number {
  const maxYear = now.getUTCFullYear() + 1;
  const value = raw.trim();
  const year = INTEGER.test(value) ? Number(value) : Number.NaN;

  if (!Number.isSafeInteger(year) || year < FIRST_SESSION_YEAR || year > maxYear) {
    throw new UsageError(`Invalid year ${value}. Must be between ${FIRST_SESSION_YEAR} and ${maxYear}`, {
      argument: 'which',
      value: raw,
    });
  }

  return year;
}

/**
 * Parse a `--congress` session number.
 */
export function parseSessionNumber(raw: string): number {
  const value = raw.trim();
  const session = INTEGER.test(value) ? Number(value) : Number.NaN;

  if (!Number.isSafeInteger(session) || session < 1) {
    throw new UsageError(`Invalid Congress number: ${value}. Must be a positive integer`, {
      argument: 'congress',
      value: raw,
    });
  }

  return session;
}

/**
 * Parse a `--chamber` token (house, h, senate, s; any case).
 */
export function parseChamberOption(raw: string): Chamber {
  const chamber = parseChamber(raw);

  if (chamber === null) {
    throw new UsageError(`Invalid chamber specification: ${raw}. Use 'House'/'Senate' or 'H'/'S'.`, {
      argument: 'chamber',
      value: raw,
    });
  }

  return chamber;
}
