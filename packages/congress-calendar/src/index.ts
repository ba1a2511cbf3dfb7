/**
 * @congress-roster/congress-calendar
 *
 * Pure-function calendar of numbered Congresses.
 *
 * Key features:
 * - Date → Congress number, honoring the January 3 start date
 * - Calendar years per Congress
 * - March/January start month across the 1933 transition
 * - Ordinal and "which Congress" labels
 *
 * @example
 * ```typescript
 * import { sessionForDate, formatSessionLabel } from '@congress-roster/congress-calendar';
 *
 * sessionForDate(new Date('2024-06-01')); // 118
 * formatSessionLabel(2023);
 * // "117th Congress (2021-January 2023) & 118th Congress (January 2023-2025)"
 * ```
 */

export {
  FIRST_SESSION_YEAR,
  JANUARY_START_SESSION,
  currentSession,
  sessionForDate,
  sessionYears,
  transitionMonth,
} from './calendar.js';
export { formatOrdinal, formatSessionLabel } from './format.js';
export type { SessionYears, TransitionMonth, TransitionOverride } from './types.js';
