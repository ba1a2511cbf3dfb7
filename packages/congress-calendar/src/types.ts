/**
 * Type definitions for congress-calendar package
 */

/**
 * Calendar years spanned by a session. The end year is exclusive: it is the
 * start year of the next session.
 */
export interface SessionYears {
  /** First calendar year of the session (always odd) */
  startYear: number;

  /** Start year of the following session */
  endYear: number;
}

/**
 * Month in which a session's sitting year begins.
 */
export interface TransitionMonth {
  /** English month name */
  name: 'March' | 'January';

  /** 1-based month number */
  month: 3 | 1;
}

/**
 * A one-off override of the general transition rule.
 */
export interface TransitionOverride {
  /** Calendar year the override applies to */
  year: number;

  /** Session number the override applies to */
  session: number;

  transition: TransitionMonth;
}
