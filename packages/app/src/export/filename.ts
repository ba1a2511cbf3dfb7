/**
 * Default output file names.
 */

import type { Chamber } from '@congress-roster/contracts';

/**
 * Build `members_<session>_<House|Senate|All>[_<STATE>].csv`.
 *
 * @example
 * generateOutputFilename(118);                      // 'members_118_All.csv'
 * generateOutputFilename(118, Chamber.House, 'ca'); // 'members_118_House_CA.csv'
 */
export function generateOutputFilename(session: number, chamber?: Chamber, state?: string): string {
  const parts = ['members', String(session), chamber ?? 'All'];

  const stateCode = state?.trim().toUpperCase();
  if (stateCode) {
    parts.push(stateCode);
  }

  return `${parts.join('_')}.csv`;
}
