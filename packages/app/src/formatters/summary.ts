/**
 * Text formatting for CLI results
 *
 * Output is deterministic: the same input always produces the same text.
 */

import type { MemberStatistics } from '@congress-roster/contracts';
import { formatSessionLabel } from '@congress-roster/congress-calendar';

/**
 * Describe how many exported members are former or redistricted.
 * Zero counts are left out; with nothing to report the result is empty.
 *
 * @example
 * formatDistributionMessage({ total: 541, former: 3, redistricted: 0 });
 * // 'including 3 former'
 */
export function formatDistributionMessage(stats: MemberStatistics): string {
  const parts: string[] = [];
  if (stats.former > 0) {
    parts.push(`${stats.former} former`);
  }
  if (stats.redistricted > 0) {
    parts.push(`${stats.redistricted} redistricted`);
  }
  return parts.length > 0 ? `including ${parts.join(', ')}` : '';
}

/**
 * Answer to "which Congress sat during this year".
 *
 * @example
 * formatSessionLookup(2014);
 * // ['Congress in session during 2014:', '  113th Congress (2013-2015)']
 */
export function formatSessionLookup(year: number): string[] {
  return [`Congress in session during ${year}:`, `  ${formatSessionLabel(year)}`];
}
