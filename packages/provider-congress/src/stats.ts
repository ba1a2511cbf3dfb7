/**
 * Distribution statistics over fetched members.
 */

import type { MemberRecord, MemberStatistics } from "@congress-roster/contracts";

/**
 * Counts former and redistricted members in one pass.
 *
 * - For the current session, a member is former when `currentMember` is
 *   explicitly `false`.
 * - For past sessions, a member is former when any term in that session did
 *   not run its full two years (`endYear !== startYear + 2`, a missing start
 *   year counting as 0).
 * - A member is redistricted when their terms in the session name more than
 *   one distinct district.
 */
export function computeStatistics(
  members: readonly MemberRecord[],
  session: number,
  isCurrentSession: boolean
): MemberStatistics {
  let former = 0;
  let redistricted = 0;

  for (const member of members) {
    const sessionTerms = member.terms.filter((term) => term.congress === session);

    if (isCurrentSession) {
      if (member.currentMember === false) {
        former++;
      }
    } else if (sessionTerms.some((term) => term.endYear !== (term.startYear ?? 0) + 2)) {
      former++;
    }

    const districts = new Set<string>();
    for (const term of sessionTerms) {
      if (term.district !== undefined) {
        districts.add(term.district);
      }
    }
    if (districts.size > 1) {
      redistricted++;
    }
  }

  return { total: members.length, former, redistricted };
}
