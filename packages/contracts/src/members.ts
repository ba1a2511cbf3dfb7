/**
 * @fileoverview Member record and statistics types.
 *
 * These are the canonical shapes produced at the upstream boundary. Raw API
 * payloads never travel past the normalizer.
 *
 * @module @congress-roster/contracts/members
 */

import type { Chamber } from './chambers.js';

/**
 * One service term from a member's history.
 */
export interface MemberTerm {
  /** Chamber label as reported upstream (e.g. "House of Representatives") */
  chamber: string;

  /** Session (Congress) number the term belongs to, when reported */
  congress?: number;

  startYear?: number;

  endYear?: number;

  /** District identifier, House terms only */
  district?: string;
}

/**
 * A legislator's data for a queried session.
 *
 * @invariant terms is always an array, never a bare object
 */
export interface MemberRecord {
  /** Stable Bioguide identifier (e.g. "S000148") */
  readonly bioguideId: string;
  readonly name: string;
  readonly party: string;
  /** Full state name (e.g. "New York") */
  readonly state: string;
  readonly district?: string;
  /** Current chamber, "" when unknown */
  readonly chamber: string;
  /** API URL for the member's detail record */
  readonly url: string;
  readonly currentMember?: boolean;
  readonly terms: readonly MemberTerm[];
}

/**
 * Aggregate counts over a filtered record set.
 */
export interface MemberStatistics {
  total: number;
  /** Members no longer serving (left before the session ended) */
  former: number;
  /** Members recorded with more than one district within the session */
  redistricted: number;
}

/**
 * Parameters for a member listing.
 */
export interface FetchMembersParams {
  /** Congress number, >= 1 */
  session: number;

  chamber?: Chamber;

  /** Two-letter state or district code (e.g. "NY", "DC") */
  state?: string;
}

/**
 * Result of a member listing.
 */
export interface FetchMembersResult {
  members: MemberRecord[];
  statistics: MemberStatistics;
}

/**
 * Anything that can list members for a session.
 */
export interface MembersProvider {
  fetchMembers(params: FetchMembersParams): Promise<FetchMembersResult>;
}
