/**
 * CSV formatting for member records
 *
 * Column order is fixed. Fields containing a comma, a double quote, CR or LF
 * are wrapped in double quotes with inner quotes doubled, so any spreadsheet
 * or CSV reader gets the original values back.
 *
 * @example
 * formatMembersCsv([member]);
 * // bioguideId,name,party,state,district,chamber,url
 * // S000001,"Smith, Jane",Democratic,California,,Senate,https://api.congress.gov/v3/member/S000001
 */

import type { MemberRecord } from '@congress-roster/contracts';

/**
 * Exported columns, in order. Other record fields are not written.
 */
export const MEMBER_CSV_COLUMNS = [
  'bioguideId',
  'name',
  'party',
  'state',
  'district',
  'chamber',
  'url',
] as const;

export type MemberCsvColumn = (typeof MEMBER_CSV_COLUMNS)[number];

const NEEDS_QUOTING = /[",\r\n]/;

/**
 * Quote a single field if needed
 */
export function escapeCsvField(value: string): string {
  if (!NEEDS_QUOTING.test(value)) {
    return value;
  }
  return `"${value.replace(/"/g, '""')}"`;
}

/**
 * Format members as CSV: header row, one row per member, trailing newline.
 * Missing values are written as empty fields.
 */
export function formatMembersCsv(members: readonly MemberRecord[]): string {
  const lines = [MEMBER_CSV_COLUMNS.join(',')];

  for (const member of members) {
    lines.push(MEMBER_CSV_COLUMNS.map((column) => escapeCsvField(member[column] ?? '')).join(','));
  }

  return `${lines.join('\n')}\n`;
}
