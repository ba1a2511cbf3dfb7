/**
 * Normalization of raw Congress.gov member payloads.
 *
 * The API is loose about shapes: `terms` arrives wrapped in an `{ item }`
 * envelope holding either a list or a single object, numbers sometimes come
 * as strings, and `party` is occasionally only present as `partyName`.
 * Everything is converted to {@link MemberRecord} here, so nothing past this
 * module inspects raw JSON.
 */

import type { MemberRecord, MemberTerm } from "@congress-roster/contracts";
import { ParseError } from "./errors.js";
import type { MembersPage, RawRecord } from "./types.js";

const HOUSE_LABEL = "House of Representatives";

export function isRecord(value: unknown): value is RawRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function toNumber(value: unknown): number | undefined {
  if (typeof value === "number" && Number.isFinite(value)) {
    return value;
  }
  if (typeof value === "string" && /^-?\d+$/.test(value.trim())) {
    return Number(value.trim());
  }
  return undefined;
}

function toText(value: unknown): string | undefined {
  if (typeof value === "string") {
    return value;
  }
  if (typeof value === "number" && Number.isFinite(value)) {
    return String(value);
  }
  return undefined;
}

function normalizeTerm(raw: RawRecord): MemberTerm {
  return {
    chamber: toText(raw["chamber"]) ?? "",
    congress: toNumber(raw["congress"]),
    startYear: toNumber(raw["startYear"]),
    endYear: toNumber(raw["endYear"]),
    district: toText(raw["district"]),
  };
}

/**
 * Reads a member's terms, unwrapping the `{ item: ... }` envelope.
 *
 * A missing field yields `[]`, a single term object a one-element list.
 * Entries that are not objects are dropped.
 *
 * @example
 * ```typescript
 * normalizeTerms({ terms: { item: { chamber: 'Senate', startYear: 2019 } } });
 * // [{ chamber: 'Senate', startYear: 2019, ... }]
 * ```
 */
export function normalizeTerms(record: RawRecord): MemberTerm[] {
  const raw = record["terms"];
  const items = isRecord(raw) ? raw["item"] : raw;

  let list: unknown[] = [];
  if (Array.isArray(items)) {
    list = items;
  } else if (isRecord(items)) {
    list = [items];
  }

  return list.filter(isRecord).map(normalizeTerm);
}

function chamberOfTerms(terms: readonly MemberTerm[]): string {
  const last = terms[terms.length - 1];
  if (!last) {
    return "";
  }
  return last.chamber === HOUSE_LABEL ? "House" : last.chamber;
}

/**
 * Chamber of a member's most recent term.
 *
 * `"House of Representatives"` is shortened to `"House"`; other labels pass
 * through. No terms gives `""`.
 */
export function currentChamber(record: RawRecord): string {
  return chamberOfTerms(normalizeTerms(record));
}

/**
 * Converts a raw member object to a {@link MemberRecord}.
 */
export function normalizeMember(raw: RawRecord): MemberRecord {
  const terms = normalizeTerms(raw);
  const currentMember = raw["currentMember"];

  return {
    bioguideId: toText(raw["bioguideId"]) ?? "",
    name: toText(raw["name"]) ?? "",
    party: toText(raw["party"]) ?? toText(raw["partyName"]) ?? "",
    state: toText(raw["state"]) ?? "",
    district: toText(raw["district"]),
    chamber: chamberOfTerms(terms),
    url: toText(raw["url"]) ?? "",
    currentMember: typeof currentMember === "boolean" ? currentMember : undefined,
    terms,
  };
}

/**
 * Parses one response body of the members endpoint.
 *
 * A missing `members` array is an empty page. `pagination.next` only counts
 * as a continuation when it is a non-empty string.
 *
 * @throws ParseError if the body is not a JSON object
 */
export function parseMembersPage(body: unknown): MembersPage {
  if (!isRecord(body)) {
    throw new ParseError("Members response is not a JSON object", {
      expectedType: "object",
      actualType: Array.isArray(body) ? "array" : typeof body,
    });
  }

  const rawMembers = body["members"];
  const members = Array.isArray(rawMembers)
    ? rawMembers.filter(isRecord).map(normalizeMember)
    : [];

  const pagination = body["pagination"];
  const next = isRecord(pagination) ? pagination["next"] : undefined;

  return {
    members,
    hasNext: typeof next === "string" && next.length > 0,
  };
}
