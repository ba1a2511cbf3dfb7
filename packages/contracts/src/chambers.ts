/**
 * @fileoverview Chamber enumeration and parsing utilities.
 *
 * @module @congress-roster/contracts/chambers
 */

/**
 * The two legislative bodies. Values match the canonical labels used in
 * filters and exported files.
 */
export enum Chamber {
  House = 'House',
  Senate = 'Senate',
}

/**
 * Accepted command-line tokens (lower-cased) for each chamber.
 *
 * @internal
 */
const CHAMBER_TOKENS: Record<string, Chamber> = {
  house: Chamber.House,
  h: Chamber.House,
  senate: Chamber.Senate,
  s: Chamber.Senate,
};

/**
 * Validates whether a string is a canonical chamber label.
 *
 * Comparison is case-sensitive: `'house'` is not a canonical label.
 *
 * @example
 * ```typescript
 * isChamber('Senate') // true
 * isChamber('senate') // false
 * ```
 */
export function isChamber(value: string): value is Chamber {
  return value === Chamber.House || value === Chamber.Senate;
}

/**
 * Parses a user-supplied chamber token.
 *
 * Accepts full names and single-letter abbreviations in any case
 * (`House`, `house`, `H`, `h`, `Senate`, `S`, ...).
 *
 * @returns The canonical chamber, or null for empty or unrecognized input
 *
 * @example
 * ```typescript
 * parseChamber('h')       // Chamber.House
 * parseChamber('SENATE')  // Chamber.Senate
 * parseChamber('Invalid') // null
 * ```
 */
export function parseChamber(token: string | null | undefined): Chamber | null {
  if (!token) {
    return null;
  }
  return CHAMBER_TOKENS[token.trim().toLowerCase()] ?? null;
}
