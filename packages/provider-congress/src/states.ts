/**
 * Two-letter state codes and the full names the API reports members under.
 */

import { z } from "zod";
import { UsageError } from "@congress-roster/contracts";
import stateTable from "../data/states.json" with { type: "json" };

const stateNamesSchema = z.record(z.string().regex(/^[A-Z]{2}$/), z.string().min(1));

let stateNames: Readonly<Record<string, string>> | undefined;

/**
 * Code → name table (50 states and DC), loaded from data/states.json and validated on first use.
 */
export function getStateNames(): Readonly<Record<string, string>> {
  if (stateNames === undefined) {
    stateNames = Object.freeze(stateNamesSchema.parse(stateTable));
  }
  return stateNames;
}

export interface ResolvedState {
  /** Upper-case two-letter code */
  code: string;

  /** Full name, as it appears in member records */
  name: string;
}

/**
 * Resolves a state code, case-insensitively and ignoring surrounding spaces.
 *
 * @throws UsageError for an empty or unknown code
 *
 * @example
 * ```typescript
 * resolveState(' ca '); // { code: 'CA', name: 'California' }
 * ```
 */
export function resolveState(input: string): ResolvedState {
  const trimmed = input.trim();
  if (trimmed === "") {
    throw new UsageError("State code cannot be empty", { argument: "state", value: input });
  }

  const code = trimmed.toUpperCase();
  const name = getStateNames()[code];
  if (name === undefined) {
    throw new UsageError(`Invalid state code: ${trimmed}`, { argument: "state", value: input });
  }

  return { code, name };
}
