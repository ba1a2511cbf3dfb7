/**
 * @congress-roster/provider-congress
 *
 * Congress.gov members provider.
 *
 * Fetches every member serving in a given Congress, page by page, and
 * returns canonical {@link MemberRecord}s with distribution statistics.
 * It handles:
 * - Sequential offset pagination (one request in flight)
 * - Payload normalization (term envelopes, numeric strings, party fallback)
 * - State and chamber filtering
 * - Structured errors for upstream failures, never retried
 *
 * @example
 * ```typescript
 * import { createCongressProvider } from "@congress-roster/provider-congress";
 * import { createLogger } from "@congress-roster/logger";
 * import { Chamber } from "@congress-roster/contracts";
 *
 * const provider = createCongressProvider({
 *   apiKey: process.env['CONGRESS_API_KEY'] ?? '',
 *   logger: createLogger({ level: 'info' }),
 * });
 *
 * const { members, statistics } = await provider.fetchMembers({
 *   session: 118,
 *   chamber: Chamber.Senate,
 *   state: 'CA',
 * });
 * ```
 *
 * @packageDocumentation
 */

import {
  ConfigError,
  UsageError,
  type FetchMembersParams,
  type FetchMembersResult,
  type MemberRecord,
  type MembersProvider,
} from "@congress-roster/contracts";
import { currentSession } from "@congress-roster/congress-calendar";
import { createChildLogger, startTimer } from "@congress-roster/logger";
import { createClient } from "./client.js";
import { parseMembersPage } from "./normalize.js";
import { resolveState } from "./states.js";
import { computeStatistics } from "./stats.js";
import {
  CONGRESS_API_BASE_URL,
  DEFAULT_TIMEOUT_MS,
  MAX_PAGE_SIZE,
  type CongressProviderConfig,
} from "./types.js";

/**
 * Creates a Congress.gov members provider.
 *
 * @throws ConfigError if the API key is empty or the page size is out of range
 *
 * @example
 * ```typescript
 * const provider = createCongressProvider({
 *   apiKey: 'test-key',
 *   pageSize: 100,
 *   timeout: 10_000,
 * });
 * ```
 */
export function createCongressProvider(config: CongressProviderConfig): MembersProvider {
  if (!config.apiKey) {
    throw new ConfigError("A Congress.gov API key is required");
  }

  const pageSize = config.pageSize ?? MAX_PAGE_SIZE;
  if (!Number.isInteger(pageSize) || pageSize < 1 || pageSize > MAX_PAGE_SIZE) {
    throw new ConfigError(`Page size must be an integer between 1 and ${MAX_PAGE_SIZE}`, {
      issues: [`pageSize: ${pageSize}`],
    });
  }

  const logger = config.logger
    ? createChildLogger(config.logger, { component: "provider-congress" })
    : undefined;
  const now = config.now ?? (() => new Date());

  const client = createClient({
    apiKey: config.apiKey,
    baseUrl: config.baseUrl ?? CONGRESS_API_BASE_URL,
    timeout: config.timeout ?? DEFAULT_TIMEOUT_MS,
    httpClient: config.httpClient,
    logger,
  });

  return {
    /**
     * Fetches members of a session, optionally narrowed to a chamber and state.
     *
     * Arguments are validated before the first request. Pages are requested
     * until one comes back empty or without a continuation marker.
     *
     * @throws UsageError for an invalid session or state code
     * @throws ApiError / NetworkError / ParseError on upstream failure
     */
    async fetchMembers(params: FetchMembersParams): Promise<FetchMembersResult> {
      const { session, chamber } = params;

      if (!Number.isInteger(session) || session < 1) {
        throw new UsageError(`Invalid Congress number: ${session}. Must be a positive integer`, {
          argument: "congress",
          value: session,
        });
      }

      const state = params.state !== undefined ? resolveState(params.state) : undefined;
      const isCurrent = session === currentSession(now());
      const timer = startTimer();

      const fetched: MemberRecord[] = [];
      let offset = 0;
      let pages = 0;
      let hasNext = true;

      while (hasNext) {
        const body = await client.getMembersPage({
          session,
          offset,
          limit: pageSize,
          currentMember: isCurrent,
          chamber,
        });
        const page = parseMembersPage(body);
        pages++;

        logger?.debug("Fetched members page", { session, offset, count: page.members.length });

        fetched.push(...page.members);
        hasNext = page.members.length > 0 && page.hasNext;
        offset += pageSize;
      }

      let members = fetched;
      if (state) {
        members = members.filter((member) => member.state === state.name);
        logger?.debug("Applied state filter", { state: state.code, count: members.length });
      }
      if (chamber) {
        members = members.filter((member) => member.chamber === chamber);
        logger?.debug("Applied chamber filter", { chamber, count: members.length });
      }

      const statistics = computeStatistics(members, session, isCurrent);

      logger?.info("Fetched members", {
        session,
        chamber,
        state: state?.code,
        pages,
        fetched: fetched.length,
        count: members.length,
        duration_ms: timer.stop(),
      });

      return { members, statistics };
    },
  };
}

export { CongressClient, createClient } from "./client.js";
export type { ClientConfig } from "./client.js";
export {
  ApiError,
  NetworkError,
  ParseError,
  fromAxiosError,
  isApiError,
  isNetworkError,
  isParseError,
} from "./errors.js";
export { currentChamber, normalizeMember, normalizeTerms, parseMembersPage } from "./normalize.js";
export { getStateNames, resolveState } from "./states.js";
export type { ResolvedState } from "./states.js";
export { computeStatistics } from "./stats.js";
export { CONGRESS_API_BASE_URL, DEFAULT_TIMEOUT_MS, MAX_PAGE_SIZE } from "./types.js";
export type {
  CongressProviderConfig,
  MembersPage,
  MembersPageRequest,
  RawRecord,
} from "./types.js";
