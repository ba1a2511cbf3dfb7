/**
 * Type definitions for the Congress.gov provider.
 */

import type { AxiosInstance } from "axios";
import type { Chamber, MemberRecord } from "@congress-roster/contracts";
import type { Logger } from "@congress-roster/logger";

/** Default API root */
export const CONGRESS_API_BASE_URL = "https://api.congress.gov/v3";

/** Default request timeout in milliseconds */
export const DEFAULT_TIMEOUT_MS = 30_000;

/** Largest page the members endpoint serves */
export const MAX_PAGE_SIZE = 250;

/**
 * Configuration for {@link createCongressProvider}.
 */
export interface CongressProviderConfig {
  /**
   * Congress.gov API key, sent as the `api_key` query parameter.
   */
  apiKey: string;

  /**
   * API root. Ignored when `httpClient` is given.
   * @default "https://api.congress.gov/v3"
   */
  baseUrl?: string;

  /**
   * Request timeout in milliseconds. Ignored when `httpClient` is given.
   * @default 30000
   */
  timeout?: number;

  /**
   * Records requested per page (1-250).
   * @default 250
   */
  pageSize?: number;

  /**
   * Preconfigured axios instance, used instead of creating one.
   */
  httpClient?: AxiosInstance;

  logger?: Logger;

  /**
   * Clock used to decide which session is current.
   */
  now?: () => Date;
}

/**
 * One request against the members endpoint.
 */
export interface MembersPageRequest {
  session: number;
  offset: number;
  limit: number;
  currentMember: boolean;
  chamber?: Chamber;
}

/**
 * A parsed page of the members endpoint.
 */
export interface MembersPage {
  members: MemberRecord[];

  /** Whether the response carried a usable continuation marker */
  hasNext: boolean;
}

/**
 * A raw JSON object from the API.
 */
export type RawRecord = Record<string, unknown>;
