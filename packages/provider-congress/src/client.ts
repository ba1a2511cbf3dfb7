/**
 * HTTP client for the Congress.gov members endpoint.
 */

import axios, { isAxiosError, type AxiosInstance } from "axios";
import type { Logger } from "@congress-roster/logger";
import { fromAxiosError } from "./errors.js";
import type { MembersPageRequest } from "./types.js";

/**
 * HTTP client configuration.
 */
export interface ClientConfig {
  apiKey: string;
  baseUrl: string;

  /** Request timeout in milliseconds */
  timeout: number;

  /** Preconfigured axios instance; `baseUrl` and `timeout` are then unused */
  httpClient?: AxiosInstance;

  logger?: Logger;
}

/**
 * Thin wrapper over axios that issues one members request at a time.
 *
 * @internal
 */
export class CongressClient {
  private readonly config: ClientConfig;
  private readonly http: AxiosInstance;

  constructor(config: ClientConfig) {
    this.config = config;
    this.http =
      config.httpClient ?? axios.create({ baseURL: config.baseUrl, timeout: config.timeout });
  }

  /**
   * Fetches one page of members serving in a session.
   *
   * @returns The response body, unparsed
   * @throws ApiError for non-2xx responses
   * @throws NetworkError for timeouts and connection failures
   *
   * @example
   * ```typescript
   * const body = await client.getMembersPage({
   *   session: 118,
   *   offset: 250,
   *   limit: 250,
   *   currentMember: true,
   * });
   * ```
   */
  async getMembersPage(request: MembersPageRequest): Promise<unknown> {
    const path = `/member/congress/${request.session}`;

    const params: Record<string, string | number> = {
      api_key: this.config.apiKey,
      format: "json",
      limit: request.limit,
      offset: request.offset,
      currentMember: String(request.currentMember),
    };
    if (request.chamber !== undefined) {
      params["chamber"] = request.chamber;
    }

    this.config.logger?.debug("Congress API request", { path, params });

    try {
      const response = await this.http.get<unknown>(path, { params });
      return response.data;
    } catch (error) {
      if (isAxiosError(error)) {
        throw fromAxiosError(error, path);
      }
      throw error;
    }
  }
}

export function createClient(config: ClientConfig): CongressClient {
  return new CongressClient(config);
}
