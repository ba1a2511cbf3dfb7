/**
 * @fileoverview Test doubles for the members endpoint: raw payload builders
 * and an axios instance backed by an in-process adapter.
 */

import axios, {
  AxiosError,
  type AxiosAdapter,
  type AxiosInstance,
  type InternalAxiosRequestConfig,
} from "axios";

export type RawMember = Record<string, unknown>;

/**
 * Builds a raw member as the API returns it.
 */
export function rawMember(id: string, overrides: RawMember = {}): RawMember {
  return {
    bioguideId: id,
    name: `Member, ${id}`,
    partyName: "Independent",
    state: "California",
    district: 1,
    url: `https://api.congress.gov/v3/member/${id}`,
    terms: { item: [{ chamber: "House of Representatives", startYear: 2023 }] },
    ...overrides,
  };
}

export function rawMembers(prefix: string, count: number, overrides: RawMember = {}): RawMember[] {
  return Array.from({ length: count }, (_, i) =>
    rawMember(`${prefix}${String(i).padStart(6, "0")}`, overrides)
  );
}

/**
 * A reply that fails the request instead of answering it.
 */
export type FailingReply = (config: InternalAxiosRequestConfig) => AxiosError;

function isFailingReply(reply: unknown): reply is FailingReply {
  return typeof reply === "function";
}

export interface FakeHttp {
  http: AxiosInstance;
  calls: InternalAxiosRequestConfig[];
}

/**
 * Creates an axios instance that answers from a queue of replies.
 * Plain values are served as 200 bodies; a {@link FailingReply} is thrown.
 */
export function fakeHttp(replies: unknown[]): FakeHttp {
  const calls: InternalAxiosRequestConfig[] = [];

  const adapter: AxiosAdapter = async (config) => {
    calls.push(config);
    const reply = replies[calls.length - 1];

    if (isFailingReply(reply)) {
      throw reply(config);
    }

    return { data: reply, status: 200, statusText: "OK", headers: {}, config };
  };

  return { http: axios.create({ adapter }), calls };
}

/**
 * An HTTP error response as axios reports it.
 */
export function httpError(status: number, statusText: string, data: unknown = {}): FailingReply {
  return (config) =>
    new AxiosError(
      `Request failed with status code ${status}`,
      status >= 500 ? AxiosError.ERR_BAD_RESPONSE : AxiosError.ERR_BAD_REQUEST,
      config,
      null,
      { data, status, statusText, headers: {}, config }
    );
}

/**
 * A transport failure with no response.
 */
export function networkError(message: string, code: string): FailingReply {
  return (config) => new AxiosError(message, code, config, null);
}
