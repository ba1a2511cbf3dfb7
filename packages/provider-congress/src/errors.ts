/**
 * Error classes for the Congress.gov provider adapter.
 *
 * Upstream failures are never retried: each one aborts the fetch and is
 * surfaced to the caller with the transport error kept as `cause`.
 */

import { AxiosError } from "axios";
import { CongressError } from "@congress-roster/contracts";

/**
 * Thrown when the Congress.gov API answers with a non-2xx status.
 *
 * @example
 * ```typescript
 * throw new ApiError('Congress.gov API returned 403 Forbidden', {
 *   statusCode: 403,
 *   statusText: 'Forbidden',
 *   requestUrl: '/member/congress/118',
 * });
 * ```
 */
export class ApiError extends CongressError {
  /**
   * HTTP status code (e.g., 403, 500).
   */
  readonly statusCode?: number;

  /**
   * HTTP status text (e.g., 'Forbidden').
   */
  readonly statusText?: string;

  constructor(
    message: string,
    data: {
      statusCode?: number;
      statusText?: string;
      requestUrl?: string;
      responseBody?: string;
      [key: string]: unknown;
    },
    options?: { cause?: unknown }
  ) {
    super("CONGRESS_API_ERROR", message, data, options);
    this.name = "ApiError";
    this.statusCode = data.statusCode;
    this.statusText = data.statusText;
  }
}

/**
 * Thrown when the API cannot be reached: timeouts, refused or reset
 * connections, DNS failures.
 */
export class NetworkError extends CongressError {
  /**
   * Whether the request hit the configured timeout.
   */
  readonly timedOut: boolean;

  constructor(
    message: string,
    data: {
      requestUrl?: string;
      timedOut: boolean;
      errorCode?: string;
      [key: string]: unknown;
    },
    options?: { cause?: unknown }
  ) {
    super("CONGRESS_NETWORK_ERROR", message, data, options);
    this.name = "NetworkError";
    this.timedOut = data.timedOut;
  }
}

/**
 * Thrown when a response body is not a JSON object at all.
 *
 * Parseable bodies with missing or odd fields are tolerated by defaulting
 * and never raise this.
 */
export class ParseError extends CongressError {
  constructor(
    message: string,
    data?: {
      field?: string;
      expectedType?: string;
      actualType?: string;
      [key: string]: unknown;
    }
  ) {
    super("CONGRESS_PARSE_ERROR", message, data);
    this.name = "ParseError";
  }
}

const TIMEOUT_CODES = new Set<string>([AxiosError.ECONNABORTED, AxiosError.ETIMEDOUT]);

/** Upper bound on the response body kept in error data */
const MAX_BODY_LENGTH = 500;

function describeBody(body: unknown): string | undefined {
  if (body === undefined || body === null || body === "") {
    return undefined;
  }
  const text = typeof body === "string" ? body : JSON.stringify(body);
  return text.length > MAX_BODY_LENGTH ? `${text.slice(0, MAX_BODY_LENGTH)}...` : text;
}

/**
 * Maps an axios failure onto {@link ApiError} or {@link NetworkError}.
 *
 * @param error - Error raised by the axios instance
 * @param requestUrl - Request path, without query parameters
 */
export function fromAxiosError(error: AxiosError, requestUrl: string): ApiError | NetworkError {
  const response = error.response;

  if (response) {
    const status = `${response.status} ${response.statusText}`.trim();
    return new ApiError(
      `Congress.gov API returned ${status}`,
      {
        statusCode: response.status,
        statusText: response.statusText,
        requestUrl,
        responseBody: describeBody(response.data),
      },
      { cause: error }
    );
  }

  if (error.code !== undefined && TIMEOUT_CODES.has(error.code)) {
    return new NetworkError(
      `Congress.gov API request timed out: ${error.message}`,
      { requestUrl, timedOut: true, errorCode: error.code },
      { cause: error }
    );
  }

  return new NetworkError(
    `Could not reach Congress.gov API: ${error.message}`,
    { requestUrl, timedOut: false, errorCode: error.code },
    { cause: error }
  );
}

/**
 * Type guard to check if an error is an ApiError.
 *
 * @example
 * ```typescript
 * catch (err) {
 *   if (isApiError(err) && err.statusCode === 403) {
 *     logger.error('Congress.gov rejected the API key');
 *   }
 * }
 * ```
 */
export function isApiError(error: unknown): error is ApiError {
  return error instanceof ApiError;
}

/**
 * Type guard to check if an error is a NetworkError.
 */
export function isNetworkError(error: unknown): error is NetworkError {
  return error instanceof NetworkError;
}

/**
 * Type guard to check if an error is a ParseError.
 */
export function isParseError(error: unknown): error is ParseError {
  return error instanceof ParseError;
}
