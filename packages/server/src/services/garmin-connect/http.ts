/**
 * HTTP helpers shared by the Garmin Connect client
 *
 * Status handling:
 * - 401/403: AuthenticationError
 * - 429: RateLimitError (Retry-After header, default 60 seconds)
 * - other non-2xx: RemoteServiceError (rejected)
 * - fetch failure: RemoteServiceError (unreachable)
 */

import {
  AuthenticationError,
  RateLimitError,
  RemoteServiceError,
} from "../../lib/errors.js";
import { setupLogger } from "../../lib/logger.js";

const logger = setupLogger("garmin-http");

export const SSO_USER_AGENT = "com.garmin.android.apps.connectmobile";
export const API_USER_AGENT = "GCM-iOS-5.7.2.1";

/** Default Retry-After seconds when the header is missing */
const DEFAULT_RETRY_AFTER_SECONDS = 60;

const MAX_ERROR_BODY_LENGTH = 200;

/**
 * Parse Retry-After header
 * - Number: seconds
 * - HTTP-date: seconds from now
 * - Missing or unparseable: default
 */
export function parseRetryAfter(headers: Headers): number {
  const retryAfter = headers.get("Retry-After");

  if (!retryAfter) {
    return DEFAULT_RETRY_AFTER_SECONDS;
  }

  const seconds = parseInt(retryAfter, 10);
  if (!isNaN(seconds)) {
    return seconds;
  }

  const date = new Date(retryAfter);
  if (!isNaN(date.getTime())) {
    const diffMs = date.getTime() - Date.now();
    return Math.max(1, Math.ceil(diffMs / 1000));
  }

  return DEFAULT_RETRY_AFTER_SECONDS;
}

/**
 * Release a response body that will not be read.
 */
export async function discardBody(response: Response): Promise<void> {
  try {
    await response.body?.cancel();
  } catch (error) {
    logger.debug(`Could not discard response body (${String(error)})`);
  }
}

/**
 * fetch() that reports network failures as RemoteServiceError and non-2xx
 * responses through the status mapping above.
 *
 * @param context - Short description of the call, used in error messages
 */
export async function request(
  url: string,
  init: RequestInit,
  context: string
): Promise<Response> {
  let response: Response;
  try {
    response = await fetch(url, init);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new RemoteServiceError(`${context} failed: ${reason}`, {
      kind: "unreachable",
    });
  }

  if (response.ok) {
    return response;
  }

  if (response.status === 401 || response.status === 403) {
    await discardBody(response);
    throw new AuthenticationError(`${context} rejected: HTTP ${response.status}`);
  }

  if (response.status === 429) {
    await discardBody(response);
    throw new RateLimitError(parseRetryAfter(response.headers));
  }

  let text = "";
  try {
    text = (await response.text()).slice(0, MAX_ERROR_BODY_LENGTH);
  } catch (error) {
    logger.debug(`${context}: could not read error body (${String(error)})`);
  }
  throw new RemoteServiceError(
    `${context} failed: HTTP ${response.status}${text ? ` - ${text}` : ""}`,
    { status: response.status, kind: "rejected" }
  );
}

/**
 * Read and validate a JSON response body.
 */
export async function readJson<T>(
  response: Response,
  parse: (raw: unknown) => T | null,
  context: string
): Promise<T> {
  let raw: unknown;
  try {
    raw = await response.json();
  } catch {
    throw new RemoteServiceError(`${context} returned invalid JSON`, {
      status: response.status,
      kind: "rejected",
    });
  }

  const parsed = parse(raw);
  if (parsed === null) {
    throw new RemoteServiceError(`${context} returned an unexpected response`, {
      status: response.status,
      kind: "rejected",
    });
  }
  return parsed;
}
