/**
 * Garmin Connect API Client
 *
 * SSO login, OAuth2 token refresh and body composition upload.
 * Holds no tokens itself; callers pass the token pair to every call.
 */

import { setupLogger } from "../../lib/logger.js";
import { encodeBodyComposition } from "./fit-encoder.js";
import { API_USER_AGENT, discardBody, request } from "./http.js";
import {
  exchangeOAuth2Token,
  fetchConsumer,
  getOAuth1Token,
  type OAuthConsumer,
} from "./oauth.js";
import { getSsoTicket } from "./sso.js";
import type {
  BodyComposition,
  BodyCompositionApi,
  GarminCredentials,
  GarminTokens,
  RefreshResult,
  UploadResult,
} from "./types.js";

const logger = setupLogger("garmin-api");

/** Refresh this many seconds before the OAuth2 token actually expires */
const EXPIRY_MARGIN_SEC = 60;

const UPLOAD_FILE_NAME = "body_composition.fit";

export interface GarminConnectClientOptions {
  domain?: string;
  /** Clock, for token expiry (epoch milliseconds) */
  now?: () => number;
}

export class GarminConnectClient implements BodyCompositionApi {
  private readonly domain: string;
  private readonly now: () => number;
  private consumer: OAuthConsumer | null = null;

  constructor(options: GarminConnectClientOptions = {}) {
    this.domain = options.domain ?? "garmin.com";
    this.now = options.now ?? Date.now;
  }

  private get apiBase(): string {
    return `https://connectapi.${this.domain}`;
  }

  private async getConsumer(): Promise<OAuthConsumer> {
    if (this.consumer === null) {
      this.consumer = await fetchConsumer();
    }
    return this.consumer;
  }

  private authHeaders(tokens: GarminTokens): Record<string, string> {
    return {
      Authorization: `Bearer ${tokens.oauth2.access_token}`,
      "User-Agent": API_USER_AGENT,
    };
  }

  async login(credentials: GarminCredentials): Promise<GarminTokens> {
    const ticket = await getSsoTicket(credentials, this.domain);
    const consumer = await this.getConsumer();
    const oauth1 = await getOAuth1Token(consumer, ticket, this.domain);
    const oauth2 = await exchangeOAuth2Token(consumer, oauth1, this.now());

    logger.info("Login successful");
    return { oauth1, oauth2 };
  }

  /**
   * Whether the OAuth2 access token is expired (or about to be)
   */
  isExpired(tokens: GarminTokens): boolean {
    const nowSec = Math.floor(this.now() / 1000);
    return tokens.oauth2.expires_at - EXPIRY_MARGIN_SEC <= nowSec;
  }

  async refresh(tokens: GarminTokens): Promise<RefreshResult> {
    if (!this.isExpired(tokens)) {
      return { tokens, refreshed: false };
    }

    logger.info("Access token expired, exchanging a new one...");
    const consumer = await this.getConsumer();
    const oauth2 = await exchangeOAuth2Token(consumer, tokens.oauth1, this.now());

    logger.info(`Token refreshed (expires: ${new Date(oauth2.expires_at * 1000).toISOString()})`);
    return { tokens: { oauth1: tokens.oauth1, oauth2 }, refreshed: true };
  }

  async verify(tokens: GarminTokens): Promise<void> {
    logger.debug("GET /userprofile-service/socialProfile");
    const response = await request(
      `${this.apiBase}/userprofile-service/socialProfile`,
      { method: "GET", headers: this.authHeaders(tokens) },
      "Token check"
    );
    await discardBody(response);
  }

  async addBodyComposition(
    tokens: GarminTokens,
    record: BodyComposition
  ): Promise<UploadResult> {
    const fit = encodeBodyComposition(record);
    const form = new FormData();
    form.append(
      "file",
      new Blob([fit], { type: "application/octet-stream" }),
      UPLOAD_FILE_NAME
    );

    logger.debug(`POST /upload-service/upload (${fit.length} bytes)`);
    const response = await request(
      `${this.apiBase}/upload-service/upload`,
      { method: "POST", headers: this.authHeaders(tokens), body: form },
      "Body composition upload"
    );

    return { uploadId: await readUploadId(response) };
  }
}

/**
 * Upload id from the upload service response, when it reports one.
 */
async function readUploadId(response: Response): Promise<number | null> {
  const text = await response.text();
  if (!text) {
    return null;
  }

  let body: unknown;
  try {
    body = JSON.parse(text);
  } catch {
    logger.debug("Upload response was not JSON");
    return null;
  }

  if (typeof body !== "object" || body === null || !("detailedImportResult" in body)) {
    return null;
  }
  const result = body.detailedImportResult;
  if (typeof result !== "object" || result === null || !("uploadId" in result)) {
    return null;
  }
  return typeof result.uploadId === "number" ? result.uploadId : null;
}
