/**
 * Garmin Connect OAuth
 *
 * Garmin issues an OAuth1 token after SSO login and trades it for a
 * short-lived OAuth2 bearer token. Both requests are OAuth 1.0a signed with
 * the mobile app's consumer key, which Garmin does not publish; it is read
 * from the consumer file the Garmin client libraries share.
 */

import OAuth from "oauth-1.0a";
import { createHmac } from "node:crypto";
import { z } from "zod";
import { RemoteServiceError } from "../../lib/errors.js";
import { setupLogger } from "../../lib/logger.js";
import { API_USER_AGENT, SSO_USER_AGENT, readJson, request } from "./http.js";
import {
  OAuth1TokenSchema,
  OAuth2TokenResponseSchema,
  type OAuth1Token,
  type OAuth2Token,
} from "./types.js";

const logger = setupLogger("garmin-oauth");

export const OAUTH_CONSUMER_URL = "https://thegarth.s3.amazonaws.com/oauth_consumer.json";

const ConsumerSchema = z.object({
  consumer_key: z.string().min(1),
  consumer_secret: z.string().min(1),
});

export type OAuthConsumer = z.infer<typeof ConsumerSchema>;

/**
 * Fetch the OAuth consumer key pair.
 */
export async function fetchConsumer(): Promise<OAuthConsumer> {
  const response = await request(OAUTH_CONSUMER_URL, { method: "GET" }, "OAuth consumer fetch");
  return readJson(
    response,
    (raw) => {
      const result = ConsumerSchema.safeParse(raw);
      return result.success ? result.data : null;
    },
    "OAuth consumer fetch"
  );
}

function createSigner(consumer: OAuthConsumer): OAuth {
  return new OAuth({
    consumer: {
      key: consumer.consumer_key,
      secret: consumer.consumer_secret,
    },
    signature_method: "HMAC-SHA1",
    hash_function(baseString, key) {
      return createHmac("sha1", key).update(baseString).digest("base64");
    },
  });
}

function apiBase(domain: string): string {
  return `https://connectapi.${domain}/oauth-service/oauth`;
}

/**
 * Trade an SSO ticket for an OAuth1 token.
 */
export async function getOAuth1Token(
  consumer: OAuthConsumer,
  ticket: string,
  domain: string
): Promise<OAuth1Token> {
  const loginUrl = `https://sso.${domain}/sso/embed`;
  const params = new URLSearchParams({
    ticket,
    "login-url": loginUrl,
    "accepts-mfa-tokens": "true",
  });
  const url = `${apiBase(domain)}/preauthorized?${params}`;

  const oauth = createSigner(consumer);
  const authHeader = oauth.toHeader(oauth.authorize({ url, method: "GET" }));

  logger.debug("GET /oauth-service/oauth/preauthorized");
  const response = await request(
    url,
    {
      method: "GET",
      headers: { ...authHeader, "User-Agent": SSO_USER_AGENT },
    },
    "OAuth1 token request"
  );

  const body = new URLSearchParams(await response.text());
  const result = OAuth1TokenSchema.safeParse({
    oauth_token: body.get("oauth_token") ?? undefined,
    oauth_token_secret: body.get("oauth_token_secret") ?? undefined,
    mfa_token: body.get("mfa_token") ?? undefined,
    mfa_expiration_timestamp: body.get("mfa_expiration_timestamp") ?? undefined,
    domain,
  });
  if (!result.success) {
    throw new RemoteServiceError("OAuth1 token response is missing oauth_token", {
      status: response.status,
      kind: "rejected",
    });
  }
  return result.data;
}

/**
 * Exchange an OAuth1 token for a fresh OAuth2 token.
 *
 * @param nowMs - Clock used to compute absolute expiry
 */
export async function exchangeOAuth2Token(
  consumer: OAuthConsumer,
  oauth1: OAuth1Token,
  nowMs: number = Date.now()
): Promise<OAuth2Token> {
  const url = `${apiBase(oauth1.domain)}/exchange/user/2.0`;
  const data: Record<string, string> = oauth1.mfa_token ? { mfa_token: oauth1.mfa_token } : {};

  const oauth = createSigner(consumer);
  const authHeader = oauth.toHeader(
    oauth.authorize(
      { url, method: "POST", data },
      { key: oauth1.oauth_token, secret: oauth1.oauth_token_secret }
    )
  );

  logger.debug("POST /oauth-service/oauth/exchange/user/2.0");
  const response = await request(
    url,
    {
      method: "POST",
      headers: {
        ...authHeader,
        "User-Agent": API_USER_AGENT,
        "Content-Type": "application/x-www-form-urlencoded",
      },
      body: new URLSearchParams(data),
    },
    "OAuth2 token exchange"
  );

  const token = await readJson(
    response,
    (raw) => {
      const result = OAuth2TokenResponseSchema.safeParse(raw);
      return result.success ? result.data : null;
    },
    "OAuth2 token exchange"
  );

  const nowSec = Math.floor(nowMs / 1000);
  return {
    ...token,
    expires_at: nowSec + token.expires_in,
    refresh_token_expires_at:
      token.refresh_token_expires_in === undefined
        ? undefined
        : nowSec + token.refresh_token_expires_in,
  };
}
