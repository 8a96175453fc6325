/**
 * Garmin SSO login
 *
 * Signs in through the embedded SSO widget and returns the service ticket
 * that the OAuth service trades for an OAuth1 token.
 *
 * Flow:
 * 1. GET  /sso/embed   - set session cookies
 * 2. GET  /sso/signin  - scrape the CSRF token from the form
 * 3. POST /sso/signin  - submit credentials; page title "Success" carries the ticket
 */

import { CookieJar } from "../../lib/cookie-jar.js";
import { AuthenticationError, RemoteServiceError } from "../../lib/errors.js";
import { maskIdentifier, setupLogger } from "../../lib/logger.js";
import { SSO_USER_AGENT, discardBody, request } from "./http.js";
import type { GarminCredentials } from "./types.js";

const logger = setupLogger("garmin-sso");

const CSRF_PATTERN = /name="_csrf"\s+value="(.+?)"/;
const TITLE_PATTERN = /<title>(.+?)<\/title>/;
const TICKET_PATTERN = /embed\?ticket=([^"]+)"/;

interface SsoUrls {
  sso: string;
  embed: string;
  signin: string;
}

function ssoUrls(domain: string): SsoUrls {
  const sso = `https://sso.${domain}/sso`;
  return { sso, embed: `${sso}/embed`, signin: `${sso}/signin` };
}

function embedParams(urls: SsoUrls): URLSearchParams {
  return new URLSearchParams({
    id: "gauth-widget",
    embedWidget: "true",
    gauthHost: urls.sso,
  });
}

function signinParams(urls: SsoUrls): URLSearchParams {
  return new URLSearchParams({
    id: "gauth-widget",
    embedWidget: "true",
    gauthHost: urls.embed,
    service: urls.embed,
    source: urls.embed,
    redirectAfterAccountLoginUrl: urls.embed,
    redirectAfterAccountCreationUrl: urls.embed,
  });
}

/**
 * Extract a capture group from an SSO page, or throw if the page changed shape.
 */
function scrape(html: string, pattern: RegExp, what: string): string {
  const match = html.match(pattern);
  if (!match) {
    throw new RemoteServiceError(`Could not find ${what} in SSO response`, {
      kind: "rejected",
    });
  }
  return match[1];
}

/**
 * Sign in with account credentials and return the SSO service ticket.
 */
export async function getSsoTicket(
  credentials: GarminCredentials,
  domain: string
): Promise<string> {
  const urls = ssoUrls(domain);
  const jar = new CookieJar();

  const headers = (referer?: string): Record<string, string> => {
    const result: Record<string, string> = { "User-Agent": SSO_USER_AGENT };
    const cookie = jar.header();
    if (cookie) {
      result.Cookie = cookie;
    }
    if (referer) {
      result.Referer = referer;
    }
    return result;
  };

  logger.info(`Signing in as ${maskIdentifier(credentials.email)}...`);

  // Step 1: Session cookies
  const embedUrl = `${urls.embed}?${embedParams(urls)}`;
  logger.debug("GET /sso/embed");
  const embedResponse = await request(embedUrl, { headers: headers() }, "SSO embed");
  jar.store(embedResponse);
  await discardBody(embedResponse);

  // Step 2: CSRF token
  const signinUrl = `${urls.signin}?${signinParams(urls)}`;
  logger.debug("GET /sso/signin");
  const formResponse = await request(signinUrl, { headers: headers(embedUrl) }, "SSO sign-in form");
  jar.store(formResponse);
  const csrf = scrape(await formResponse.text(), CSRF_PATTERN, "CSRF token");

  // Step 3: Submit credentials
  logger.debug("POST /sso/signin");
  const loginResponse = await request(
    signinUrl,
    {
      method: "POST",
      headers: {
        ...headers(signinUrl),
        "Content-Type": "application/x-www-form-urlencoded",
      },
      body: new URLSearchParams({
        username: credentials.email,
        password: credentials.password,
        embed: "true",
        _csrf: csrf,
      }),
    },
    "SSO sign-in"
  );
  const html = await loginResponse.text();

  const title = scrape(html, TITLE_PATTERN, "page title");
  if (title.includes("MFA")) {
    throw new AuthenticationError("Account requires multi-factor authentication, which is not supported");
  }
  if (title !== "Success") {
    throw new AuthenticationError(`Login rejected (${title})`);
  }

  return scrape(html, TICKET_PATTERN, "service ticket");
}
