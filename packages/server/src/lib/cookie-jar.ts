/**
 * Minimal cookie jar for multi-step login flows.
 *
 * Keeps name=value pairs from Set-Cookie headers. Attributes (path, expiry,
 * domain) are ignored; one jar is used per login attempt against one host.
 */
export class CookieJar {
  private readonly cookies = new Map<string, string>();

  store(response: Response): void {
    for (const header of response.headers.getSetCookie()) {
      const pair = header.split(";")[0];
      const index = pair.indexOf("=");
      if (index <= 0) {
        continue;
      }
      this.cookies.set(pair.slice(0, index).trim(), pair.slice(index + 1).trim());
    }
  }

  /** Value for a Cookie request header, or null when empty */
  header(): string | null {
    if (this.cookies.size === 0) {
      return null;
    }
    return Array.from(this.cookies, ([name, value]) => `${name}=${value}`).join("; ");
  }
}
