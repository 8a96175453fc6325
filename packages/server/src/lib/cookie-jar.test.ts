import { describe, it, expect } from "vitest";
import { CookieJar } from "./cookie-jar.js";

describe("CookieJar", () => {
  it("should be empty initially", () => {
    expect(new CookieJar().header()).toBeNull();
  });

  it("should keep name=value pairs and drop attributes", () => {
    const jar = new CookieJar();
    const headers = new Headers();
    headers.append("Set-Cookie", "SESSION=abc123; Path=/; HttpOnly");
    headers.append("Set-Cookie", "GARMIN-SSO=1; Domain=garmin.com");

    jar.store(new Response(null, { headers }));

    expect(jar.header()).toBe("SESSION=abc123; GARMIN-SSO=1");
  });

  it("should overwrite cookies with the same name", () => {
    const jar = new CookieJar();
    const first = new Headers();
    first.append("Set-Cookie", "SESSION=old");
    const second = new Headers();
    second.append("Set-Cookie", "SESSION=new; Secure");

    jar.store(new Response(null, { headers: first }));
    jar.store(new Response(null, { headers: second }));

    expect(jar.header()).toBe("SESSION=new");
  });

  it("should ignore malformed entries", () => {
    const jar = new CookieJar();
    const headers = new Headers();
    headers.append("Set-Cookie", "=novalue");

    jar.store(new Response(null, { headers }));

    expect(jar.header()).toBeNull();
  });
});
