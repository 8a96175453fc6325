import { beforeEach, describe, expect, it, vi } from "vitest";
import { createApp, SUCCESS_MESSAGE } from "./app.js";
import { SessionManager } from "../session/session-manager.js";
import { MemoryTokenStore } from "../session/token-store.js";
import { loadConfig } from "../lib/config.js";
import {
  AuthenticationError,
  RateLimitError,
  RemoteServiceError,
} from "../lib/errors.js";
import type { GarminTokens } from "../services/garmin-connect/types.js";
import { FakeGarminApi, makeTokens } from "../__tests__/fake-garmin-api.js";

const NOW = new Date("2026-03-14T12:00:00Z");

const config = loadConfig({
  EMAIL: "user@example.com",
  PASSWORD: "test-password",
  SECRET_KEY: "test-secret",
});

function postJson(body: unknown): RequestInit {
  return {
    method: "POST",
    headers: { "Content-Type": "application/json" },
    body: JSON.stringify(body),
  };
}

describe("web app", () => {
  let api: FakeGarminApi;
  let store: MemoryTokenStore<GarminTokens>;
  let sessions: SessionManager;
  let app: ReturnType<typeof createApp>;

  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    api = new FakeGarminApi();
    store = new MemoryTokenStore<GarminTokens>(makeTokens("stored"));
    sessions = new SessionManager({
      api,
      store,
      credentials: { email: config.email, password: config.password },
    });
    app = createApp({ api, sessions, secretKey: config.secretKey, now: () => NOW });
  });

  describe("GET /health", () => {
    it("should report no session before the first submission", async () => {
      const res = await app.request("/health");

      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({ status: "ok", sessionActive: false });
      expect(api.refresh).not.toHaveBeenCalled();
    });

    it("should report an active session after a submission", async () => {
      await app.request("/submit", postJson({ weight: 70.2, bodyFat: 18.5 }));

      const res = await app.request("/health");

      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({ status: "ok", sessionActive: true });
    });
  });

  describe("POST /submit (JSON)", () => {
    it("should upload with the cached token and echo the values", async () => {
      const res = await app.request("/submit", postJson({ weight: 70.2, bodyFat: 18.5 }));

      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({
        success: true,
        message: SUCCESS_MESSAGE,
        data: {
          date: "2026-03-14",
          timestamp: "2026-03-14T12:00:00.000Z",
          weight: 70.2,
          bodyFat: 18.5,
        },
      });
      expect(api.login).not.toHaveBeenCalled();
      expect(api.addBodyComposition).toHaveBeenCalledTimes(1);
    });

    it("should echo optional fields that were provided", async () => {
      const res = await app.request(
        "/submit",
        postJson({ weight: 70.2, bodyFat: 18.5, bmi: 22.4, metabolicAge: 38 })
      );

      expect(await res.json()).toEqual({
        success: true,
        message: SUCCESS_MESSAGE,
        data: {
          date: "2026-03-14",
          timestamp: "2026-03-14T12:00:00.000Z",
          weight: 70.2,
          bodyFat: 18.5,
          bmi: 22.4,
          metabolicAge: 38,
        },
      });
    });

    it("should log in once when the cached token is rejected", async () => {
      api.refresh.mockRejectedValueOnce(new AuthenticationError("Token refresh rejected"));

      const res = await app.request("/submit", postJson({ weight: 70.2, bodyFat: 18.5 }));

      expect(res.status).toBe(200);
      expect(api.login).toHaveBeenCalledTimes(1);
      expect((await store.read())?.oauth2.access_token).toBe("access-login");
    });

    it("should reject invalid values without calling the service", async () => {
      const res = await app.request("/submit", postJson({ weight: -5 }));

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({
        success: false,
        error: "Invalid input: Weight must be between 30 and 300 kg; Body fat percentage is required",
        issues: ["Weight must be between 30 and 300 kg", "Body fat percentage is required"],
      });
      expect(api.refresh).not.toHaveBeenCalled();
      expect(api.addBodyComposition).not.toHaveBeenCalled();
    });

    it("should reject a body that is not valid JSON", async () => {
      const res = await app.request("/submit", {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: "{",
      });

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({
        success: false,
        error: "Invalid input: Request body must be valid JSON",
        issues: ["Request body must be valid JSON"],
      });
      expect(api.addBodyComposition).not.toHaveBeenCalled();
    });

    it("should match the content type case-insensitively", async () => {
      const res = await app.request("/submit", {
        method: "POST",
        headers: { "Content-Type": "Application/JSON" },
        body: JSON.stringify({ weight: 70.2, bodyFat: 18.5 }),
      });

      expect(res.status).toBe(200);
      expect(api.addBodyComposition).toHaveBeenCalledTimes(1);
    });

    it("should reject a timestamp the upload format cannot hold", async () => {
      const res = await app.request(
        "/submit",
        postJson({ weight: 70, bodyFat: 18, timestamp: "1950-01-01T00:00:00Z" })
      );

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({
        success: false,
        error: "Invalid input: Timestamp is outside the supported range",
        issues: ["Timestamp is outside the supported range"],
      });
      expect(api.addBodyComposition).not.toHaveBeenCalled();
    });

    it("should reject an unsupported content type", async () => {
      const res = await app.request("/submit", {
        method: "POST",
        headers: { "Content-Type": "text/plain" },
        body: "weight=70",
      });

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({
        success: false,
        error: "Invalid input: Unsupported content type: text/plain",
        issues: ["Unsupported content type: text/plain"],
      });
    });
  });

  describe("POST /submit (errors)", () => {
    it("should answer 401 when the retry after login is also rejected", async () => {
      api.addBodyComposition.mockRejectedValue(
        new AuthenticationError("Body composition upload rejected: HTTP 401")
      );

      const res = await app.request("/submit", postJson({ weight: 70.2, bodyFat: 18.5 }));

      expect(res.status).toBe(401);
      expect(await res.json()).toEqual({
        success: false,
        error: "Authentication failed. Please check your credentials.",
      });
      expect(api.login).toHaveBeenCalledTimes(1);
      expect(api.addBodyComposition).toHaveBeenCalledTimes(2);
    });

    it("should answer 429 with Retry-After when rate limited", async () => {
      api.addBodyComposition.mockRejectedValue(new RateLimitError(30));

      const res = await app.request("/submit", postJson({ weight: 70.2, bodyFat: 18.5 }));

      expect(res.status).toBe(429);
      expect(res.headers.get("Retry-After")).toBe("30");
      expect(await res.json()).toEqual({
        success: false,
        error: "Too many requests. Please wait a moment and try again.",
      });
    });

    it("should answer 502 when the service rejects the upload", async () => {
      api.addBodyComposition.mockRejectedValue(
        new RemoteServiceError("Body composition upload failed: HTTP 409 - duplicate", {
          status: 409,
          kind: "rejected",
        })
      );

      const res = await app.request("/submit", postJson({ weight: 70.2, bodyFat: 18.5 }));

      expect(res.status).toBe(502);
      expect(await res.json()).toEqual({
        success: false,
        error: "Garmin Connect error: Body composition upload failed: HTTP 409 - duplicate",
      });
    });

    it("should answer 504 when the service is unreachable", async () => {
      api.addBodyComposition.mockRejectedValue(
        new RemoteServiceError("Body composition upload failed: fetch failed", {
          kind: "unreachable",
        })
      );

      const res = await app.request("/submit", postJson({ weight: 70.2, bodyFat: 18.5 }));

      expect(res.status).toBe(504);
      expect(await res.json()).toEqual({
        success: false,
        error: "Could not reach Garmin Connect. Please check your internet connection.",
      });
    });

    it("should answer 500 for unexpected errors", async () => {
      api.addBodyComposition.mockRejectedValue(new Error("boom"));

      const res = await app.request("/submit", postJson({ weight: 70.2, bodyFat: 18.5 }));

      expect(res.status).toBe(500);
      expect(await res.json()).toEqual({
        success: false,
        error: "An unexpected error occurred.",
      });
    });
  });

  describe("POST /submit (form)", () => {
    it("should render a result page for a form post", async () => {
      const res = await app.request("/submit", {
        method: "POST",
        body: new URLSearchParams({ weight: "81.4", bodyFat: "22", bmi: "" }),
      });

      expect(res.status).toBe(200);
      expect(res.headers.get("Content-Type")).toBe("text/html; charset=UTF-8");
      const page = await res.text();
      expect(page).toContain(`<p class="result ok">${SUCCESS_MESSAGE}</p>`);
      expect(page).toContain("<li>Weight: 81.4</li>");
      expect(page).toContain("<li>Body fat percentage: 22</li>");
      expect(page).toContain("<p>Date: 2026-03-14</p>");
      expect(api.addBodyComposition.mock.calls[0][1]).toMatchObject({
        weight: 81.4,
        percentFat: 22,
        bmi: undefined,
      });
    });

    it("should render the error on the result page", async () => {
      const res = await app.request("/submit", {
        method: "POST",
        body: new URLSearchParams({ weight: "heavy", bodyFat: "22" }),
      });

      expect(res.status).toBe(400);
      expect(await res.text()).toContain(
        '<p class="result fail">Invalid input: Weight must be a number</p>'
      );
      expect(api.addBodyComposition).not.toHaveBeenCalled();
    });

    it("should reject a multipart body without a boundary", async () => {
      const res = await app.request("/submit", {
        method: "POST",
        headers: { "Content-Type": "multipart/form-data", Accept: "application/json" },
        body: "weight=70",
      });

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({
        success: false,
        error: "Invalid input: Request body must be valid form data",
        issues: ["Request body must be valid form data"],
      });
      expect(api.addBodyComposition).not.toHaveBeenCalled();
    });

    it("should answer JSON when a form post accepts JSON", async () => {
      const res = await app.request("/submit", {
        method: "POST",
        headers: { Accept: "application/json" },
        body: new URLSearchParams({ weight: "81.4", bodyFat: "22" }),
      });

      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({
        success: true,
        message: SUCCESS_MESSAGE,
        data: {
          date: "2026-03-14",
          timestamp: "2026-03-14T12:00:00.000Z",
          weight: 81.4,
          bodyFat: 22,
        },
      });
    });
  });

  describe("GET /", () => {
    async function submitAndGetCookie(): Promise<string> {
      const res = await app.request("/submit", postJson({ weight: 70.2, bodyFat: 18.5 }));
      const setCookie = res.headers.get("Set-Cookie") ?? "";
      return setCookie.split(";")[0];
    }

    it("should render the form", async () => {
      const res = await app.request("/");

      expect(res.status).toBe(200);
      const page = await res.text();
      expect(page).toContain('<form id="measurement-form" method="post" action="/submit">');
      expect(page).toContain('<input id="weight" name="weight"');
      expect(page).not.toContain("Last submitted");
    });

    it("should set a signed, http-only cookie on success", async () => {
      const res = await app.request("/submit", postJson({ weight: 70.2, bodyFat: 18.5 }));
      const setCookie = res.headers.get("Set-Cookie") ?? "";

      expect(setCookie.startsWith("last_submission=")).toBe(true);
      expect(setCookie).toContain("HttpOnly");
      expect(setCookie).toContain("SameSite=Lax");
    });

    it("should show the last submission from the cookie", async () => {
      const cookie = await submitAndGetCookie();

      const res = await app.request("/", { headers: { Cookie: cookie } });

      expect(await res.text()).toContain(
        '<p class="last">Last submitted on 2026-03-14: 70.2 kg, 18.5% body fat</p>'
      );
    });

    it("should ignore a tampered cookie", async () => {
      const cookie = await submitAndGetCookie();
      const [name, value] = cookie.split("=");
      const tampered = `${name}=${encodeURIComponent(
        decodeURIComponent(value).replace("70.2", "50.2")
      )}`;

      const res = await app.request("/", { headers: { Cookie: tampered } });

      expect(res.status).toBe(200);
      expect(await res.text()).not.toContain("Last submitted");
    });
  });
});
