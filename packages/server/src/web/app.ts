/**
 * HTTP application
 *
 * GET /        measurement form
 * POST /submit JSON or form-encoded measurement
 * GET /health  liveness, no external calls
 */

import { Hono, type Context } from "hono";
import { getSignedCookie, setSignedCookie } from "hono/cookie";
import { logger as requestLogger } from "hono/logger";
import { z } from "zod";
import {
  ValidationError,
  describeError,
  httpStatusFor,
  isRateLimitError,
  userMessageFor,
} from "../lib/errors.js";
import { setupLogger } from "../lib/logger.js";
import type { BodyCompositionApi } from "../services/garmin-connect/types.js";
import type { SessionManager } from "../session/session-manager.js";
import { parseMeasurement } from "../submission/measurement.js";
import { submitMeasurement, type SubmissionResult } from "../submission/submit.js";
import { renderFormPage, renderResultPage, type LastSubmission } from "./views.js";

const logger = setupLogger("web");
const httpLogger = setupLogger("http");

export const LAST_SUBMISSION_COOKIE = "last_submission";
export const SUCCESS_MESSAGE = "Body composition data submitted successfully!";

const LAST_SUBMISSION_MAX_AGE_SEC = 60 * 60 * 24 * 365;

const LastSubmissionSchema = z.object({
  date: z.string(),
  weight: z.number(),
  bodyFat: z.number(),
});

export interface AppDependencies {
  api: BodyCompositionApi;
  sessions: SessionManager;
  /** Signs the last_submission cookie */
  secretKey: string;
  now?: () => Date;
}

type ResponseFormat = "json" | "html";

// =============================================================================
// Request helpers
// =============================================================================

function isFormContentType(contentType: string): boolean {
  return (
    contentType.startsWith("application/x-www-form-urlencoded") ||
    contentType.startsWith("multipart/form-data")
  );
}

/**
 * Media types are case-insensitive.
 */
function contentTypeOf(c: Context): string {
  return (c.req.header("Content-Type") ?? "").trim().toLowerCase();
}

/**
 * Form posts get an HTML page unless the client asks for JSON.
 */
function responseFormat(c: Context): ResponseFormat {
  const contentType = contentTypeOf(c);
  const accept = (c.req.header("Accept") ?? "").toLowerCase();
  return isFormContentType(contentType) && !accept.includes("application/json")
    ? "html"
    : "json";
}

async function readPayload(c: Context): Promise<unknown> {
  const contentType = contentTypeOf(c);

  if (contentType.startsWith("application/json")) {
    try {
      return await c.req.json();
    } catch (error) {
      logger.debug(`Unparseable JSON body: ${describeError(error)}`);
      throw new ValidationError(["Request body must be valid JSON"]);
    }
  }

  if (isFormContentType(contentType)) {
    let body: FormData;
    try {
      body = await c.req.formData();
    } catch (error) {
      logger.debug(`Unparseable form body: ${describeError(error)}`);
      throw new ValidationError(["Request body must be valid form data"]);
    }

    const fields: Record<string, string> = {};
    body.forEach((value, key) => {
      if (typeof value === "string") {
        fields[key] = value;
      }
    });
    return fields;
  }

  throw new ValidationError([
    `Unsupported content type: ${contentType || "none"}`,
  ]);
}

async function readLastSubmission(
  c: Context,
  secretKey: string
): Promise<LastSubmission | null> {
  const raw = await getSignedCookie(c, secretKey, LAST_SUBMISSION_COOKIE);
  if (!raw) {
    if (raw === false) {
      logger.warn("Ignoring last_submission cookie with an invalid signature");
    }
    return null;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    logger.warn(`Ignoring malformed last_submission cookie: ${describeError(error)}`);
    return null;
  }

  const result = LastSubmissionSchema.safeParse(parsed);
  return result.success ? result.data : null;
}

// =============================================================================
// Responses
// =============================================================================

function respondWithSuccess(c: Context, format: ResponseFormat, result: SubmissionResult) {
  if (format === "html") {
    return c.html(
      renderResultPage({
        success: true,
        message: SUCCESS_MESSAGE,
        values: result.values,
        date: result.date,
      })
    );
  }

  return c.json({
    success: true,
    message: SUCCESS_MESSAGE,
    data: { date: result.date, timestamp: result.timestamp, ...result.values },
  });
}

function respondWithError(c: Context, format: ResponseFormat, error: unknown) {
  const status = httpStatusFor(error);
  const message = userMessageFor(error);

  if (status === 400) {
    logger.warn(`Rejected submission: ${describeError(error)}`);
  } else {
    logger.error(`Submission failed: ${describeError(error)}`);
  }

  if (isRateLimitError(error)) {
    c.header("Retry-After", String(error.retryAfterSeconds));
  }

  if (format === "html") {
    return c.html(renderResultPage({ success: false, message }), status);
  }

  if (error instanceof ValidationError) {
    return c.json({ success: false, error: message, issues: error.issues }, status);
  }
  return c.json({ success: false, error: message }, status);
}

// =============================================================================
// Application
// =============================================================================

export function createApp(deps: AppDependencies): Hono {
  const now = deps.now ?? (() => new Date());
  const app = new Hono();

  app.use("*", requestLogger((line: string) => httpLogger.info(line)));

  app.get("/", async (c) => {
    const lastSubmission = await readLastSubmission(c, deps.secretKey);
    return c.html(renderFormPage(lastSubmission));
  });

  app.post("/submit", async (c) => {
    const format = responseFormat(c);

    let result: SubmissionResult;
    try {
      const measurement = parseMeasurement(await readPayload(c), now());
      result = await submitMeasurement(deps, measurement);
    } catch (error) {
      return respondWithError(c, format, error);
    }

    const lastSubmission: LastSubmission = {
      date: result.date,
      weight: result.values.weight,
      bodyFat: result.values.bodyFat,
    };
    await setSignedCookie(
      c,
      LAST_SUBMISSION_COOKIE,
      JSON.stringify(lastSubmission),
      deps.secretKey,
      { httpOnly: true, sameSite: "Lax", path: "/", maxAge: LAST_SUBMISSION_MAX_AGE_SEC }
    );

    return respondWithSuccess(c, format, result);
  });

  app.get("/health", (c) =>
    c.json({ status: "ok", sessionActive: deps.sessions.isActive })
  );

  return app;
}
