/**
 * Body composition submission
 *
 * Uploads one measurement. If the service rejects a reused session, the
 * session is discarded and the upload retried once after a forced login.
 * A session that was just created by a login is never retried, so a
 * submission makes at most one login call.
 */

import { isAuthenticationError } from "../lib/errors.js";
import { setupLogger } from "../lib/logger.js";
import type { BodyCompositionApi, UploadResult } from "../services/garmin-connect/types.js";
import type { SessionManager } from "../session/session-manager.js";
import { formatLocalDate, toBodyComposition, type Measurement } from "./measurement.js";

const logger = setupLogger("submission");

export interface SubmissionDependencies {
  api: BodyCompositionApi;
  sessions: SessionManager;
}

export interface SubmissionResult {
  date: string;
  timestamp: string;
  uploadId: number | null;
  values: Record<string, number>;
}

/**
 * Submitted values without absent optional fields
 */
function presentValues(measurement: Measurement): Record<string, number> {
  const values: Record<string, number> = {};
  for (const [key, value] of Object.entries(measurement)) {
    if (typeof value === "number") {
      values[key] = value;
    }
  }
  return values;
}

export async function submitMeasurement(
  deps: SubmissionDependencies,
  measurement: Measurement
): Promise<SubmissionResult> {
  const record = toBodyComposition(measurement);
  const values = presentValues(measurement);

  logger.info(
    `Submitting body composition: weight=${measurement.weight}, body_fat=${measurement.bodyFat}%` +
      (measurement.bmi === undefined ? "" : `, BMI=${measurement.bmi}`)
  );

  const session = await deps.sessions.getSession();

  let upload: UploadResult;
  try {
    upload = await deps.api.addBodyComposition(session.tokens, record);
  } catch (error) {
    if (!isAuthenticationError(error) || session.source === "login") {
      throw error;
    }

    logger.warn(`Upload rejected with ${session.source} session, logging in again...`);
    deps.sessions.invalidate();
    const fresh = await deps.sessions.getSession({ forceLogin: true });
    upload = await deps.api.addBodyComposition(fresh.tokens, record);
  }

  logger.info(
    `Body composition submitted successfully${upload.uploadId === null ? "" : ` (upload ${upload.uploadId})`}`
  );

  return {
    date: formatLocalDate(measurement.timestamp),
    timestamp: measurement.timestamp.toISOString(),
    uploadId: upload.uploadId,
    values,
  };
}
