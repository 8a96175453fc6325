/**
 * Body composition measurement
 *
 * Field table shared by the form renderer (input attributes) and the
 * request validator (ranges), so both always agree.
 */

import { z } from "zod";
import { ValidationError } from "../lib/errors.js";
import { isEncodableTimestamp } from "../services/garmin-connect/fit-encoder.js";
import type { BodyComposition } from "../services/garmin-connect/types.js";

// =============================================================================
// Field table
// =============================================================================

export interface MeasurementField {
  label: string;
  unit: string;
  min: number;
  max: number;
  step: number;
  required: boolean;
}

export const MEASUREMENT_FIELDS = {
  weight: { label: "Weight", unit: "kg", min: 30, max: 300, step: 0.1, required: true },
  bodyFat: { label: "Body fat percentage", unit: "%", min: 3, max: 60, step: 0.1, required: true },
  bmi: { label: "BMI", unit: "", min: 10, max: 60, step: 0.1, required: false },
  percentHydration: { label: "Body water", unit: "%", min: 20, max: 80, step: 0.1, required: false },
  muscleMass: { label: "Muscle mass", unit: "kg", min: 5, max: 200, step: 0.1, required: false },
  boneMass: { label: "Bone mass", unit: "kg", min: 0.5, max: 10, step: 0.1, required: false },
  visceralFatMass: { label: "Visceral fat mass", unit: "kg", min: 0, max: 30, step: 0.1, required: false },
  visceralFatRating: { label: "Visceral fat rating", unit: "", min: 1, max: 59, step: 1, required: false },
  physiqueRating: { label: "Physique rating", unit: "", min: 1, max: 9, step: 1, required: false },
  metabolicAge: { label: "Metabolic age", unit: "years", min: 10, max: 100, step: 1, required: false },
  basalMet: { label: "Basal metabolic rate", unit: "kcal", min: 500, max: 5000, step: 1, required: false },
  activeMet: { label: "Active metabolic rate", unit: "kcal", min: 500, max: 10000, step: 1, required: false },
} as const satisfies Record<string, MeasurementField>;

export type MeasurementKey = keyof typeof MEASUREMENT_FIELDS;

/** Form order */
export const MEASUREMENT_KEYS: MeasurementKey[] = [
  "weight",
  "bodyFat",
  "bmi",
  "percentHydration",
  "muscleMass",
  "boneMass",
  "visceralFatMass",
  "visceralFatRating",
  "physiqueRating",
  "metabolicAge",
  "basalMet",
  "activeMet",
];

export function isMeasurementKey(key: string): key is MeasurementKey {
  return MEASUREMENT_KEYS.some((candidate) => candidate === key);
}

// =============================================================================
// Schema
// =============================================================================

/** Plain decimal notation only; no hex, exponent or digit separators */
const DECIMAL_PATTERN = /^[+-]?(\d+(\.\d*)?|\.\d+)$/;

/** Accepted clock skew between the browser and the server */
const FUTURE_TOLERANCE_MS = 5 * 60 * 1000;

/**
 * Form values arrive as strings; empty strings and null count as absent.
 */
function toNumber(value: unknown): unknown {
  if (value === null) {
    return undefined;
  }
  if (typeof value === "string") {
    const trimmed = value.trim();
    if (trimmed === "") {
      return undefined;
    }
    return DECIMAL_PATTERN.test(trimmed) ? Number(trimmed) : NaN;
  }
  return value;
}

function numberSchema(key: MeasurementKey) {
  const field: MeasurementField = MEASUREMENT_FIELDS[key];
  const unit = field.unit && field.unit !== "%" ? ` ${field.unit}` : "";
  const rangeMessage = `${field.label} must be between ${field.min} and ${field.max}${unit}`;

  const schema = z
    .number({
      required_error: `${field.label} is required`,
      invalid_type_error: `${field.label} must be a number`,
    })
    .min(field.min, rangeMessage)
    .max(field.max, rangeMessage);

  return field.step === 1 ? schema.int(`${field.label} must be a whole number`) : schema;
}

const required = (key: MeasurementKey) => z.preprocess(toNumber, numberSchema(key));
const optional = (key: MeasurementKey) => z.preprocess(toNumber, numberSchema(key).optional());

const TimestampSchema = z.preprocess(
  (value) => (value === null || value === "" ? undefined : value),
  z
    .string({ invalid_type_error: "Timestamp must be a date string" })
    .refine((value) => !isNaN(Date.parse(value)), "Timestamp must be a valid date")
    .refine(
      (value) => isNaN(Date.parse(value)) || isEncodableTimestamp(new Date(value)),
      "Timestamp is outside the supported range"
    )
    .transform((value) => new Date(value))
    .optional()
);

export const MeasurementSchema = z.object({
  weight: required("weight"),
  bodyFat: required("bodyFat"),
  bmi: optional("bmi"),
  percentHydration: optional("percentHydration"),
  muscleMass: optional("muscleMass"),
  boneMass: optional("boneMass"),
  visceralFatMass: optional("visceralFatMass"),
  visceralFatRating: optional("visceralFatRating"),
  physiqueRating: optional("physiqueRating"),
  metabolicAge: optional("metabolicAge"),
  basalMet: optional("basalMet"),
  activeMet: optional("activeMet"),
  timestamp: TimestampSchema,
});

type ParsedMeasurement = z.infer<typeof MeasurementSchema>;

export type Measurement = Omit<ParsedMeasurement, "timestamp"> & { timestamp: Date };

// =============================================================================
// Operations
// =============================================================================

/**
 * Validate a request payload.
 *
 * @param now - Timestamp used when the payload carries none
 * @throws ValidationError listing every problem
 */
export function parseMeasurement(payload: unknown, now: Date): Measurement {
  if (typeof payload !== "object" || payload === null || Array.isArray(payload)) {
    throw new ValidationError(["Request body must be an object"]);
  }

  const result = MeasurementSchema.safeParse(payload);
  if (!result.success) {
    throw new ValidationError(result.error.issues.map((issue) => issue.message));
  }

  const timestamp = result.data.timestamp ?? now;
  if (timestamp.getTime() > now.getTime() + FUTURE_TOLERANCE_MS) {
    throw new ValidationError(["Timestamp must not be in the future"]);
  }

  return { ...result.data, timestamp };
}

/**
 * Map a measurement to the record uploaded to Garmin Connect.
 */
export function toBodyComposition(measurement: Measurement): BodyComposition {
  return {
    timestamp: measurement.timestamp,
    weight: measurement.weight,
    percentFat: measurement.bodyFat,
    percentHydration: measurement.percentHydration,
    visceralFatMass: measurement.visceralFatMass,
    boneMass: measurement.boneMass,
    muscleMass: measurement.muscleMass,
    basalMet: measurement.basalMet,
    activeMet: measurement.activeMet,
    physiqueRating: measurement.physiqueRating,
    metabolicAge: measurement.metabolicAge,
    visceralFatRating: measurement.visceralFatRating,
    bmi: measurement.bmi,
  };
}

/**
 * Local calendar date (YYYY-MM-DD)
 */
export function formatLocalDate(date: Date): string {
  const year = date.getFullYear();
  const month = String(date.getMonth() + 1).padStart(2, "0");
  const day = String(date.getDate()).padStart(2, "0");
  return `${year}-${month}-${day}`;
}
