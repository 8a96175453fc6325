/**
 * FIT file encoder for body composition uploads
 *
 * Garmin Connect imports body composition through its upload service as a
 * FIT "weight" file: a file_id message, a device_info message and one
 * weight_scale message per measurement.
 *
 * Layout:
 *   [14-byte header][definition + data records...][CRC-16 of everything before]
 */

import type { BodyComposition } from "./types.js";

// =============================================================================
// Constants
// =============================================================================

const HEADER_SIZE = 14;
const PROTOCOL_VERSION = 0x10;
const PROFILE_VERSION = 2132;

/** Seconds between the Unix epoch and the FIT epoch (1989-12-31T00:00:00Z) */
const FIT_EPOCH_OFFSET_SEC = 631065600;

const MESG_FILE_ID = 0;
const MESG_DEVICE_INFO = 23;
const MESG_WEIGHT_SCALE = 30;

const FILE_TYPE_WEIGHT = 9;
const MANUFACTURER_DEVELOPMENT = 255;

const CRC_TABLE = [
  0x0000, 0xcc01, 0xd801, 0x1400, 0xf001, 0x3c00, 0x2800, 0xe401,
  0xa001, 0x6c00, 0x7800, 0xb401, 0x5000, 0x9c01, 0x8801, 0x4400,
];

// =============================================================================
// Types
// =============================================================================

export interface BaseType {
  id: number;
  size: 1 | 2 | 4;
}

export const BASE_TYPES = {
  enum: { id: 0x00, size: 1 },
  uint8: { id: 0x02, size: 1 },
  uint16: { id: 0x84, size: 2 },
  uint32: { id: 0x86, size: 4 },
  uint32z: { id: 0x8c, size: 4 },
} as const satisfies Record<string, BaseType>;

export interface FitField {
  num: number;
  type: BaseType;
  value: number;
}

export interface FitMessage {
  globalNum: number;
  fields: FitField[];
}

// =============================================================================
// CRC
// =============================================================================

/**
 * FIT CRC-16 (same polynomial as CRC-16/ARC)
 */
export function fitCrc(bytes: Uint8Array, initial: number = 0): number {
  let crc = initial;
  for (const byte of bytes) {
    let tmp = CRC_TABLE[crc & 0xf];
    crc = (crc >> 4) & 0x0fff;
    crc = crc ^ tmp ^ CRC_TABLE[byte & 0xf];

    tmp = CRC_TABLE[crc & 0xf];
    crc = (crc >> 4) & 0x0fff;
    crc = crc ^ tmp ^ CRC_TABLE[(byte >> 4) & 0xf];
  }
  return crc;
}

// =============================================================================
// Encoding
// =============================================================================

/**
 * Convert a date to FIT timestamp (seconds since FIT epoch)
 */
export function toFitTimestamp(date: Date): number {
  return Math.floor(date.getTime() / 1000) - FIT_EPOCH_OFFSET_SEC;
}

/** 0xFFFFFFFF is the FIT "invalid" marker for uint32 */
const MAX_FIT_TIMESTAMP = 0xfffffffe;

/**
 * Whether a date fits the uint32 FIT timestamp field
 */
export function isEncodableTimestamp(date: Date): boolean {
  const timestamp = toFitTimestamp(date);
  return timestamp >= 0 && timestamp <= MAX_FIT_TIMESTAMP;
}

function writeValue(view: DataView, offset: number, field: FitField): void {
  switch (field.type.size) {
    case 1:
      view.setUint8(offset, field.value);
      break;
    case 2:
      view.setUint16(offset, field.value, true);
      break;
    case 4:
      view.setUint32(offset, field.value, true);
      break;
  }
}

/**
 * Encode a definition record followed by its data record.
 * Each message gets its own local message type (index modulo 16).
 */
function encodeMessage(message: FitMessage, localType: number): Uint8Array {
  const definitionSize = 6 + message.fields.length * 3;
  const dataSize = 1 + message.fields.reduce((sum, f) => sum + f.type.size, 0);
  const bytes = new Uint8Array(definitionSize + dataSize);
  const view = new DataView(bytes.buffer);

  // Definition record: header, reserved, little-endian, global number, field count
  view.setUint8(0, 0x40 | localType);
  view.setUint8(1, 0);
  view.setUint8(2, 0);
  view.setUint16(3, message.globalNum, true);
  view.setUint8(5, message.fields.length);

  let offset = 6;
  for (const field of message.fields) {
    view.setUint8(offset, field.num);
    view.setUint8(offset + 1, field.type.size);
    view.setUint8(offset + 2, field.type.id);
    offset += 3;
  }

  view.setUint8(offset, localType);
  offset += 1;
  for (const field of message.fields) {
    writeValue(view, offset, field);
    offset += field.type.size;
  }

  return bytes;
}

/**
 * Encode messages into a complete FIT file (header, records, trailing CRC).
 */
export function encodeFitFile(messages: FitMessage[]) {
  const records = messages.map((message, index) => encodeMessage(message, index % 16));
  const dataSize = records.reduce((sum, record) => sum + record.length, 0);

  const file = new Uint8Array(HEADER_SIZE + dataSize + 2);
  const view = new DataView(file.buffer);

  view.setUint8(0, HEADER_SIZE);
  view.setUint8(1, PROTOCOL_VERSION);
  view.setUint16(2, PROFILE_VERSION, true);
  view.setUint32(4, dataSize, true);
  file.set([0x2e, 0x46, 0x49, 0x54], 8); // ".FIT"
  view.setUint16(12, fitCrc(file.subarray(0, 12)), true);

  let offset = HEADER_SIZE;
  for (const record of records) {
    file.set(record, offset);
    offset += record.length;
  }

  view.setUint16(offset, fitCrc(file.subarray(0, offset)), true);
  return file;
}

// =============================================================================
// Body composition
// =============================================================================

type ScaledKey = Exclude<keyof BodyComposition, "timestamp">;

/** weight_scale field number, base type and scale per body composition value */
const WEIGHT_SCALE_FIELDS: Record<ScaledKey, { num: number; type: BaseType; scale: number }> = {
  weight: { num: 0, type: BASE_TYPES.uint16, scale: 100 },
  percentFat: { num: 1, type: BASE_TYPES.uint16, scale: 100 },
  percentHydration: { num: 2, type: BASE_TYPES.uint16, scale: 100 },
  visceralFatMass: { num: 3, type: BASE_TYPES.uint16, scale: 100 },
  boneMass: { num: 4, type: BASE_TYPES.uint16, scale: 100 },
  muscleMass: { num: 5, type: BASE_TYPES.uint16, scale: 100 },
  basalMet: { num: 7, type: BASE_TYPES.uint16, scale: 4 },
  physiqueRating: { num: 8, type: BASE_TYPES.uint8, scale: 1 },
  activeMet: { num: 9, type: BASE_TYPES.uint16, scale: 4 },
  metabolicAge: { num: 10, type: BASE_TYPES.uint8, scale: 1 },
  visceralFatRating: { num: 11, type: BASE_TYPES.uint8, scale: 1 },
  bmi: { num: 13, type: BASE_TYPES.uint16, scale: 10 },
};

const FIELD_ORDER: ScaledKey[] = [
  "weight",
  "percentFat",
  "percentHydration",
  "visceralFatMass",
  "boneMass",
  "muscleMass",
  "basalMet",
  "physiqueRating",
  "activeMet",
  "metabolicAge",
  "visceralFatRating",
  "bmi",
];

/**
 * Build the FIT messages for one body composition record.
 * Absent optional values are left out of the weight_scale definition.
 */
export function buildBodyCompositionMessages(record: BodyComposition): FitMessage[] {
  if (!isEncodableTimestamp(record.timestamp)) {
    throw new RangeError(`Timestamp out of FIT range: ${record.timestamp.toISOString()}`);
  }
  const timestamp = toFitTimestamp(record.timestamp);

  const weightFields: FitField[] = [{ num: 253, type: BASE_TYPES.uint32, value: timestamp }];
  for (const key of FIELD_ORDER) {
    const value = record[key];
    if (value === undefined) {
      continue;
    }
    const { num, type, scale } = WEIGHT_SCALE_FIELDS[key];
    weightFields.push({ num, type, value: Math.round(value * scale) });
  }

  return [
    {
      globalNum: MESG_FILE_ID,
      fields: [
        { num: 0, type: BASE_TYPES.enum, value: FILE_TYPE_WEIGHT },
        { num: 1, type: BASE_TYPES.uint16, value: MANUFACTURER_DEVELOPMENT },
        { num: 2, type: BASE_TYPES.uint16, value: 0 },
        { num: 3, type: BASE_TYPES.uint32z, value: 1 },
        { num: 4, type: BASE_TYPES.uint32, value: timestamp },
      ],
    },
    {
      globalNum: MESG_DEVICE_INFO,
      fields: [
        { num: 253, type: BASE_TYPES.uint32, value: timestamp },
        { num: 2, type: BASE_TYPES.uint16, value: MANUFACTURER_DEVELOPMENT },
        { num: 4, type: BASE_TYPES.uint16, value: 0 },
      ],
    },
    { globalNum: MESG_WEIGHT_SCALE, fields: weightFields },
  ];
}

/**
 * Encode a body composition record as a FIT weight file.
 */
export function encodeBodyComposition(record: BodyComposition) {
  return encodeFitFile(buildBodyCompositionMessages(record));
}
