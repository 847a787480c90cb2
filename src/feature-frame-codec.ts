/**
 * Binary frame codec for SC-prefixed feature frames streamed over WebSocket.
 *
 * Wire format: [0x53 0x43 magic ("SC")][type byte 0x46 ('F')][3-byte big-endian uint24 header JSON length][UTF-8 header JSON][float32 LE values]
 *
 * Header JSON: { seq, timestamp? }
 */

import type { FeatureFrameHeader } from "./types.js";

// ─── Constants ──────────────────────────────────────────────────────────────────

const SC_MAGIC_0 = 0x53; // 'S'
const SC_MAGIC_1 = 0x43; // 'C'
const TYPE_FEATURE = 0x46; // 'F'

/** Minimum valid frame size: 2 (magic) + 1 (type) + 3 (header len) = 6 bytes */
const MIN_FRAME_SIZE = 6;

/** Maximum header JSON size in bytes */
const MAX_HEADER_JSON_BYTES = 4096;

const BYTES_PER_VALUE = 4;

/** Upper bound on values per frame (chroma is 12, MFCC/timbre stacks a few dozen) */
const MAX_VALUES_PER_FRAME = 4096;

// ─── Encode ─────────────────────────────────────────────────────────────────────

/**
 * Encode a feature frame into the SC-prefixed wire format.
 * Values are written as 32-bit floats, so precision beyond float32 is lost.
 */
export function encodeFeatureFrame(header: FeatureFrameHeader, values: readonly number[]): Buffer {
  const headerJson = Buffer.from(JSON.stringify(header), "utf-8");
  const totalLen = MIN_FRAME_SIZE + headerJson.length + values.length * BYTES_PER_VALUE;
  const buf = Buffer.alloc(totalLen);

  let offset = 0;
  buf[offset++] = SC_MAGIC_0;
  buf[offset++] = SC_MAGIC_1;
  buf[offset++] = TYPE_FEATURE;

  // Write uint24 big-endian header length
  buf[offset++] = (headerJson.length >> 16) & 0xff;
  buf[offset++] = (headerJson.length >> 8) & 0xff;
  buf[offset++] = headerJson.length & 0xff;

  headerJson.copy(buf, offset);
  offset += headerJson.length;

  for (const value of values) {
    buf.writeFloatLE(value, offset);
    offset += BYTES_PER_VALUE;
  }

  return buf;
}

// ─── Decode ─────────────────────────────────────────────────────────────────────

function isValidFeatureFrameHeader(obj: unknown): obj is FeatureFrameHeader {
  if (typeof obj !== "object" || obj === null) return false;
  const h = obj as Record<string, unknown>;

  // seq: non-negative integer
  if (typeof h.seq !== "number" || !Number.isInteger(h.seq) || h.seq < 0) return false;

  // timestamp: optional finite number >= 0
  if (h.timestamp !== undefined) {
    if (typeof h.timestamp !== "number" || !isFinite(h.timestamp) || h.timestamp < 0) return false;
  }

  return true;
}

/**
 * Decode a feature frame from the SC-prefixed wire format.
 * Returns null on malformed input.
 */
export function decodeFeatureFrame(data: Buffer): { header: FeatureFrameHeader; values: number[] } | null {
  if (!Buffer.isBuffer(data) || data.length < MIN_FRAME_SIZE) return null;

  if (!isFeatureFrame(data)) return null;

  // Read uint24 big-endian header length
  const headerLen = (data[3] << 16) | (data[4] << 8) | data[5];

  if (headerLen <= 0 || headerLen > MAX_HEADER_JSON_BYTES) return null;
  if (data.length < MIN_FRAME_SIZE + headerLen) return null;

  let header: unknown;
  try {
    const headerStr = data.toString("utf-8", MIN_FRAME_SIZE, MIN_FRAME_SIZE + headerLen);
    header = JSON.parse(headerStr);
  } catch {
    return null;
  }

  if (!isValidFeatureFrameHeader(header)) return null;

  const payloadStart = MIN_FRAME_SIZE + headerLen;
  const payloadLen = data.length - payloadStart;
  if (payloadLen % BYTES_PER_VALUE !== 0) return null;

  const count = payloadLen / BYTES_PER_VALUE;
  if (count > MAX_VALUES_PER_FRAME) return null;

  const values: number[] = new Array(count);
  for (let i = 0; i < count; i++) {
    const value = data.readFloatLE(payloadStart + i * BYTES_PER_VALUE);
    if (!Number.isFinite(value)) return null;
    values[i] = value;
  }

  return { header, values };
}

// ─── Inspection ─────────────────────────────────────────────────────────────────

/**
 * Check if a buffer starts with the SC magic prefix and the feature type byte.
 */
export function isFeatureFrame(data: Buffer): boolean {
  if (!Buffer.isBuffer(data) || data.length < 3) return false;
  return data[0] === SC_MAGIC_0 && data[1] === SC_MAGIC_1 && data[2] === TYPE_FEATURE;
}
