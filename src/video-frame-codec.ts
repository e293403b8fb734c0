/**
 * Binary frame codec for the EMF wire format.
 *
 * Wire format: [0x45 0x4D 0x46 magic ("EMF")][3-byte big-endian uint24 header JSON length][UTF-8 header JSON][RGBA bytes]
 *
 * The header is `{seq, timestamp, width, height, regions?, manual?}`; the payload is
 * raw RGBA, row-major, exactly width × height × 4 bytes.
 */

import type { BoundingRegion, FrameHeader } from "./types.js";

// ─── Constants ──────────────────────────────────────────────────────────────────

const EM_MAGIC_0 = 0x45; // 'E'
const EM_MAGIC_1 = 0x4d; // 'M'
const EM_TYPE_FRAME = 0x46; // 'F'

/** 3 (magic) + 3 (header len) */
const PREFIX_SIZE = 6;

/** Maximum header JSON size in bytes */
const MAX_HEADER_JSON_BYTES = 16 * 1024;

/** Maximum face regions carried in one header */
const MAX_REGIONS = 32;

export const MAX_FRAME_WIDTH = 1920;
export const MAX_FRAME_HEIGHT = 1080;

export interface DecodedFrame {
  header: FrameHeader;
  /** View into the input buffer; copy it if the input is reused. */
  pixels: Buffer;
}

// ─── Encode ─────────────────────────────────────────────────────────────────────

/**
 * Encode an RGBA frame. Throws when the header is invalid or the pixel count
 * does not match the declared size.
 */
export function encodeFrame(header: FrameHeader, pixels: Uint8Array): Buffer {
  if (!isValidFrameHeader(header)) {
    throw new Error("Invalid frame header");
  }
  const expected = header.width * header.height * 4;
  if (pixels.length !== expected) {
    throw new Error(`RGBA payload has ${pixels.length} bytes, expected ${expected}`);
  }

  const headerJson = Buffer.from(JSON.stringify(header), "utf-8");
  if (headerJson.length > MAX_HEADER_JSON_BYTES) {
    throw new Error(`Frame header is ${headerJson.length} bytes, limit is ${MAX_HEADER_JSON_BYTES}`);
  }

  const buf = Buffer.alloc(PREFIX_SIZE + headerJson.length + pixels.length);
  let offset = 0;
  buf[offset++] = EM_MAGIC_0;
  buf[offset++] = EM_MAGIC_1;
  buf[offset++] = EM_TYPE_FRAME;

  // uint24 big-endian header length
  buf[offset++] = (headerJson.length >> 16) & 0xff;
  buf[offset++] = (headerJson.length >> 8) & 0xff;
  buf[offset++] = headerJson.length & 0xff;

  headerJson.copy(buf, offset);
  offset += headerJson.length;
  buf.set(pixels, offset);

  return buf;
}

// ─── Decode ─────────────────────────────────────────────────────────────────────

function isNonNegativeInteger(value: unknown): value is number {
  return typeof value === "number" && Number.isInteger(value) && value >= 0;
}

function isFiniteNumber(value: unknown): value is number {
  return typeof value === "number" && Number.isFinite(value);
}

function isBoundingRegion(value: unknown): value is BoundingRegion {
  if (typeof value !== "object" || value === null) return false;
  if (!("x" in value) || !("y" in value) || !("width" in value) || !("height" in value)) return false;
  return (
    isFiniteNumber(value.x) &&
    isFiniteNumber(value.y) &&
    isFiniteNumber(value.width) &&
    isFiniteNumber(value.height) &&
    value.width >= 0 &&
    value.height >= 0
  );
}

/**
 * Validate a FrameHeader: non-negative timestamp, integer seq, positive integer
 * dimensions within the resolution limit, and well-formed regions if present.
 */
export function isValidFrameHeader(obj: unknown): obj is FrameHeader {
  if (typeof obj !== "object" || obj === null) return false;
  if (!("timestamp" in obj) || !("seq" in obj) || !("width" in obj) || !("height" in obj)) return false;

  if (!isFiniteNumber(obj.timestamp) || obj.timestamp < 0) return false;
  if (!isNonNegativeInteger(obj.seq)) return false;
  if (!isNonNegativeInteger(obj.width) || obj.width === 0 || obj.width > MAX_FRAME_WIDTH) return false;
  if (!isNonNegativeInteger(obj.height) || obj.height === 0 || obj.height > MAX_FRAME_HEIGHT) return false;

  if ("regions" in obj && obj.regions !== undefined) {
    if (!Array.isArray(obj.regions) || obj.regions.length > MAX_REGIONS) return false;
    if (!obj.regions.every(isBoundingRegion)) return false;
  }
  if ("manual" in obj && obj.manual !== undefined && typeof obj.manual !== "boolean") return false;
  return true;
}

/**
 * Decode an EMF frame.
 * Returns null on malformed input, including a payload whose length does not
 * match the header's dimensions.
 */
export function decodeFrame(data: Buffer): DecodedFrame | null {
  if (!isEmotionFrame(data) || data.length < PREFIX_SIZE) return null;

  const headerLen = (data[3] << 16) | (data[4] << 8) | data[5];
  if (headerLen <= 0 || headerLen > MAX_HEADER_JSON_BYTES) return null;
  if (data.length < PREFIX_SIZE + headerLen) return null;

  let header: unknown;
  try {
    header = JSON.parse(data.toString("utf-8", PREFIX_SIZE, PREFIX_SIZE + headerLen));
  } catch {
    return null;
  }
  if (!isValidFrameHeader(header)) return null;

  const pixels = data.subarray(PREFIX_SIZE + headerLen);
  if (pixels.length !== header.width * header.height * 4) return null;

  return { header, pixels };
}

// ─── Inspection ─────────────────────────────────────────────────────────────────

/** True when the buffer starts with the EMF magic. */
export function isEmotionFrame(data: Buffer): boolean {
  if (!Buffer.isBuffer(data) || data.length < 3) return false;
  return data[0] === EM_MAGIC_0 && data[1] === EM_MAGIC_1 && data[2] === EM_TYPE_FRAME;
}
