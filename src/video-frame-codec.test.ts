/**
 * Unit tests for video-frame-codec.ts
 */

import { describe, it, expect } from "vitest";
import {
  decodeFrame,
  encodeFrame,
  isEmotionFrame,
  isValidFrameHeader,
  MAX_FRAME_HEIGHT,
  MAX_FRAME_WIDTH,
} from "./video-frame-codec.js";
import type { FrameHeader } from "./types.js";

// ─── Helpers ────────────────────────────────────────────────────────────────────

function makeHeader(overrides?: Partial<FrameHeader>): FrameHeader {
  return {
    timestamp: 1500,
    seq: 0,
    width: 2,
    height: 2,
    ...overrides,
  };
}

function makePixels(width = 2, height = 2, fill = 0x80): Buffer {
  return Buffer.alloc(width * height * 4, fill);
}

/** Builds an EMF buffer around arbitrary header text, bypassing validation. */
function rawFrame(headerText: string, payload: Buffer): Buffer {
  const json = Buffer.from(headerText, "utf-8");
  const prefix = Buffer.from([0x45, 0x4d, 0x46, (json.length >> 16) & 0xff, (json.length >> 8) & 0xff, json.length & 0xff]);
  return Buffer.concat([prefix, json, payload]);
}

// ─── Round-Trip ─────────────────────────────────────────────────────────────────

describe("encodeFrame / decodeFrame", () => {
  it("round-trips a frame with face regions", () => {
    const header = makeHeader({ seq: 7, regions: [{ x: 0, y: 0, width: 1, height: 2 }] });
    const pixels = Buffer.from([...Array(16).keys()]);

    const decoded = decodeFrame(encodeFrame(header, pixels));

    expect(decoded?.header).toEqual(header);
    expect(decoded?.pixels).toEqual(pixels);
  });

  it("writes the magic and a big-endian header length", () => {
    const header = makeHeader();
    const encoded = encodeFrame(header, makePixels());
    const jsonLength = Buffer.byteLength(JSON.stringify(header));

    expect([...encoded.subarray(0, 6)]).toEqual([0x45, 0x4d, 0x46, 0, (jsonLength >> 8) & 0xff, jsonLength & 0xff]);
    expect(encoded.length).toBe(6 + jsonLength + 16);
  });

  it("accepts the maximum resolution", () => {
    const header = makeHeader({ width: MAX_FRAME_WIDTH, height: MAX_FRAME_HEIGHT });
    const decoded = decodeFrame(encodeFrame(header, makePixels(MAX_FRAME_WIDTH, MAX_FRAME_HEIGHT)));
    expect(decoded?.pixels.length).toBe(MAX_FRAME_WIDTH * MAX_FRAME_HEIGHT * 4);
  });

  it("refuses to encode an invalid header", () => {
    expect(() => encodeFrame(makeHeader({ width: 0 }), Buffer.alloc(0))).toThrow("Invalid frame header");
  });

  it("refuses to encode a payload of the wrong size", () => {
    expect(() => encodeFrame(makeHeader(), Buffer.alloc(15))).toThrow("RGBA payload has 15 bytes, expected 16");
  });
});

// ─── Malformed Input ────────────────────────────────────────────────────────────

describe("decodeFrame malformed input", () => {
  it("returns null for an empty or short buffer", () => {
    expect(decodeFrame(Buffer.alloc(0))).toBeNull();
    expect(decodeFrame(Buffer.from([0x45, 0x4d, 0x46, 0]))).toBeNull();
  });

  it("returns null without the EMF magic", () => {
    const encoded = encodeFrame(makeHeader(), makePixels());
    encoded[2] = 0x41;
    expect(decodeFrame(encoded)).toBeNull();
  });

  it("returns null for a zero header length", () => {
    expect(decodeFrame(Buffer.from([0x45, 0x4d, 0x46, 0, 0, 0]))).toBeNull();
  });

  it("returns null for a header length over the limit", () => {
    expect(decodeFrame(Buffer.concat([Buffer.from([0x45, 0x4d, 0x46, 0x00, 0x40, 0x01]), Buffer.alloc(16_400)]))).toBeNull();
  });

  it("returns null when the header length runs past the data", () => {
    const encoded = encodeFrame(makeHeader(), makePixels());
    expect(decodeFrame(Buffer.concat([encoded.subarray(0, 6), Buffer.from("{")]))).toBeNull();
  });

  it("returns null for corrupt header JSON", () => {
    expect(decodeFrame(rawFrame("{not json", makePixels()))).toBeNull();
  });

  it("returns null for a header that fails validation", () => {
    expect(decodeFrame(rawFrame(JSON.stringify(makeHeader({ height: 2000 })), makePixels()))).toBeNull();
  });

  it("returns null when the payload is longer or shorter than width x height x 4", () => {
    const text = JSON.stringify(makeHeader());
    expect(decodeFrame(rawFrame(text, Buffer.alloc(17)))).toBeNull();
    expect(decodeFrame(rawFrame(text, Buffer.alloc(12)))).toBeNull();
  });
});

// ─── Header Validation ──────────────────────────────────────────────────────────

describe("isValidFrameHeader", () => {
  it("accepts a minimal header", () => {
    expect(isValidFrameHeader(makeHeader())).toBe(true);
  });

  it.each([
    ["null", null],
    ["a string", "frame"],
    ["a missing seq", { timestamp: 0, width: 2, height: 2 }],
    ["a negative timestamp", makeHeader({ timestamp: -1 })],
    ["a fractional seq", makeHeader({ seq: 1.5 })],
    ["a negative seq", makeHeader({ seq: -1 })],
    ["zero width", makeHeader({ width: 0 })],
    ["a fractional height", makeHeader({ height: 2.5 })],
    ["width over the limit", makeHeader({ width: MAX_FRAME_WIDTH + 1 })],
    ["height over the limit", makeHeader({ height: MAX_FRAME_HEIGHT + 1 })],
    ["regions that are not an array", { ...makeHeader(), regions: "none" }],
    ["a region with a negative size", makeHeader({ regions: [{ x: 0, y: 0, width: -1, height: 1 }] })],
    ["a region missing a field", { ...makeHeader(), regions: [{ x: 0, y: 0, width: 1 }] }],
    ["a region with a non-finite coordinate", makeHeader({ regions: [{ x: Infinity, y: 0, width: 1, height: 1 }] })],
    ["a manual flag that is not a boolean", { ...makeHeader(), manual: "yes" }],
  ])("rejects %s", (_name, value) => {
    expect(isValidFrameHeader(value)).toBe(false);
  });

  it("accepts a manual flag", () => {
    expect(isValidFrameHeader(makeHeader({ manual: true }))).toBe(true);
    expect(isValidFrameHeader(makeHeader({ manual: false }))).toBe(true);
  });

  it("accepts regions that start off-frame", () => {
    expect(isValidFrameHeader(makeHeader({ regions: [{ x: -5, y: -5, width: 10, height: 10 }] }))).toBe(true);
  });

  it("caps the number of regions at 32", () => {
    const region = { x: 0, y: 0, width: 1, height: 1 };
    expect(isValidFrameHeader(makeHeader({ regions: Array.from({ length: 32 }, () => region) }))).toBe(true);
    expect(isValidFrameHeader(makeHeader({ regions: Array.from({ length: 33 }, () => region) }))).toBe(false);
  });
});

describe("isEmotionFrame", () => {
  it("checks the three magic bytes", () => {
    expect(isEmotionFrame(Buffer.from("EMF"))).toBe(true);
    expect(isEmotionFrame(Buffer.from("EM"))).toBe(false);
    expect(isEmotionFrame(Buffer.from("TMV"))).toBe(false);
  });
});
