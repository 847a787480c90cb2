/**
 * Unit tests for feature-frame-codec.ts
 */

import { describe, it, expect } from "vitest";
import { decodeFeatureFrame, encodeFeatureFrame, isFeatureFrame } from "./feature-frame-codec.js";

describe("encodeFeatureFrame", () => {
  it("writes the SC magic, type byte and header length prefix", () => {
    const encoded = encodeFeatureFrame({ seq: 1 }, [1]);
    const headerLength = Buffer.byteLength(JSON.stringify({ seq: 1 }));
    expect([...encoded.subarray(0, 6)]).toEqual([0x53, 0x43, 0x46, 0, 0, headerLength]);
    expect(encoded.length).toBe(6 + headerLength + 4);
  });
});

describe("decodeFeatureFrame", () => {
  it("decodes a frame with a timestamp", () => {
    const decoded = decodeFeatureFrame(encodeFeatureFrame({ seq: 3, timestamp: 1.5 }, [0.5, -2, 1.25]));
    expect(decoded).toEqual({ header: { seq: 3, timestamp: 1.5 }, values: [0.5, -2, 1.25] });
  });

  it("decodes a frame without a timestamp", () => {
    const decoded = decodeFeatureFrame(encodeFeatureFrame({ seq: 0 }, [4]));
    expect(decoded).toEqual({ header: { seq: 0 }, values: [4] });
  });

  it("decodes a frame with no values", () => {
    expect(decodeFeatureFrame(encodeFeatureFrame({ seq: 2 }, []))).toEqual({ header: { seq: 2 }, values: [] });
  });

  it("rejects a buffer shorter than the prefix", () => {
    expect(decodeFeatureFrame(Buffer.from([0x53, 0x43, 0x46]))).toBeNull();
  });

  it("rejects a wrong magic prefix", () => {
    const encoded = encodeFeatureFrame({ seq: 0 }, [1]);
    encoded[0] = 0x54;
    expect(decodeFeatureFrame(encoded)).toBeNull();
  });

  it("rejects a payload that is not a whole number of float32 values", () => {
    const encoded = encodeFeatureFrame({ seq: 0 }, [1]);
    expect(decodeFeatureFrame(Buffer.concat([encoded, Buffer.from([0])]))).toBeNull();
  });

  it("rejects a header with a negative sequence number", () => {
    expect(decodeFeatureFrame(encodeFeatureFrame({ seq: -1 }, [1]))).toBeNull();
  });

  it("rejects a header length that runs past the buffer", () => {
    const encoded = encodeFeatureFrame({ seq: 0 }, []);
    encoded[5] = encoded[5] + 10;
    expect(decodeFeatureFrame(encoded)).toBeNull();
  });

  it("rejects non-finite values", () => {
    expect(decodeFeatureFrame(encodeFeatureFrame({ seq: 0 }, [1, NaN]))).toBeNull();
  });
});

describe("isFeatureFrame", () => {
  it("recognizes the SC feature prefix", () => {
    expect(isFeatureFrame(encodeFeatureFrame({ seq: 0 }, [1]))).toBe(true);
    expect(isFeatureFrame(Buffer.from("hello"))).toBe(false);
    expect(isFeatureFrame(Buffer.alloc(2))).toBe(false);
  });
});
