/**
 * Unit tests for structural-change.ts
 */

import { describe, it, expect, vi } from "vitest";
import { StructuralChange } from "./structural-change.js";
import { EuclideanDivergence } from "./divergence.js";
import { DimensionMismatchError, InvalidTimescaleCountError } from "./errors.js";
import { timestampedFeatureAccess, vectorAccess } from "./frame-access.js";
import type { DivergencePolicy, TimestampedFeature } from "./types.js";

function createSilentLogger() {
  return {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  };
}

const euclidean = new EuclideanDivergence();

// ─── Construction ───────────────────────────────────────────────────────────────

describe("StructuralChange construction", () => {
  it("accepts zero timescales", () => {
    expect(new StructuralChange(0).timescaleCount).toBe(0);
  });

  it("rejects a negative timescale count", () => {
    expect(() => new StructuralChange(-1)).toThrow(InvalidTimescaleCountError);
  });

  it("rejects a fractional timescale count", () => {
    expect(() => new StructuralChange(1.5)).toThrow(InvalidTimescaleCountError);
  });
});

// ─── Calculation ────────────────────────────────────────────────────────────────

describe("StructuralChange.calculateVectors", () => {
  it("returns an empty sequence for empty input", () => {
    expect(new StructuralChange(4).calculateVectors([], euclidean)).toEqual([]);
  });

  it("computes a single timescale with a left-truncated first frame", () => {
    // Timescale 0: frame 0 has no left window; frames 1..3 compare neighbours.
    // Divergences 0, 4, 0 give meanDiv 4/3, so frame 0 becomes -4/3.
    const output = new StructuralChange(1).calculateVectors([[1], [1], [5], [5]], euclidean);
    expect(output).toEqual([[-4 / 3], [0], [4], [0]]);
  });

  it("substitutes -meanDiv on the left edge and 3 * meanDiv on the right edge", () => {
    // Timescale 1 (half-width 2): frames 0, 1 left-truncated, frame 2 normal
    // (mean 1 vs mean 5), frame 3 right-truncated.
    const output = new StructuralChange(2).calculateVectors([[1], [1], [5], [5]], euclidean);
    expect(output.map((frame) => frame[1])).toEqual([-4, -4, 4, 12]);
  });

  it("writes 0 for both-truncated frames and for edges of a timescale without normal frames", () => {
    const output = new StructuralChange(3).calculateVectors([[1], [2], [3]], euclidean);
    expect(output).toEqual([
      [-1, 0, 0],
      [1, 0, 0],
      [1, 0, 0],
    ]);
  });

  it("returns empty output frames for zero timescales", () => {
    expect(new StructuralChange(0).calculateVectors([[1], [2], [3]], euclidean)).toEqual([[], [], []]);
  });

  it("compares window means across every dimension", () => {
    const output = new StructuralChange(1).calculateVectors(
      [
        [0, 0],
        [0, 0],
        [3, 4],
      ],
      euclidean,
    );
    // Frame 1: [0,0] vs [0,0] → 0; frame 2: [0,0] vs [3,4] → 5; meanDiv 2.5
    expect(output).toEqual([[-2.5], [0], [5]]);
  });

  it("uses Jensen-Shannon when no divergence is given", () => {
    const engine = new StructuralChange(1, { logger: createSilentLogger() });
    const output = engine.calculateVectors([
      [1, 0],
      [1, 0],
      [0, 1],
      [0, 1],
    ]);
    expect(output[1][0]).toBe(0);
    expect(output[2][0]).toBeCloseTo(Math.LN2, 12);
    expect(output[3][0]).toBe(0);
    expect(output[0][0]).toBeCloseTo(-Math.LN2 / 3, 12);
  });

  it("reports Jensen-Shannon diagnostics through the engine's logger", () => {
    const logger = createSilentLogger();
    const output = new StructuralChange(1, { logger }).calculateVectors([[-1], [-1]]);
    expect(output).toEqual([[0], [0]]);
    expect(logger.warn).toHaveBeenCalledTimes(1);
  });

  it("calls the divergence policy once per normal frame", () => {
    const compare = vi.fn((a: readonly number[], b: readonly number[]) => Math.abs(a[0] - b[0]));
    const policy: DivergencePolicy = { name: "euclidean", compare };
    new StructuralChange(2).calculateVectors([[1], [2], [3], [4], [5]], policy);
    // Timescale 0: frames 1..4 are normal; timescale 1: frames 2 and 3
    expect(compare).toHaveBeenCalledTimes(6);
  });

  it("throws DimensionMismatchError before computing when frames differ in length", () => {
    const compare = vi.fn(() => 0);
    const policy: DivergencePolicy = { name: "euclidean", compare };
    expect(() => new StructuralChange(1).calculateVectors([[1, 2], [3]], policy)).toThrow(DimensionMismatchError);
    expect(compare).not.toHaveBeenCalled();
  });

  it("does not modify the input frames", () => {
    const input = [[1], [1], [5], [5]];
    new StructuralChange(2).calculateVectors(input, euclidean);
    expect(input).toEqual([[1], [1], [5], [5]]);
  });
});

// ─── Frame Metadata ─────────────────────────────────────────────────────────────

describe("StructuralChange metadata handling", () => {
  const features: TimestampedFeature[] = [
    { values: [1], hasTimestamp: true, timestamp: 0 },
    { values: [1], hasTimestamp: true, timestamp: 0.5 },
    { values: [5], hasTimestamp: false, timestamp: 0 },
    { values: [5], hasTimestamp: true, timestamp: 1.5 },
  ];

  it("copies timestamps from the corresponding input feature", () => {
    const output = new StructuralChange(1).calculateFeatures(features, euclidean);
    expect(output).toEqual([
      { values: [-4 / 3], hasTimestamp: true, timestamp: 0 },
      { values: [0], hasTimestamp: true, timestamp: 0.5 },
      { values: [4], hasTimestamp: false, timestamp: 0 },
      { values: [0], hasTimestamp: true, timestamp: 1.5 },
    ]);
  });

  it("marks output features as untimed when the input is plain vectors", () => {
    const output = new StructuralChange(1).calculate([[1], [2]], {
      inputAccess: vectorAccess,
      outputAccess: timestampedFeatureAccess,
      divergence: euclidean,
    });
    expect(output).toEqual([
      { values: [-1], hasTimestamp: false, timestamp: 0 },
      { values: [1], hasTimestamp: false, timestamp: 0 },
    ]);
  });

  it("reads features into plain vector output", () => {
    const output = new StructuralChange(1).calculate(features, {
      inputAccess: timestampedFeatureAccess,
      outputAccess: vectorAccess,
      divergence: euclidean,
    });
    expect(output).toEqual([[-4 / 3], [0], [4], [0]]);
  });
});
