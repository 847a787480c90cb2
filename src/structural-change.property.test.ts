// Property-Based Tests for the Structural Change Engine

import { describe, it, expect, vi } from "vitest";
import * as fc from "fast-check";
import { StructuralChange } from "./structural-change.js";
import { createDivergencePolicy } from "./divergence.js";
import { computeWindowBoundaries } from "./window-boundaries.js";
import type { DivergenceName } from "./types.js";

// ─── Generators ─────────────────────────────────────────────────────────────────

/**
 * Generate a frame sequence of consistent dimensionality with non-negative values
 * on a quarter grid, so every policy (including Jensen-Shannon) gets valid input.
 */
function arbitraryFrames(maxFrames = 40): fc.Arbitrary<number[][]> {
  return fc.integer({ min: 1, max: 6 }).chain((dimension) =>
    fc.array(
      fc.array(
        fc.integer({ min: 0, max: 40 }).map((v) => v / 4),
        { minLength: dimension, maxLength: dimension },
      ),
      { maxLength: maxFrames },
    ),
  );
}

const arbitraryDivergence: fc.Arbitrary<DivergenceName> = fc.constantFrom("euclidean", "correlation", "jensen-shannon");

function silentPolicy(name: DivergenceName) {
  return createDivergencePolicy(name, { logger: { info: vi.fn(), warn: vi.fn(), error: vi.fn() } });
}

// ─── Properties ─────────────────────────────────────────────────────────────────

describe("Property: output shape", () => {
  it("has one frame per input frame, each with one value per timescale", () => {
    fc.assert(
      fc.property(arbitraryFrames(), fc.integer({ min: 0, max: 6 }), arbitraryDivergence, (frames, t, name) => {
        const output = new StructuralChange(t).calculateVectors(frames, silentPolicy(name));
        expect(output).toHaveLength(frames.length);
        for (const frame of output) {
          expect(frame).toHaveLength(t);
        }
      }),
      { numRuns: 150 },
    );
  });
});

describe("Property: edge substitution", () => {
  /**
   * For every timescale, left-truncated frames hold -meanDiv, right-truncated
   * frames hold 3 * meanDiv and both-truncated frames hold 0, where meanDiv is
   * the average over that timescale's normal frames.
   */
  it("derives every edge value from the mean of the normal values", () => {
    fc.assert(
      fc.property(arbitraryFrames(), fc.integer({ min: 0, max: 6 }), arbitraryDivergence, (frames, t, name) => {
        const output = new StructuralChange(t).calculateVectors(frames, silentPolicy(name));

        for (let timescale = 0; timescale < t; timescale++) {
          const boundaries = computeWindowBoundaries(timescale, frames.length);
          const normalValues = boundaries
            .map((b, i) => (b.status === "normal" ? output[i][timescale] : null))
            .filter((v): v is number => v !== null);
          const meanDiv =
            normalValues.length > 0 ? normalValues.reduce((acc, v) => acc + v, 0) / normalValues.length : 0;

          boundaries.forEach((b, i) => {
            const value = output[i][timescale];
            if (b.status === "left-truncated") expect(value).toBe(meanDiv === 0 ? 0 : -meanDiv);
            if (b.status === "right-truncated") expect(value).toBe(3 * meanDiv);
            if (b.status === "both-truncated") expect(value).toBe(0);
          });
        }
      }),
      { numRuns: 150 },
    );
  });
});

describe("Property: divergence ranges", () => {
  it("keeps correlation values of normal frames within [0, 1]", () => {
    fc.assert(
      fc.property(arbitraryFrames(), fc.integer({ min: 1, max: 5 }), (frames, t) => {
        const output = new StructuralChange(t).calculateVectors(frames, silentPolicy("correlation"));
        for (let timescale = 0; timescale < t; timescale++) {
          computeWindowBoundaries(timescale, frames.length).forEach((b, i) => {
            if (b.status !== "normal") return;
            expect(output[i][timescale]).toBeGreaterThanOrEqual(0);
            expect(output[i][timescale]).toBeLessThanOrEqual(1);
          });
        }
      }),
      { numRuns: 150 },
    );
  });

  it("never produces negative Jensen-Shannon or Euclidean values at normal frames", () => {
    fc.assert(
      fc.property(
        arbitraryFrames(),
        fc.integer({ min: 1, max: 5 }),
        fc.constantFrom<DivergenceName>("euclidean", "jensen-shannon"),
        (frames, t, name) => {
          const output = new StructuralChange(t).calculateVectors(frames, silentPolicy(name));
          for (let timescale = 0; timescale < t; timescale++) {
            computeWindowBoundaries(timescale, frames.length).forEach((b, i) => {
              if (b.status === "normal") expect(output[i][timescale]).toBeGreaterThanOrEqual(-1e-12);
            });
          }
        },
      ),
      { numRuns: 150 },
    );
  });
});
