// Structural Change Analyzer - Window Boundary Calculator
// Left/right comparison windows for every frame at a dyadic timescale.

import type { WindowBoundary, WindowStatus } from "./types.js";

function assertCount(value: number, what: string): void {
  if (!Number.isInteger(value) || value < 0) {
    throw new RangeError(`${what} must be a non-negative integer, got ${value}`);
  }
}

/** Half-width in frames of the windows at `timescale`. */
export function windowHalfWidth(timescale: number): number {
  return 2 ** timescale;
}

function classify(leftSize: number, rightSize: number, width: number): WindowStatus {
  if (leftSize === width && rightSize === width) return "normal";
  if (rightSize === width) return "left-truncated";
  if (leftSize === width) return "right-truncated";
  return "both-truncated";
}

/**
 * Window boundaries of every frame for one timescale.
 *
 * For frame `i` and half-width `w`: left window `[max(0, i - w), i)`, right
 * window `[i, min(frameCount, i + w))`. Depends only on the arguments, so the
 * table can be reused for any sequence of the same length.
 */
export function computeWindowBoundaries(timescale: number, frameCount: number): WindowBoundary[] {
  assertCount(timescale, "Timescale");
  assertCount(frameCount, "Frame count");

  const width = windowHalfWidth(timescale);
  const boundaries: WindowBoundary[] = new Array(frameCount);

  for (let i = 0; i < frameCount; i++) {
    const leftStart = Math.max(0, i - width);
    const rightEnd = Math.min(frameCount, i + width);
    boundaries[i] = {
      leftStart,
      leftEnd: i,
      rightStart: i,
      rightEnd,
      status: classify(i - leftStart, rightEnd - i, width),
    };
  }

  return boundaries;
}

/** Boundary tables for timescales `0 .. timescaleCount - 1`. */
export function computeAllWindowBoundaries(timescaleCount: number, frameCount: number): WindowBoundary[][] {
  assertCount(timescaleCount, "Timescale count");
  const tables: WindowBoundary[][] = [];
  for (let t = 0; t < timescaleCount; t++) {
    tables.push(computeWindowBoundaries(t, frameCount));
  }
  return tables;
}
