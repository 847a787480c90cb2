// Structural Change Analyzer - Summary Statistics
// Whole-sequence statistics per timescale, as a downstream consumer would take them.
// Edge substitution in the engine exists so these stay meaningful.

import { windowHalfWidth } from "./window-boundaries.js";
import type { TimescaleSummary } from "./types.js";

/**
 * Compute the median of a numeric array.
 * Returns 0 for empty arrays.
 */
export function computeMedian(values: readonly number[]): number {
  if (values.length === 0) return 0;
  const sorted = [...values].sort((a, b) => a - b);
  const mid = Math.floor(sorted.length / 2);
  if (sorted.length % 2 === 0) {
    return (sorted[mid - 1] + sorted[mid]) / 2;
  }
  return sorted[mid];
}

/**
 * Mean, median, min and max of each timescale's column in `output`.
 * An empty output yields all-zero summaries.
 */
export function summarizeTimescales(output: readonly (readonly number[])[], timescaleCount: number): TimescaleSummary[] {
  const summaries: TimescaleSummary[] = [];

  for (let t = 0; t < timescaleCount; t++) {
    const column = output.map((frame) => frame[t]);
    const base = { timescale: t, windowHalfWidth: windowHalfWidth(t) };

    if (column.length === 0) {
      summaries.push({ ...base, mean: 0, median: 0, min: 0, max: 0 });
      continue;
    }

    const sum = column.reduce((acc, v) => acc + v, 0);
    summaries.push({
      ...base,
      mean: sum / column.length,
      median: computeMedian(column),
      min: column.reduce((acc, v) => Math.min(acc, v), Infinity),
      max: column.reduce((acc, v) => Math.max(acc, v), -Infinity),
    });
  }

  return summaries;
}
