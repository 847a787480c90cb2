// Structural Change Analyzer - Structural Change Engine
//
// Structural Change on multiple timescales: for every frame, compare the mean
// of the 2^t frames before it with the mean of the 2^t frames starting at it,
// for each timescale t. Edge frames whose windows are cut short get
// substituted values so that mean/median summaries over the whole output
// stay comparable across timescales:
//   left-truncated  → -meanDiv
//   right-truncated →  3 * meanDiv
//   both-truncated  →  0
// where meanDiv is the average divergence over that timescale's normal frames.

import { buildCumulativeMatrix, windowMean } from "./cumulative-sum.js";
import { JensenShannonDivergence } from "./divergence.js";
import { DimensionMismatchError, InvalidTimescaleCountError } from "./errors.js";
import { timestampedFeatureAccess, vectorAccess } from "./frame-access.js";
import { defaultLogger } from "./logger.js";
import { computeAllWindowBoundaries } from "./window-boundaries.js";
import type { DivergencePolicy, FeatureAccess, Logger, TimestampedFeature } from "./types.js";

/** Per-frame result of one timescale before edge substitution. */
type TimescaleCell =
  | { kind: "value"; value: number }
  | { kind: "left-edge" }
  | { kind: "right-edge" }
  | { kind: "both-edge" };

export const LEFT_EDGE_FACTOR = -1;
export const RIGHT_EDGE_FACTOR = 3;

export interface StructuralChangeOptions {
  logger?: Logger;
}

export interface CalculateOptions<I, O> {
  inputAccess: FeatureAccess<I>;
  outputAccess: FeatureAccess<O>;
  /** Defaults to Jensen–Shannon */
  divergence?: DivergencePolicy;
}

export class StructuralChange {
  readonly timescaleCount: number;
  private logger: Logger;

  constructor(timescaleCount: number, options: StructuralChangeOptions = {}) {
    if (!Number.isInteger(timescaleCount) || timescaleCount < 0) {
      throw new InvalidTimescaleCountError(timescaleCount);
    }
    this.timescaleCount = timescaleCount;
    this.logger = options.logger ?? defaultLogger;
  }

  /**
   * Compute Structural Change for `input`. Returns a new array with one output
   * frame per input frame, each holding `timescaleCount` values.
   *
   * @throws DimensionMismatchError if the input frames differ in length
   */
  calculate<I, O>(input: readonly I[], options: CalculateOptions<I, O>): O[] {
    const { inputAccess, outputAccess } = options;
    const divergence = options.divergence ?? new JensenShannonDivergence(this.logger);
    const frameCount = input.length;

    if (frameCount === 0) return [];

    const rows = input.map((frame) => inputAccess.values(frame));
    const dimension = rows[0].length;
    rows.forEach((row, i) => {
      if (row.length !== dimension) {
        throw new DimensionMismatchError(dimension, row.length, `Input frame ${i}`);
      }
    });

    const cumulative = buildCumulativeMatrix(rows, dimension);

    const output = input.map((source) => {
      const frame = outputAccess.createFrame(this.timescaleCount);
      outputAccess.adoptMetadata(frame, source);
      return frame;
    });
    const outputRows = output.map((frame) => outputAccess.values(frame));

    const boundaryTables = computeAllWindowBoundaries(this.timescaleCount, frameCount);

    boundaryTables.forEach((boundaries, timescale) => {
      let divergenceSum = 0;
      let normalCount = 0;

      const cells = boundaries.map((boundary): TimescaleCell => {
        switch (boundary.status) {
          case "normal": {
            const meanLeft = windowMean(cumulative, boundary.leftStart, boundary.leftEnd);
            const meanRight = windowMean(cumulative, boundary.rightStart, boundary.rightEnd);
            const value = divergence.compare(meanLeft, meanRight);
            divergenceSum += value;
            normalCount++;
            return { kind: "value", value };
          }
          case "left-truncated":
            return { kind: "left-edge" };
          case "right-truncated":
            return { kind: "right-edge" };
          case "both-truncated":
            return { kind: "both-edge" };
        }
      });

      const meanDiv = normalCount > 0 ? divergenceSum / normalCount : 0;

      cells.forEach((cell, i) => {
        outputRows[i][timescale] = resolveCell(cell, meanDiv);
      });
    });

    return output;
  }

  /** Structural Change over plain numeric vectors. */
  calculateVectors(frames: readonly number[][], divergence?: DivergencePolicy): number[][] {
    return this.calculate(frames, { inputAccess: vectorAccess, outputAccess: vectorAccess, divergence });
  }

  /** Structural Change over host features; output frames keep the input timestamps. */
  calculateFeatures(features: readonly TimestampedFeature[], divergence?: DivergencePolicy): TimestampedFeature[] {
    return this.calculate(features, {
      inputAccess: timestampedFeatureAccess,
      outputAccess: timestampedFeatureAccess,
      divergence,
    });
  }
}

function resolveCell(cell: TimescaleCell, meanDiv: number): number {
  switch (cell.kind) {
    case "value":
      return cell.value;
    case "left-edge":
      // no -0 when there were no normal frames
      return meanDiv === 0 ? 0 : LEFT_EDGE_FACTOR * meanDiv;
    case "right-edge":
      return RIGHT_EDGE_FACTOR * meanDiv;
    case "both-edge":
      return 0;
  }
}
