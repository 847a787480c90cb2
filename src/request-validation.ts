// Structural Change Analyzer - Request Validation
// Checks untrusted JSON (HTTP bodies, WebSocket messages) before it reaches the engine.

import { RequestValidationError } from "./errors.js";
import { DIVERGENCE_NAMES } from "./types.js";
import type { DivergenceName, TimestampedFeature } from "./types.js";

/** Upper bound on requested timescales; 2^20 frames is far beyond any track length */
export const MAX_TIMESCALES = 20;

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function parseValues(value: unknown, context: string): number[] {
  if (!Array.isArray(value)) {
    throw new RequestValidationError(`${context}: values must be an array of numbers`);
  }
  return value.map((v, i) => {
    if (typeof v !== "number" || !Number.isFinite(v)) {
      throw new RequestValidationError(`${context}: value ${i} is not a finite number`);
    }
    return v;
  });
}

/**
 * Parse frames given either as bare value arrays or as
 * `{ values, timestamp?, label? }` objects.
 */
export function parseFeatureFrames(raw: unknown): TimestampedFeature[] {
  if (!Array.isArray(raw)) {
    throw new RequestValidationError("frames must be an array");
  }

  return raw.map((item, i): TimestampedFeature => {
    const context = `frames[${i}]`;

    if (Array.isArray(item)) {
      return { values: parseValues(item, context), hasTimestamp: false, timestamp: 0 };
    }

    if (!isRecord(item)) {
      throw new RequestValidationError(`${context}: expected an array or an object with 'values'`);
    }

    const feature: TimestampedFeature = {
      values: parseValues(item.values, context),
      hasTimestamp: false,
      timestamp: 0,
    };

    if (item.timestamp !== undefined) {
      if (typeof item.timestamp !== "number" || !Number.isFinite(item.timestamp) || item.timestamp < 0) {
        throw new RequestValidationError(`${context}: timestamp must be a non-negative number`);
      }
      feature.hasTimestamp = true;
      feature.timestamp = item.timestamp;
    }

    if (item.label !== undefined) {
      if (typeof item.label !== "string") {
        throw new RequestValidationError(`${context}: label must be a string`);
      }
      feature.label = item.label;
    }

    return feature;
  });
}

export function parseDivergenceName(raw: unknown, fallback: DivergenceName): DivergenceName {
  if (raw === undefined) return fallback;
  const match = DIVERGENCE_NAMES.find((name) => name === raw);
  if (!match) {
    throw new RequestValidationError(
      `divergence must be one of ${DIVERGENCE_NAMES.join(", ")}, got ${JSON.stringify(raw)}`,
    );
  }
  return match;
}

export function parseTimescaleCount(raw: unknown, fallback: number): number {
  if (raw === undefined) return fallback;
  if (typeof raw !== "number" || !Number.isInteger(raw) || raw < 0 || raw > MAX_TIMESCALES) {
    throw new RequestValidationError(`timescales must be an integer between 0 and ${MAX_TIMESCALES}`);
  }
  return raw;
}

export function parseDimension(raw: unknown): number {
  if (typeof raw !== "number" || !Number.isInteger(raw) || raw <= 0) {
    throw new RequestValidationError("dimension must be a positive integer");
  }
  return raw;
}

/** Returns undefined when absent; otherwise a square matrix of finite numbers. */
export function parseInverseCovariance(raw: unknown): number[][] | undefined {
  if (raw === undefined) return undefined;
  if (!Array.isArray(raw) || raw.length === 0) {
    throw new RequestValidationError("inverseCovariance must be a non-empty array of rows");
  }
  const matrix = raw.map((row, i) => parseValues(row, `inverseCovariance[${i}]`));
  matrix.forEach((row, i) => {
    if (row.length !== matrix.length) {
      throw new RequestValidationError(
        `inverseCovariance must be square: row ${i} has ${row.length} entries, expected ${matrix.length}`,
      );
    }
  });
  return matrix;
}
