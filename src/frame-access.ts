// Structural Change Analyzer - Frame Access
// The two frame representations the engine reads from and writes to.

import type { FeatureAccess, TimestampedFeature } from "./types.js";

/** Plain numeric vectors. They carry no metadata. */
export const vectorAccess: FeatureAccess<number[]> = {
  values: (frame) => frame,
  createFrame: (dimension) => new Array<number>(dimension).fill(0),
  adoptMetadata: () => {},
};

export function isTimestampedFeature(value: unknown): value is TimestampedFeature {
  if (typeof value !== "object" || value === null) return false;
  const f = value as Record<string, unknown>;
  return Array.isArray(f.values) && typeof f.hasTimestamp === "boolean" && typeof f.timestamp === "number";
}

/**
 * Host features with an optional timestamp and label. Both are copied when the
 * source is itself a timestamped feature; any other source leaves the target
 * without them.
 */
export const timestampedFeatureAccess: FeatureAccess<TimestampedFeature> = {
  values: (frame) => frame.values,
  createFrame: (dimension) => ({
    values: new Array<number>(dimension).fill(0),
    hasTimestamp: false,
    timestamp: 0,
  }),
  adoptMetadata: (target, source) => {
    if (isTimestampedFeature(source)) {
      target.hasTimestamp = source.hasTimestamp;
      if (source.hasTimestamp) target.timestamp = source.timestamp;
      if (typeof source.label === "string") target.label = source.label;
      else delete target.label;
    } else {
      target.hasTimestamp = false;
      delete target.label;
    }
  },
};
