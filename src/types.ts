// Structural Change Analyzer - Shared TypeScript interfaces and types
// Frame model, window boundaries, divergence policies, session state and wire messages.

// ─── Feature Frames ─────────────────────────────────────────────────────────────

/**
 * A feature frame as delivered by an audio analysis host: a fixed-length value
 * vector plus an optional timestamp (seconds from the start of the signal).
 */
export interface TimestampedFeature {
  values: number[];
  hasTimestamp: boolean;
  /** Seconds. Only meaningful when `hasTimestamp` is true. */
  timestamp: number;
  /** Free-form annotation (section name, take id); carried to the output frame */
  label?: string;
}

/**
 * Access to a frame representation used by the Structural Change engine.
 *
 * `values` must return the frame's own backing array so writes through it land
 * in the frame. `adoptMetadata` copies whatever per-frame metadata the target
 * type carries from `source`, or marks the target as having none.
 */
export interface FeatureAccess<F> {
  values(frame: F): number[];
  createFrame(dimension: number): F;
  adoptMetadata(target: F, source: unknown): void;
}

// ─── Window Boundaries ──────────────────────────────────────────────────────────

export type WindowStatus = "normal" | "left-truncated" | "right-truncated" | "both-truncated";

/**
 * Left window is frames `[leftStart, leftEnd)`, right window `[rightStart, rightEnd)`.
 * Indices double as row indices into the cumulative matrix.
 */
export interface WindowBoundary {
  leftStart: number;
  leftEnd: number;
  rightStart: number;
  rightEnd: number;
  status: WindowStatus;
}

// ─── Divergence Policies ────────────────────────────────────────────────────────

export type DivergenceName = "euclidean" | "correlation" | "jensen-shannon" | "mahalanobis";

export const DIVERGENCE_NAMES: readonly DivergenceName[] = [
  "euclidean",
  "correlation",
  "jensen-shannon",
  "mahalanobis",
];

/**
 * Compares the left and right window means of one frame.
 * Implementations must not mutate their arguments.
 */
export interface DivergencePolicy {
  readonly name: DivergenceName;
  compare(a: readonly number[], b: readonly number[]): number;
}

// ─── Summary Statistics ─────────────────────────────────────────────────────────

export interface TimescaleSummary {
  timescale: number;
  /** 2^timescale frames */
  windowHalfWidth: number;
  mean: number;
  median: number;
  min: number;
  max: number;
}

// ─── Logging ────────────────────────────────────────────────────────────────────

export interface Logger {
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

// ─── Analysis Sessions ──────────────────────────────────────────────────────────

export enum SessionState {
  IDLE = "idle",
  COLLECTING = "collecting",
  COMPLETE = "complete",
}

export interface AnalysisConfig {
  /** Feature dimensionality every streamed frame must have */
  dimension: number;
  timescales: number;
  divergence: DivergenceName;
  inverseCovariance?: number[][];
}

export interface AnalysisResult {
  frames: TimestampedFeature[];
  summary: TimescaleSummary[];
  computedAt: Date;
}

export interface AnalysisSession {
  id: string;
  state: SessionState;
  config: AnalysisConfig | null;
  frames: TimestampedFeature[];
  /** Highest binary frame `seq` accepted since the last configure or reset */
  lastSeq: number | null;
  result: AnalysisResult | null;
  createdAt: Date;
}

// ─── Binary Frame Header ────────────────────────────────────────────────────────

export interface FeatureFrameHeader {
  /** Client-assigned sequence number; must increase within a session */
  seq: number;
  /** Seconds; omitted when the frame carries no timestamp */
  timestamp?: number;
}

// ─── WebSocket Messages ─────────────────────────────────────────────────────────

/** Frame as carried in JSON payloads */
export type WireFrame = number[] | { values: number[]; timestamp?: number; label?: string };

export interface OutputFrame {
  values: number[];
  hasTimestamp: boolean;
  timestamp?: number;
  label?: string;
}

// Client → Server messages
export type ClientMessage =
  | {
      type: "configure";
      dimension: number;
      timescales?: number;
      divergence?: DivergenceName;
      inverseCovariance?: number[][];
    }
  | { type: "frames"; frames: WireFrame[] }
  | { type: "compute" }
  | { type: "reset" };

// Server → Client messages
export type ServerMessage =
  | { type: "session"; sessionId: string }
  | { type: "state_change"; state: SessionState }
  | { type: "configured"; config: AnalysisConfig }
  | { type: "frames_accepted"; total: number }
  | { type: "result"; frames: OutputFrame[]; summary: TimescaleSummary[] }
  | { type: "error"; message: string; recoverable: boolean };
