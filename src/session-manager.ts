// Structural Change Analyzer - Session Manager
// Streamed analysis sessions: configure, collect frames, compute, reset.
//
// Frames live in server memory only, for as long as the session exists.

import { v4 as uuidv4 } from "uuid";
import { createDivergencePolicy } from "./divergence.js";
import { DimensionMismatchError, InvalidTimescaleCountError, RequestValidationError } from "./errors.js";
import { defaultLogger } from "./logger.js";
import { StructuralChange } from "./structural-change.js";
import { summarizeTimescales } from "./summary.js";
import { SessionState } from "./types.js";
import type { AnalysisConfig, AnalysisResult, AnalysisSession, Logger, TimestampedFeature } from "./types.js";

export interface SessionManagerOptions {
  /** Maximum frames a single session may collect. Default: 100000 */
  maxFrames?: number;
  logger?: Logger;
}

export class SessionManager {
  private sessions: Map<string, AnalysisSession> = new Map();
  private maxFrames: number;
  private logger: Logger;

  constructor(options: SessionManagerOptions = {}) {
    this.maxFrames = options.maxFrames ?? 100_000;
    this.logger = options.logger ?? defaultLogger;
  }

  /**
   * Creates a new session in IDLE state with no configuration.
   */
  createSession(): AnalysisSession {
    const session: AnalysisSession = {
      id: uuidv4(),
      state: SessionState.IDLE,
      config: null,
      frames: [],
      lastSeq: null,
      result: null,
      createdAt: new Date(),
    };
    this.sessions.set(session.id, session);
    return session;
  }

  /**
   * Retrieves a session by ID.
   * @throws Error if the session does not exist.
   */
  getSession(sessionId: string): AnalysisSession {
    const session = this.sessions.get(sessionId);
    if (!session) {
      throw new Error(`Session not found: ${sessionId}`);
    }
    return session;
  }

  get sessionCount(): number {
    return this.sessions.size;
  }

  /**
   * Sets the analysis configuration and moves the session to COLLECTING.
   * Allowed from IDLE or COMPLETE; collected frames and any previous result are dropped.
   *
   * The divergence policy is built here so a bad inverse covariance is rejected
   * before any frames are streamed.
   */
  configure(sessionId: string, config: AnalysisConfig): void {
    const session = this.getSession(sessionId);

    if (session.state === SessionState.COLLECTING) {
      throw new Error(
        `Cannot configure: session is in "${session.state}" state. ` +
          `Compute or reset the session before changing its configuration.`,
      );
    }

    if (!Number.isInteger(config.timescales) || config.timescales < 0) {
      throw new InvalidTimescaleCountError(config.timescales);
    }
    createDivergencePolicy(config.divergence, { inverseCovariance: config.inverseCovariance, logger: this.logger });

    session.config = config;
    session.frames = [];
    session.lastSeq = null;
    session.result = null;
    session.state = SessionState.COLLECTING;
    this.logger.info(
      `Session ${sessionId} configured: dimension ${config.dimension}, ` +
        `${config.timescales} timescales, ${config.divergence} divergence`,
    );
  }

  /**
   * Appends frames to a COLLECTING session. Returns the total number collected.
   * @throws DimensionMismatchError if a frame's length differs from the configured dimension
   */
  appendFrames(sessionId: string, frames: TimestampedFeature[]): number {
    const session = this.getSession(sessionId);

    if (session.state !== SessionState.COLLECTING || !session.config) {
      throw new Error(
        `Cannot accept frames: session is in "${session.state}" state, not "${SessionState.COLLECTING}".`,
      );
    }

    const { dimension } = session.config;
    frames.forEach((frame, i) => {
      if (frame.values.length !== dimension) {
        throw new DimensionMismatchError(dimension, frame.values.length, `Streamed frame ${i}`);
      }
    });

    if (session.frames.length + frames.length > this.maxFrames) {
      throw new Error(`Session frame limit of ${this.maxFrames} exceeded`);
    }

    for (const frame of frames) session.frames.push(frame);
    return session.frames.length;
  }

  /**
   * Appends one binary-streamed frame. Its `seq` must be greater than every
   * `seq` already accepted, so reordered or replayed frames are rejected.
   */
  appendSequencedFrame(sessionId: string, seq: number, frame: TimestampedFeature): number {
    const session = this.getSession(sessionId);

    if (session.lastSeq !== null && seq <= session.lastSeq) {
      throw new RequestValidationError(
        `Out-of-order feature frame: seq ${seq} is not greater than ${session.lastSeq}`,
      );
    }

    const total = this.appendFrames(sessionId, [frame]);
    session.lastSeq = seq;
    return total;
  }

  /**
   * Runs Structural Change over the collected frames and moves the session to COMPLETE.
   */
  compute(sessionId: string): AnalysisResult {
    const session = this.getSession(sessionId);

    if (session.state !== SessionState.COLLECTING || !session.config) {
      throw new Error(
        `Cannot compute: session is in "${session.state}" state, not "${SessionState.COLLECTING}".`,
      );
    }

    const { timescales, divergence, inverseCovariance } = session.config;
    const engine = new StructuralChange(timescales, { logger: this.logger });
    const policy = createDivergencePolicy(divergence, { inverseCovariance, logger: this.logger });

    const frames = engine.calculateFeatures(session.frames, policy);
    const result: AnalysisResult = {
      frames,
      summary: summarizeTimescales(
        frames.map((f) => f.values),
        timescales,
      ),
      computedAt: new Date(),
    };

    session.result = result;
    session.state = SessionState.COMPLETE;
    this.logger.info(`Session ${sessionId} computed over ${session.frames.length} frames`);
    return result;
  }

  /**
   * Returns the session to IDLE, dropping configuration, frames and result.
   */
  reset(sessionId: string): void {
    const session = this.getSession(sessionId);
    session.state = SessionState.IDLE;
    session.config = null;
    session.frames = [];
    session.lastSeq = null;
    session.result = null;
  }

  removeSession(sessionId: string): boolean {
    return this.sessions.delete(sessionId);
  }
}
