// Structural Change Analyzer - HTTP and WebSocket Server
// One-shot analysis over HTTP, streamed analysis sessions over WebSocket.
//
// Frames are held in memory only, per connection, and dropped when it closes.

import express, { type Express, type NextFunction, type Request, type Response } from "express";
import { createServer, type Server as HttpServer } from "node:http";
import { WebSocketServer, WebSocket, type RawData } from "ws";
import { DEFAULT_CONFIG, type AppConfig } from "./config.js";
import { createDivergencePolicy } from "./divergence.js";
import { RequestValidationError, StructuralChangeError } from "./errors.js";
import { decodeFeatureFrame } from "./feature-frame-codec.js";
import { defaultLogger } from "./logger.js";
import {
  isRecord,
  parseDimension,
  parseDivergenceName,
  parseFeatureFrames,
  parseInverseCovariance,
  parseTimescaleCount,
} from "./request-validation.js";
import { SessionManager } from "./session-manager.js";
import { StructuralChange } from "./structural-change.js";
import { summarizeTimescales } from "./summary.js";
import type {
  AnalysisConfig,
  DivergenceName,
  Logger,
  OutputFrame,
  ServerMessage,
  TimescaleSummary,
  TimestampedFeature,
} from "./types.js";

// ─── Server Factory ─────────────────────────────────────────────────────────────

export interface CreateServerOptions {
  /** Custom logger. Defaults to console-based logger. */
  logger?: Logger;
  /** Externally provided SessionManager (for testing). Created internally if omitted. */
  sessionManager?: SessionManager;
  config?: Partial<AppConfig>;
}

export interface AppServer {
  app: Express;
  httpServer: HttpServer;
  wss: WebSocketServer;
  sessionManager: SessionManager;
  /** Start listening on the given port. Returns a promise that resolves when listening. */
  listen(port: number): Promise<void>;
  /** Gracefully shut down the server. */
  close(): Promise<void>;
}

/**
 * Creates the Express app, HTTP server, and WebSocket server.
 * Does NOT start listening — call `listen(port)` explicitly.
 */
export function createAppServer(options: CreateServerOptions = {}): AppServer {
  const logger = options.logger ?? defaultLogger;
  const config: AppConfig = { ...DEFAULT_CONFIG, ...options.config };
  const sessionManager = options.sessionManager ?? new SessionManager({ maxFrames: config.maxFrames, logger });

  const app = express();
  const httpServer = createServer(app);

  app.use(express.json({ limit: config.jsonLimit }));

  // Health check endpoint
  app.get("/health", (_req, res) => {
    res.json({ status: "ok" });
  });

  app.post("/api/structural-change", (req, res) => {
    try {
      res.json(analyzeRequest(req.body, config, logger));
    } catch (err) {
      sendHttpError(res, err, logger);
    }
  });

  // Body parser failures (malformed JSON, oversized payloads)
  app.use((err: unknown, _req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) {
      next(err);
      return;
    }
    const status = isRecord(err) && typeof err.status === "number" ? err.status : 400;
    const message = err instanceof Error ? err.message : String(err);
    logger.warn(`Rejected request body: ${message}`);
    res.status(status).json({ error: message });
  });

  // WebSocket server attached to the HTTP server
  const wss = new WebSocketServer({ server: httpServer });

  wss.on("connection", (ws: WebSocket) => {
    handleConnection(ws, sessionManager, config, logger);
  });

  return {
    app,
    httpServer,
    wss,
    sessionManager,
    listen(port: number): Promise<void> {
      return new Promise((resolve, reject) => {
        httpServer.listen(port, () => {
          logger.info(`Server listening on port ${port}`);
          resolve();
        });
        httpServer.on("error", reject);
      });
    },
    close(): Promise<void> {
      return new Promise((resolve, reject) => {
        // Close all WebSocket connections
        for (const client of wss.clients) {
          client.close();
        }
        wss.close(() => {
          httpServer.close((err) => {
            if (err) reject(err);
            else resolve();
          });
        });
      });
    },
  };
}

// ─── HTTP Analysis ──────────────────────────────────────────────────────────────

export interface AnalyzeResponse {
  timescales: number;
  divergence: DivergenceName;
  frames: OutputFrame[];
  summary: TimescaleSummary[];
}

function analyzeRequest(body: unknown, config: AppConfig, logger: Logger): AnalyzeResponse {
  if (!isRecord(body)) {
    throw new RequestValidationError("Request body must be a JSON object");
  }

  const frames = parseFeatureFrames(body.frames);
  if (frames.length > config.maxFrames) {
    throw new RequestValidationError(`Too many frames: ${frames.length} exceeds the limit of ${config.maxFrames}`);
  }
  const timescales = parseTimescaleCount(body.timescales, config.defaultTimescales);
  const divergence = parseDivergenceName(body.divergence, config.defaultDivergence);
  const inverseCovariance = parseInverseCovariance(body.inverseCovariance);

  const policy = createDivergencePolicy(divergence, { inverseCovariance, logger });
  const engine = new StructuralChange(timescales, { logger });
  const output = engine.calculateFeatures(frames, policy);

  logger.info(`Analyzed ${frames.length} frames over ${timescales} timescales (${divergence})`);

  return {
    timescales,
    divergence,
    frames: output.map(toOutputFrame),
    summary: summarizeTimescales(
      output.map((f) => f.values),
      timescales,
    ),
  };
}

function sendHttpError(res: Response, err: unknown, logger: Logger): void {
  const message = err instanceof Error ? err.message : String(err);
  if (err instanceof StructuralChangeError) {
    logger.warn(`Rejected analysis request: ${message}`);
    res.status(400).json({ error: message });
    return;
  }
  logger.error(`Analysis request failed: ${message}`);
  res.status(500).json({ error: "Internal server error" });
}

export function toOutputFrame(feature: TimestampedFeature): OutputFrame {
  const frame: OutputFrame = { values: feature.values, hasTimestamp: feature.hasTimestamp };
  if (feature.hasTimestamp) frame.timestamp = feature.timestamp;
  if (feature.label !== undefined) frame.label = feature.label;
  return frame;
}

// ─── WebSocket Client Messages ──────────────────────────────────────────────────

/** Client message after validation; frames are already in engine form. */
export type ParsedClientMessage =
  | { type: "configure"; config: AnalysisConfig }
  | { type: "frames"; frames: TimestampedFeature[] }
  | { type: "compute" }
  | { type: "reset" };

export function parseClientMessage(raw: unknown, defaults: AppConfig): ParsedClientMessage {
  if (!isRecord(raw) || typeof raw.type !== "string") {
    throw new RequestValidationError("Message must be a JSON object with a string 'type'");
  }

  switch (raw.type) {
    case "configure": {
      const config: AnalysisConfig = {
        dimension: parseDimension(raw.dimension),
        timescales: parseTimescaleCount(raw.timescales, defaults.defaultTimescales),
        divergence: parseDivergenceName(raw.divergence, defaults.defaultDivergence),
      };
      const inverseCovariance = parseInverseCovariance(raw.inverseCovariance);
      if (inverseCovariance) config.inverseCovariance = inverseCovariance;
      return { type: "configure", config };
    }
    case "frames":
      return { type: "frames", frames: parseFeatureFrames(raw.frames) };
    case "compute":
      return { type: "compute" };
    case "reset":
      return { type: "reset" };
    default:
      throw new RequestValidationError(`Unknown message type: ${raw.type}`);
  }
}

// ─── WebSocket Connection Handler ───────────────────────────────────────────────

function toBuffer(data: RawData): Buffer {
  if (Buffer.isBuffer(data)) return data;
  if (Array.isArray(data)) return Buffer.concat(data);
  return Buffer.from(data);
}

function handleConnection(
  ws: WebSocket,
  sessionManager: SessionManager,
  config: AppConfig,
  logger: Logger,
): void {
  // Each WebSocket connection gets its own session
  const session = sessionManager.createSession();
  const sessionId = session.id;

  logger.info(`New WebSocket connection, session ${sessionId}`);

  sendMessage(ws, { type: "session", sessionId });
  sendMessage(ws, { type: "state_change", state: session.state });

  ws.on("message", (data: RawData, isBinary: boolean) => {
    try {
      const buf = toBuffer(data);
      if (isBinary) {
        handleBinaryMessage(ws, buf, sessionId, sessionManager);
      } else {
        const message = parseClientMessage(JSON.parse(buf.toString("utf-8")), config);
        handleClientMessage(ws, message, sessionId, sessionManager);
      }
    } catch (err) {
      const errorMessage = err instanceof Error ? err.message : String(err);
      logger.error(`Error handling message for session ${sessionId}: ${errorMessage}`);
      sendMessage(ws, {
        type: "error",
        message: errorMessage,
        recoverable: true,
      });
    }
  });

  ws.on("close", () => {
    logger.info(`WebSocket closed, session ${sessionId}`);
    sessionManager.removeSession(sessionId);
  });

  ws.on("error", (err) => {
    logger.error(`WebSocket error for session ${sessionId}: ${err.message}`);
    sessionManager.removeSession(sessionId);
  });
}

// ─── Binary Message Handler (Feature Frames) ────────────────────────────────────

function handleBinaryMessage(
  ws: WebSocket,
  data: Buffer,
  sessionId: string,
  sessionManager: SessionManager,
): void {
  const decoded = decodeFeatureFrame(data);
  if (!decoded) {
    throw new RequestValidationError("Malformed binary feature frame");
  }

  const { header, values } = decoded;
  const frame: TimestampedFeature = {
    values,
    hasTimestamp: header.timestamp !== undefined,
    timestamp: header.timestamp ?? 0,
  };

  const total = sessionManager.appendSequencedFrame(sessionId, header.seq, frame);
  sendMessage(ws, { type: "frames_accepted", total });
}

// ─── JSON Client Message Handler ────────────────────────────────────────────────

function handleClientMessage(
  ws: WebSocket,
  message: ParsedClientMessage,
  sessionId: string,
  sessionManager: SessionManager,
): void {
  switch (message.type) {
    case "configure":
      sessionManager.configure(sessionId, message.config);
      sendMessage(ws, { type: "configured", config: message.config });
      sendMessage(ws, { type: "state_change", state: sessionManager.getSession(sessionId).state });
      break;

    case "frames": {
      const total = sessionManager.appendFrames(sessionId, message.frames);
      sendMessage(ws, { type: "frames_accepted", total });
      break;
    }

    case "compute": {
      const result = sessionManager.compute(sessionId);
      sendMessage(ws, {
        type: "result",
        frames: result.frames.map(toOutputFrame),
        summary: result.summary,
      });
      sendMessage(ws, { type: "state_change", state: sessionManager.getSession(sessionId).state });
      break;
    }

    case "reset":
      sessionManager.reset(sessionId);
      sendMessage(ws, { type: "state_change", state: sessionManager.getSession(sessionId).state });
      break;

    default: {
      const exhaustiveCheck: never = message;
      throw new Error(`Unhandled message: ${JSON.stringify(exhaustiveCheck)}`);
    }
  }
}

// ─── Helpers ────────────────────────────────────────────────────────────────────

export function sendMessage(ws: WebSocket, message: ServerMessage): void {
  if (ws.readyState === WebSocket.OPEN) {
    ws.send(JSON.stringify(message));
  }
}
