// Structural Change Analyzer - Entry point
// Loads configuration and starts the HTTP/WebSocket server when run directly.

import dotenv from "dotenv";
import { pathToFileURL } from "node:url";
import { loadConfig } from "./config.js";
import { createAppServer } from "./server.js";

export const APP_NAME = "Structural Change Analyzer";
export const APP_VERSION = "0.1.0";

export { StructuralChange } from "./structural-change.js";
export {
  CorrelationDivergence,
  EuclideanDivergence,
  JensenShannonDivergence,
  MahalanobisDivergence,
  createDivergencePolicy,
} from "./divergence.js";
export { computeWindowBoundaries, computeAllWindowBoundaries } from "./window-boundaries.js";
export { buildCumulativeMatrix, windowMean } from "./cumulative-sum.js";
export { vectorAccess, timestampedFeatureAccess } from "./frame-access.js";
export { summarizeTimescales } from "./summary.js";
export * from "./errors.js";
export * from "./types.js";

const ts = () => new Date().toISOString();
const logInit = (msg: string) => console.log(`[INIT] [${ts()}] ${msg}`);
const logFatal = (msg: string) => console.error(`[FATAL] [${ts()}] ${msg}`);

async function main(): Promise<void> {
  // .env is read only when running as a service, never on library import
  dotenv.config();
  const config = loadConfig();
  logInit(
    `Defaults: ${config.defaultTimescales} timescales, ${config.defaultDivergence} divergence, ` +
      `max ${config.maxFrames} frames`,
  );

  const server = createAppServer({ config });
  await server.listen(config.port);
  logInit(`${APP_NAME} v${APP_VERSION} running at http://localhost:${config.port}`);

  const shutdown = (signal: string) => {
    logInit(`${signal} received, shutting down`);
    server.close().then(
      () => process.exit(0),
      (err: unknown) => {
        logFatal(`Shutdown failed: ${err instanceof Error ? err.message : String(err)}`);
        process.exit(1);
      },
    );
  };
  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));
}

const isEntryPoint = process.argv[1] !== undefined && import.meta.url === pathToFileURL(process.argv[1]).href;

if (isEntryPoint) {
  main().catch((err: unknown) => {
    logFatal(err instanceof Error ? err.message : String(err));
    process.exit(1);
  });
}
