// Structural Change Analyzer - Configuration
// Reads service settings from the environment (populated from .env by dotenv at startup).

import { ConfigError } from "./errors.js";
import { MAX_TIMESCALES } from "./request-validation.js";
import { DIVERGENCE_NAMES } from "./types.js";
import type { DivergenceName } from "./types.js";

export interface AppConfig {
  port: number;
  /** Timescales computed when a request does not name a count */
  defaultTimescales: number;
  /** Divergence used when a request does not name one */
  defaultDivergence: DivergenceName;
  /** Per-request and per-session frame limit */
  maxFrames: number;
  /** express.json body size limit, e.g. "10mb" */
  jsonLimit: string;
}

export const DEFAULT_CONFIG: AppConfig = {
  port: 3000,
  defaultTimescales: 6,
  defaultDivergence: "jensen-shannon",
  maxFrames: 100_000,
  jsonLimit: "10mb",
};

function readInteger(env: NodeJS.ProcessEnv, key: string, fallback: number, min: number, max: number): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === "") return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new ConfigError(`${key} must be an integer between ${min} and ${max}, got "${raw}"`);
  }
  return value;
}

function readDivergence(env: NodeJS.ProcessEnv, key: string, fallback: DivergenceName): DivergenceName {
  const raw = env[key];
  if (raw === undefined || raw.trim() === "") return fallback;
  const match = DIVERGENCE_NAMES.find((name) => name === raw.trim());
  if (!match) {
    throw new ConfigError(`${key} must be one of ${DIVERGENCE_NAMES.join(", ")}, got "${raw}"`);
  }
  // Mahalanobis needs a per-request inverse covariance, so it cannot be the default
  if (match === "mahalanobis") {
    throw new ConfigError(`${key} cannot be "mahalanobis": it requires a per-request inverse covariance`);
  }
  return match;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return {
    port: readInteger(env, "PORT", DEFAULT_CONFIG.port, 0, 65535),
    defaultTimescales: readInteger(env, "SC_TIMESCALES", DEFAULT_CONFIG.defaultTimescales, 0, MAX_TIMESCALES),
    defaultDivergence: readDivergence(env, "SC_DIVERGENCE", DEFAULT_CONFIG.defaultDivergence),
    maxFrames: readInteger(env, "SC_MAX_FRAMES", DEFAULT_CONFIG.maxFrames, 1, Number.MAX_SAFE_INTEGER),
    jsonLimit: env.SC_JSON_LIMIT?.trim() || DEFAULT_CONFIG.jsonLimit,
  };
}
