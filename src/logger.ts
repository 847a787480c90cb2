// Structural Change Analyzer - Logging
// Console-backed default logger shared by the engine, sessions and server.

import type { Logger } from "./types.js";

export const defaultLogger: Logger = {
  info: (msg, ...args) => console.log(`[INFO] ${msg}`, ...args),
  warn: (msg, ...args) => console.warn(`[WARN] ${msg}`, ...args),
  error: (msg, ...args) => console.error(`[ERROR] ${msg}`, ...args),
};
