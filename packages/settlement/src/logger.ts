/**
 * Structured logging for settlement evaluation.
 *
 * Uses pino for JSON-structured logs. Pretty-printed in development.
 */

import { pino, type Logger } from "pino";
import type { SettlementConfig } from "./config.js";

export function createSettlementLogger(
  config: Pick<SettlementConfig, "LOG_LEVEL" | "NODE_ENV">,
): Logger {
  return pino({
    name: "settlement",
    level: config.LOG_LEVEL,
    ...(config.NODE_ENV === "development"
      ? { transport: { target: "pino-pretty" } }
      : {}),
  });
}

/**
 * Logger that discards everything. Default for library callers that
 * bring no logger of their own.
 */
export function silentLogger(): Logger {
  return pino({ level: "silent" });
}
