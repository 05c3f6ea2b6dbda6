/**
 * Structured logging for migration runs. Every line carries the active
 * runId, and the object name and kind once an object is in flight.
 *
 * Logs go to stderr; stdout is reserved for the run summary.
 * Target credentials and API keys are redacted wherever they appear.
 */
import pino from "pino";
import { getCurrentContext } from "../core/correlation.js";

const REDACT_PATHS = [
  "credentials",
  "password",
  "apiKey",
  "api_key",
  "token",
  "*.credentials",
  "*.password",
  "*.apiKey",
  "*.api_key",
  "*.token",
];

export function createLogger(name = "schema-migrator", level = process.env.LOG_LEVEL ?? "info") {
  const options: pino.LoggerOptions = {
    name,
    level,
    serializers: {
      // pino only serializes Error objects under `err` by default
      error: pino.stdSerializers.err,
    },
    redact: { paths: REDACT_PATHS, censor: "[REDACTED]" },
    mixin() {
      const ctx = getCurrentContext();
      if (!ctx) return {};
      return {
        runId: ctx.runId,
        ...(ctx.object ? { object: ctx.object } : {}),
        ...(ctx.kind ? { kind: ctx.kind } : {}),
      };
    },
  };

  if (process.env.NODE_ENV === "production") {
    return pino(options, pino.destination(2));
  }
  return pino({
    ...options,
    transport: { target: "pino-pretty", options: { colorize: true, destination: 2 } },
  });
}

export type Logger = pino.Logger;
