/**
 * logger.ts — Structured Logging for Chronicle
 *
 * Built on pino — the Node.js structured logging standard.
 *
 * Configuration:
 *   CHRONICLE_LOG_LEVEL  — Minimum log level (default: "info", dev: "debug")
 *   CHRONICLE_LOG_PRETTY — Force pretty-print (auto-detected from NODE_ENV)
 *   CHRONICLE_DEBUG      — "true" sets level to "debug"
 *
 * Usage:
 *   import { log } from "./logger.js";
 *   log.boot.info("server starting");
 *   log.conversation.debug({ conversationId, attempt }, "send:attempt");
 *   log.gemini.error({ err }, "session create failed");
 *
 * Subsystem loggers:
 *   log.boot, log.gemini, log.conversation, log.http
 */

import pino from "pino";
import type { Logger } from "pino";

// ─── Configuration ──────────────────────────────────────────────

const IS_TEST = process.env.NODE_ENV === "test" || process.env.VITEST === "true";

/** Resolve log level from environment */
export function resolveLevel(env: NodeJS.ProcessEnv = process.env): string {
  const isTest = env.NODE_ENV === "test" || env.VITEST === "true";
  const isDev = env.NODE_ENV !== "production" && !isTest;
  if (env.CHRONICLE_LOG_LEVEL) {
    return env.CHRONICLE_LOG_LEVEL;
  }
  const debugEnv = (env.CHRONICLE_DEBUG || "").trim().toLowerCase();
  if (debugEnv && debugEnv !== "false" && debugEnv !== "0") {
    return "debug";
  }
  // Silent in tests, debug in dev, info in prod
  if (isTest) return "silent";
  if (isDev) return "debug";
  return "info";
}

/** Build pino transport configuration */
export function resolveTransport(env: NodeJS.ProcessEnv = process.env): pino.TransportSingleOptions | undefined {
  const isTest = env.NODE_ENV === "test" || env.VITEST === "true";
  const isDev = env.NODE_ENV !== "production" && !isTest;
  if (isTest) return undefined;

  const wantPretty =
    env.CHRONICLE_LOG_PRETTY === "true" ||
    (env.CHRONICLE_LOG_PRETTY !== "false" && isDev);

  if (wantPretty) {
    return {
      target: "pino-pretty",
      options: {
        colorize: true,
        translateTime: "HH:MM:ss.l",
        ignore: "pid,hostname",
      },
    };
  }

  return undefined;
}

// ─── Root Logger ────────────────────────────────────────────────

const level = resolveLevel();
const transport = resolveTransport();

/**
 * Map pino numeric levels to Cloud Logging severity strings.
 * @see https://cloud.google.com/logging/docs/reference/v2/rest/v2/LogEntry#LogSeverity
 */
const PINO_TO_GCP_SEVERITY: Record<number, string> = {
  10: "DEBUG",    // trace
  20: "DEBUG",    // debug
  30: "INFO",     // info
  40: "WARNING",  // warn
  50: "ERROR",    // error
  60: "CRITICAL", // fatal
};

/** Emit severity-keyed JSON when nothing pretty-prints. */
const GCP_FORMAT = !IS_TEST && !transport;

export const rootLogger: Logger = pino({
  level,
  ...(transport ? { transport } : {}),
  ...(GCP_FORMAT ? { messageKey: "message" } : {}),
  base: { service: "chronicle" },
  timestamp: pino.stdTimeFunctions.isoTime,
  formatters: {
    ...(GCP_FORMAT
      ? {
          level(label: string, number: number) {
            return { severity: PINO_TO_GCP_SEVERITY[number] || label.toUpperCase(), level: number };
          },
        }
      : {}),
  },
  redact: {
    paths: [
      "apiKey", "*.apiKey", "**.apiKey",
      "token", "*.token", "**.token",
      "authorization", "*.authorization", "**.authorization",
      "req.headers.authorization",
      "req.headers.cookie",
    ],
    censor: "[REDACTED]",
  },
});

// ─── Subsystem Child Loggers ────────────────────────────────────

/**
 * Subsystem loggers — each adds a `subsystem` field to every log line.
 *
 * Usage: log.gemini.info("client online")
 *   → { level: 30, subsystem: "gemini", msg: "client online", ... }
 */
export const log = {
  /** Boot/startup sequence */
  boot: rootLogger.child({ subsystem: "boot" }),
  /** Gemini client + session construction */
  gemini: rootLogger.child({ subsystem: "gemini" }),
  /** Retry controller, transcript, registry */
  conversation: rootLogger.child({ subsystem: "conversation" }),
  /** HTTP/API layer */
  http: rootLogger.child({ subsystem: "http" }),
  /** Root logger (for one-off use) */
  root: rootLogger,
};

export type { Logger };
