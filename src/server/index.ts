/**
 * index.ts — Chronicle Express Server (thin shell)
 *
 * Chronicle — conversational history guide
 *
 * This file is the minimal app factory + boot sequence.
 * Route handlers live in src/server/routes/*.ts.
 *
 * Endpoints:
 *   GET    /api                    — API discovery manifest
 *   GET    /api/health             — Status check
 *   GET    /api/models             — Model list + current selection
 *   PUT    /api/model              — Switch model
 *   POST   /api/chat               — Send message, SSE response stream
 *   GET    /api/history            — Committed turns
 *   POST   /api/chat/reset         — Clear + fresh session
 *   GET    /api/history/export     — CSV download
 *   DELETE /api/conversations/:id  — Forget a conversation
 */

import express from "express";
import type { Server } from "node:http";
import { pinoHttp } from "pino-http";
import { log, rootLogger } from "./logger.js";
import { type AppState } from "./app-context.js";
import { bootstrapConfigSync, toConversationConfig } from "./config.js";
import { envelopeMiddleware, errorHandler, sendFail, ErrorCode } from "./envelope.js";
import { globalRateLimiter } from "./rate-limit.js";
import { authenticate, AuthError, type GeminiClient } from "./services/gemini/index.js";
import { createConversationRegistry } from "./conversation/registry.js";

// Route modules
import { createCoreRoutes } from "./routes/core.js";
import { createChatRoutes } from "./routes/chat.js";

export type { AppState };

/** Header every state-changing /api request must carry. */
export const CSRF_HEADER_VALUE = "chronicle-client";

// ─── Module-level state ─────────────────────────────────────────
const state: AppState = {
  conversations: null,
  geminiStatus: "not configured",
  startupComplete: false,
  config: bootstrapConfigSync(),
};

let server: Server | null = null;

// ─── App Factory ────────────────────────────────────────────────
export function createApp(appState: AppState): express.Express {
  const app = express();

  // Trust exactly one proxy hop
  app.set("trust proxy", 1);

  // requestId + timing on every request; before the body parser so
  // parse errors still carry a request id
  app.use(envelopeMiddleware);

  app.use(express.json({ limit: "100kb" }));

  // No compression middleware: it buffers the SSE chat stream.

  app.use(
    pinoHttp({
      logger: rootLogger,
      autoLogging: {
        ignore: (req) => (req.url || "").startsWith("/api/health"),
      },
    }),
  );

  // CSRF protection — require custom header on state-changing requests.
  // X-Requested-With cannot be set cross-origin without CORS preflight.
  app.use("/api", (req, res, next) => {
    if (["GET", "HEAD", "OPTIONS"].includes(req.method)) return next();
    if (req.headers["x-requested-with"] !== CSRF_HEADER_VALUE) {
      return sendFail(res, ErrorCode.FORBIDDEN, "Missing CSRF header", 403);
    }
    next();
  });

  app.use("/api", globalRateLimiter);

  // ─── Mount route modules ──────────────────────────────────
  app.use(createCoreRoutes(appState));
  app.use(createChatRoutes(appState));

  app.use("/api", (_req, res) => {
    sendFail(res, ErrorCode.NOT_FOUND, "Unknown API endpoint", 404, {
      hints: ["GET /api lists every endpoint"],
    });
  });

  // ─── Error handler (catch-all → envelope) ─────────────────
  app.use(errorHandler);

  return app;
}

// ─── Startup ────────────────────────────────────────────────────

/** Authenticate once; a missing or rejected key leaves chat disabled. */
function connectGemini(appState: AppState): GeminiClient | null {
  const { geminiApiKey } = appState.config;
  if (!geminiApiKey) {
    log.boot.warn("GEMINI_API_KEY not set — chat disabled");
    appState.geminiStatus = "not configured";
    return null;
  }
  try {
    const client = authenticate(geminiApiKey);
    appState.geminiStatus = "connected";
    return client;
  } catch (err) {
    if (!(err instanceof AuthError)) throw err;
    log.boot.error({ err: err.message }, "gemini authentication failed — chat disabled");
    appState.geminiStatus = "auth failed";
    return null;
  }
}

async function boot(): Promise<void> {
  log.boot.info("Chronicle initializing");

  // Start listening first so /api/health can report "initializing"
  const app = createApp(state);
  server = app.listen(state.config.port, () => {
    log.boot.info({ port: state.config.port, url: `http://localhost:${state.config.port}` }, "Chronicle online");
  });

  const client = connectGemini(state);
  state.conversations = createConversationRegistry({
    client,
    config: toConversationConfig(state.config),
  });
  log.boot.info(
    {
      gemini: state.geminiStatus,
      model: state.config.modelName,
      historyLimit: state.config.historyLimit,
      maxAttempts: state.config.maxAttempts,
      backoffUnitMs: state.config.backoffUnitMs,
      logLevel: rootLogger.level,
    },
    "conversation registry online",
  );

  state.startupComplete = true;
}

// ─── Graceful Shutdown ──────────────────────────────────────────
function shutdown(): void {
  log.boot.info("Chronicle offline.");
  state.conversations?.shutdown();
  if (!server) {
    process.exit(0);
  }
  server.close((err) => {
    if (err) log.boot.error({ err: err.message }, "server close failed");
    process.exit(err ? 1 : 0);
  });
}

// ─── Launch (guarded for test imports) ──────────────────────────
if (!state.config.isTest) {
  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);
  boot().catch((err: unknown) => {
    log.boot.fatal({ err: err instanceof Error ? err.message : String(err) }, "fatal startup error");
    process.exit(1);
  });
}
