/**
 * routes/core.ts — Core infrastructure routes.
 *
 * Health, API discovery, and model selection.
 */

import type { Router } from "express";
import { readFileSync } from "node:fs";
import { resolve, dirname } from "node:path";
import { fileURLToPath } from "node:url";
import type { AppState } from "../app-context.js";
import { log } from "../logger.js";
import { sendOk, sendFail, ErrorCode } from "../envelope.js";
import { createSafeRouter } from "../safe-router.js";
import { MODEL_REGISTRY, getModelDef } from "../services/gemini/index.js";

const __dirname = dirname(fileURLToPath(import.meta.url));

function readVersion(): string {
  try {
    const pkg: unknown = JSON.parse(readFileSync(resolve(__dirname, "../../../package.json"), "utf-8"));
    if (typeof pkg === "object" && pkg !== null && "version" in pkg && typeof pkg.version === "string") {
      return pkg.version;
    }
  } catch (err) {
    log.root.debug({ err: err instanceof Error ? err.message : String(err) }, "package.json unreadable");
  }
  return "unknown";
}

const APP_VERSION = readVersion();

export interface HealthResponse {
  status: "online" | "initializing";
  version: string;
  retryAfterMs?: number;
  gemini: AppState["geminiStatus"];
  model: string;
  conversations: number;
}

interface DiscoveryEndpoint {
  method: string;
  path: string;
  description: string;
  body?: Record<string, string>;
  headers?: Record<string, string>;
}

const CONVERSATION_HEADER = { "X-Conversation-Id": "string (optional, default \"default\")" };

// CANONICAL ROUTE LIST — update this when adding/removing routes.
const ENDPOINTS: DiscoveryEndpoint[] = [
  { method: "GET", path: "/api", description: "API discovery (this endpoint)" },
  { method: "GET", path: "/api/health", description: "Fast health check (returns retryAfterMs when initializing)" },
  { method: "GET", path: "/api/models", description: "Available models and the current selection" },
  { method: "PUT", path: "/api/model", description: "Switch the model for every conversation", body: { model: "string (required)" } },
  { method: "POST", path: "/api/chat", description: "Send a message; SSE stream of partial, notice and done events", body: { message: "string (required, ≤ 10000 chars)" }, headers: CONVERSATION_HEADER },
  { method: "GET", path: "/api/history", description: "Committed turns of a conversation", headers: CONVERSATION_HEADER },
  { method: "POST", path: "/api/chat/reset", description: "Clear history and start a fresh session", headers: CONVERSATION_HEADER },
  { method: "GET", path: "/api/history/export", description: "Download history as CSV", headers: CONVERSATION_HEADER },
  { method: "DELETE", path: "/api/conversations/:id", description: "Cancel and forget a conversation" },
];

export function createCoreRoutes(appState: AppState): Router {
  const router = createSafeRouter();

  // ─── Health ─────────────────────────────────────────────────

  router.get("/api/health", (_req, res) => {
    const registry = appState.conversations;
    if (!appState.startupComplete) {
      res.setHeader("Retry-After", "2");
    }

    const health: HealthResponse = {
      status: appState.startupComplete ? "online" : "initializing",
      version: APP_VERSION,
      ...(!appState.startupComplete ? { retryAfterMs: 2000 } : {}),
      gemini: appState.geminiStatus,
      model: registry?.getModel() ?? appState.config.modelName,
      conversations: registry?.size() ?? 0,
    };

    sendOk(res, health, appState.startupComplete ? 200 : 503);
  });

  // ─── API Discovery ──────────────────────────────────────────

  router.get("/api", (_req, res) => {
    sendOk(res, {
      name: "Chronicle",
      version: APP_VERSION,
      csrfHeader: { "X-Requested-With": "chronicle-client" },
      endpoints: ENDPOINTS,
    });
  });

  // ─── Models ─────────────────────────────────────────────────

  router.get("/api/models", (_req, res) => {
    const current = appState.conversations?.getModel() ?? appState.config.modelName;
    sendOk(res, {
      current,
      models: MODEL_REGISTRY.map((m) => ({ ...m, active: m.id === current })),
    });
  });

  router.put("/api/model", async (req, res) => {
    const model: unknown = req.body?.model;
    if (typeof model !== "string" || !model.trim()) {
      return sendFail(res, ErrorCode.MISSING_PARAM, "Missing 'model' in request body", 400, {
        hints: ["GET /api/models lists valid ids"],
      });
    }
    const def = getModelDef(model);
    if (!def) {
      return sendFail(res, ErrorCode.UNKNOWN_MODEL, `Unknown model: ${model}`, 400, {
        detail: { validModels: MODEL_REGISTRY.map((m) => m.id) },
      });
    }

    const previousModel = appState.conversations?.getModel() ?? appState.config.modelName;
    if (appState.conversations) {
      await appState.conversations.setModel(def.id);
    }
    appState.config = { ...appState.config, modelName: def.id };

    log.gemini.info({ previousModel, newModel: def.id }, "model:select");
    sendOk(res, { previousModel, model: def });
  });

  return router.router;
}
