/**
 * routes/chat.ts — Chat stream, history, reset and export routes.
 *
 * The conversation is picked by the X-Conversation-Id header (default
 * "default"). POST /api/chat answers with an SSE stream:
 *
 *   event: partial  data: { text }              — full response so far
 *   event: notice   data: { level, kind, ... }  — rate-limit warnings, errors, reset
 *   event: done     data: SendOutcome           — exactly once, last
 */

import type { Request, Response, Router } from "express";
import type { AppState } from "../app-context.js";
import type { ConversationRegistry } from "../conversation/registry.js";
import { isValidConversationId } from "../conversation/registry.js";
import { exportFilename, transcriptToCsv } from "../conversation/export.js";
import { log } from "../logger.js";
import { sendOk, sendFail, ErrorCode } from "../envelope.js";
import { createSafeRouter } from "../safe-router.js";
import { chatRateLimiter } from "../rate-limit.js";
import { openEventStream } from "../sse.js";

export const MAX_MESSAGE_LENGTH = 10_000;
const DEFAULT_CONVERSATION_ID = "default";

/** Conversation id from the header, or null when malformed. */
function readConversationId(req: Request): string | null {
  const header = req.headers["x-conversation-id"];
  const id = typeof header === "string" && header.length > 0 ? header : DEFAULT_CONVERSATION_ID;
  return isValidConversationId(id) ? id : null;
}

function requireRegistry(appState: AppState, res: Response): ConversationRegistry | null {
  if (!appState.conversations) {
    sendFail(res, ErrorCode.GEMINI_NOT_READY, "Chat not ready", 503, {
      detail: { reason: "initializing" },
      hints: ["Check /api/health for status", "Retry in 2-3 seconds"],
    });
    return null;
  }
  return appState.conversations;
}

export function createChatRoutes(appState: AppState): Router {
  const router = createSafeRouter();

  // ─── Chat (SSE) ─────────────────────────────────────────────

  router.post("/api/chat", chatRateLimiter, async (req, res) => {
    const conversationId = readConversationId(req);
    if (!conversationId) {
      return sendFail(res, ErrorCode.INVALID_PARAM, "Invalid conversation ID", 400);
    }

    const message: unknown = req.body?.message;
    if (typeof message !== "string" || message.length === 0) {
      return sendFail(res, ErrorCode.MISSING_PARAM, "Missing 'message' in request body", 400, {
        hints: ["Send JSON body: { \"message\": \"your question\" }"],
      });
    }
    if (!message.trim()) {
      return sendFail(res, ErrorCode.INVALID_PARAM, "Message must not be blank", 400);
    }
    if (message.length > MAX_MESSAGE_LENGTH) {
      return sendFail(res, ErrorCode.INVALID_PARAM, "Message must be 10,000 characters or fewer", 400);
    }

    const registry = requireRegistry(appState, res);
    if (!registry) return;
    if (!registry.hasClient()) {
      return sendFail(res, ErrorCode.GEMINI_NOT_READY, "Gemini not ready", 503, {
        detail: { reason: appState.geminiStatus },
        hints: ["Set GEMINI_API_KEY and restart", "Check /api/health for status"],
      });
    }

    const controller = registry.get(conversationId);
    const stream = openEventStream(res);

    // Client went away: abort between chunks / during backoff.
    const abort = new AbortController();
    res.on("close", () => {
      if (!res.writableEnded) abort.abort();
    });

    log.http.debug({ conversationId, messageLen: message.length }, "chat:stream");
    const outcome = await controller.sendWithRecovery(message, {
      signal: abort.signal,
      onPartial: (text) => stream.send("partial", { text }),
      onNotice: (notice) => stream.send("notice", notice),
    });

    stream.send("done", outcome);
    stream.end();
  });

  // ─── History ────────────────────────────────────────────────

  router.get("/api/history", (req, res) => {
    const conversationId = readConversationId(req);
    if (!conversationId) {
      return sendFail(res, ErrorCode.INVALID_PARAM, "Invalid conversation ID", 400);
    }
    const controller = appState.conversations?.peek(conversationId);
    sendOk(res, {
      conversationId,
      model: controller?.getModel() ?? appState.conversations?.getModel() ?? appState.config.modelName,
      turns: controller?.snapshot() ?? [],
    });
  });

  // ─── Reset ──────────────────────────────────────────────────

  router.post("/api/chat/reset", async (req, res) => {
    const conversationId = readConversationId(req);
    if (!conversationId) {
      return sendFail(res, ErrorCode.INVALID_PARAM, "Invalid conversation ID", 400);
    }
    const registry = requireRegistry(appState, res);
    if (!registry) return;

    const outcome = await registry.get(conversationId).reset();
    sendOk(res, { conversationId, ...outcome });
  });

  // ─── Close ──────────────────────────────────────────────────

  router.delete("/api/conversations/:id", (req, res) => {
    const conversationId = req.params.id;
    if (!isValidConversationId(conversationId)) {
      return sendFail(res, ErrorCode.INVALID_PARAM, "Invalid conversation ID", 400);
    }
    const registry = requireRegistry(appState, res);
    if (!registry) return;

    if (!registry.close(conversationId)) {
      return sendFail(res, ErrorCode.NOT_FOUND, `Conversation not found: ${conversationId}`, 404);
    }
    sendOk(res, { conversationId, closed: true });
  });

  // ─── Export ─────────────────────────────────────────────────

  router.get("/api/history/export", (req, res) => {
    const conversationId = readConversationId(req);
    if (!conversationId) {
      return sendFail(res, ErrorCode.INVALID_PARAM, "Invalid conversation ID", 400);
    }
    const turns = appState.conversations?.peek(conversationId)?.snapshot() ?? [];
    if (turns.length === 0) {
      return sendFail(res, ErrorCode.NOT_FOUND, "No conversation history to export", 404);
    }

    res.setHeader("Content-Type", "text/csv; charset=utf-8");
    res.setHeader("Content-Disposition", `attachment; filename="${exportFilename()}"`);
    res.status(200).send(transcriptToCsv(turns));
  });

  return router.router;
}
