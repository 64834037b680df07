/**
 * app-context.ts — Shared state type for the Chronicle server.
 *
 * Lives apart from index.ts so route modules can import it without a
 * circular dependency on the app factory.
 */

import type { ConversationRegistry } from "./conversation/registry.js";
import type { AppConfig } from "./config.js";

// ─── App State ──────────────────────────────────────────────────

export interface AppState {
  /** Null until boot finishes. Its client is null when no API key is configured. */
  conversations: ConversationRegistry | null;
  /** Why chat is unavailable, for /api/health and 503 responses. */
  geminiStatus: "connected" | "not configured" | "auth failed";
  startupComplete: boolean;
  config: AppConfig;
}
