/**
 * registry.ts — Conversation registry
 *
 * One controller per conversation id. Conversations never share a
 * transcript or a session; they share only the read-only Gemini client.
 *
 * - Idle conversations expire after 30 min (checked every 5 min)
 * - setModel() fans a model change out to every live conversation
 * - shutdown() aborts in-flight sends and backoff waits
 */

import { log } from "../logger.js";
import type { GeminiClient } from "../services/gemini/client.js";
import { requireModelId } from "../services/gemini/model-registry.js";
import {
  createConversationController,
  type ConversationConfig,
  type ConversationController,
  type Sleep,
} from "./controller.js";
import type { SessionFactory } from "./session-factory.js";

// ─── Constants ────────────────────────────────────────────────

/** Idle TTL: 30 minutes */
export const CONVERSATION_TTL_MS = 30 * 60 * 1000;
/** Cleanup interval: every 5 minutes */
const CLEANUP_INTERVAL_MS = 5 * 60 * 1000;

const CONVERSATION_ID_PATTERN = /^[a-zA-Z0-9_-]{1,200}$/;

export function isValidConversationId(id: string): boolean {
  return CONVERSATION_ID_PATTERN.test(id);
}

// ─── Types ────────────────────────────────────────────────────

export interface ConversationRegistryOptions {
  client: GeminiClient | null;
  config: ConversationConfig;
  sessionFactory?: SessionFactory;
  sleep?: Sleep;
  /** Run the periodic idle sweep (default: off under test). */
  autoCleanup?: boolean;
  now?: () => number;
}

export interface ConversationRegistry {
  /** Controller for `id`, created on first use. */
  get(id: string): ConversationController;
  /** Controller for `id` if it exists. */
  peek(id: string): ConversationController | undefined;
  /** Cancel in-flight work and forget the conversation. */
  close(id: string): boolean;
  size(): number;
  hasClient(): boolean;
  getModel(): string;
  /** Validate and apply a model to every live and future conversation. */
  setModel(modelName: string): Promise<void>;
  /** Drop conversations idle for longer than the TTL. Returns how many. */
  sweep(): number;
  /** Abort everything in flight and clear. Call on process shutdown. */
  shutdown(): void;
}

// ─── Implementation ───────────────────────────────────────────

export function createConversationRegistry(options: ConversationRegistryOptions): ConversationRegistry {
  const config: ConversationConfig = { ...options.config };
  const now = options.now ?? Date.now;
  const conversations = new Map<string, ConversationController>();

  const isTest = process.env.NODE_ENV === "test" || process.env.VITEST === "true";
  const autoCleanup = options.autoCleanup ?? !isTest;
  const cleanupTimer = autoCleanup ? setInterval(() => registry.sweep(), CLEANUP_INTERVAL_MS) : null;
  // Don't keep the process alive just for cleanup
  cleanupTimer?.unref();

  const registry: ConversationRegistry = {
    get(id: string): ConversationController {
      let controller = conversations.get(id);
      if (!controller) {
        controller = createConversationController({
          id,
          client: options.client,
          config,
          sessionFactory: options.sessionFactory,
          sleep: options.sleep,
        });
        conversations.set(id, controller);
        log.conversation.debug({ conversationId: id, total: conversations.size }, "conversation:create");
      }
      return controller;
    },

    peek(id: string): ConversationController | undefined {
      return conversations.get(id);
    },

    close(id: string): boolean {
      const controller = conversations.get(id);
      if (!controller) return false;
      controller.cancel();
      conversations.delete(id);
      log.conversation.debug({ conversationId: id, remaining: conversations.size }, "conversation:close");
      return true;
    },

    size(): number {
      return conversations.size;
    },

    hasClient(): boolean {
      return options.client !== null;
    },

    getModel(): string {
      return config.modelName;
    },

    async setModel(modelName: string): Promise<void> {
      requireModelId(modelName);
      const previousModel = config.modelName;
      config.modelName = modelName;
      await Promise.all([...conversations.values()].map((c) => c.changeModel(modelName)));
      if (previousModel !== modelName) {
        log.conversation.info({ previousModel, newModel: modelName, conversations: conversations.size }, "registry:model-switch");
      }
    },

    sweep(): number {
      const cutoff = now() - CONVERSATION_TTL_MS;
      let cleaned = 0;
      for (const [id, controller] of conversations) {
        const busy = controller.getState() === "sending" || controller.getState() === "rate_limited";
        if (!busy && controller.lastAccess() < cutoff) {
          conversations.delete(id);
          cleaned++;
        }
      }
      if (cleaned > 0) {
        log.conversation.debug({ cleaned, remaining: conversations.size }, "conversation:cleanup");
      }
      return cleaned;
    },

    shutdown(): void {
      if (cleanupTimer) clearInterval(cleanupTimer);
      for (const controller of conversations.values()) {
        controller.cancel();
      }
      conversations.clear();
      log.conversation.debug("registry:shutdown");
    },
  };

  return registry;
}
