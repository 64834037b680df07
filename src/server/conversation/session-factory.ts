/**
 * session-factory.ts — Session Factory
 *
 * Binds a brand-new upstream chat to one (model, system instruction, seed
 * history) triple. The seed is loaded as prior turns so the model keeps
 * continuity without those turns being resent as new messages.
 *
 * Failures are SessionInitError and are never retried here — the caller
 * decides what a failed construction means for the current operation.
 */

import type { Content } from "@google/genai";
import { log } from "../logger.js";
import type { GeminiClient, UpstreamChat } from "../services/gemini/client.js";
import { SessionInitError } from "../services/gemini/errors.js";
import { MODEL_REGISTRY_MAP } from "../services/gemini/model-registry.js";
import type { Turn } from "./transcript.js";

export interface SessionBinding {
  readonly modelName: string;
  readonly systemInstruction: string;
  readonly seedHistory: readonly Turn[];
}

export interface ChatSession {
  readonly binding: SessionBinding;
  /** Stream the reply to `text` as ordered text deltas. */
  sendMessage(text: string, signal?: AbortSignal): AsyncIterable<string>;
}

export interface SessionFactory {
  create(
    client: GeminiClient | null,
    systemInstruction: string,
    modelName: string,
    seedHistory: readonly Turn[],
  ): ChatSession;
}

/** Convert transcript turns to SDK Content[] format. */
export function toSdkHistory(turns: readonly Turn[]): Content[] {
  return turns.map((t) => ({
    role: t.role,
    parts: [{ text: t.text }],
  }));
}

function bindChat(
  client: GeminiClient,
  modelName: string,
  systemInstruction: string,
  seed: readonly Turn[],
): UpstreamChat {
  try {
    return client.createChat(modelName, systemInstruction, toSdkHistory(seed));
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    log.gemini.error({ model: modelName, err: message }, "session:create failed");
    throw new SessionInitError(`Chat session initialization failed: ${message}`, { cause: err });
  }
}

export function createSessionFactory(): SessionFactory {
  return {
    create(client, systemInstruction, modelName, seedHistory): ChatSession {
      if (!client) {
        throw new SessionInitError("No authenticated Gemini client — configure GEMINI_API_KEY");
      }
      if (!MODEL_REGISTRY_MAP.has(modelName)) {
        throw new SessionInitError(`Unsupported model: ${modelName}`);
      }

      const seed = Object.freeze([...seedHistory]);
      const chat = bindChat(client, modelName, systemInstruction, seed);

      log.gemini.debug({ model: modelName, seedLen: seed.length }, "session:create");

      const binding: SessionBinding = Object.freeze({ modelName, systemInstruction, seedHistory: seed });
      return {
        binding,
        sendMessage(text: string, signal?: AbortSignal): AsyncIterable<string> {
          return chat.stream(text, signal);
        },
      };
    },
  };
}
