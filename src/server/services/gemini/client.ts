/**
 * gemini/client.ts — Authenticated Gemini client
 *
 * Thin seam over @google/genai. The conversation core only sees
 * GeminiClient/UpstreamChat, which keeps the SDK out of the retry logic
 * and lets tests drive the controller with in-process fakes.
 *
 * One client per process; it is shared read-only by every conversation
 * and every session rebuild.
 */

import { GoogleGenAI, type Content, type GenerateContentConfig } from "@google/genai";
import { log } from "../../logger.js";
import { AuthError, classifyUpstreamError } from "./errors.js";

// ─── Types ────────────────────────────────────────────────────

export interface UpstreamChat {
  /**
   * Send one user message and yield the response as text deltas, in arrival
   * order. Failures surface as classified ChronicleErrors.
   */
  stream(text: string, signal?: AbortSignal): AsyncIterable<string>;
}

export interface GeminiClient {
  /** Bind a new upstream chat. Does not send anything. */
  createChat(model: string, systemInstruction: string, history: Content[]): UpstreamChat;
}

// ─── Implementation ───────────────────────────────────────────

/**
 * Build the authenticated client.
 *
 * The SDK does not contact the API on construction, so credentials are
 * only really proven on the first request (a 401/403 there is classified
 * as AuthError too).
 */
export function authenticate(apiKey: string | null | undefined): GeminiClient {
  if (!apiKey || !apiKey.trim()) {
    throw new AuthError("GEMINI_API_KEY is required — cannot create Gemini client without it");
  }

  let ai: GoogleGenAI;
  try {
    ai = new GoogleGenAI({ apiKey });
  } catch (err) {
    throw new AuthError(`Gemini client initialization failed: ${err instanceof Error ? err.message : String(err)}`, {
      cause: err,
    });
  }

  log.gemini.debug("client:ready");
  return createGeminiClient(ai);
}

/** Wrap an existing SDK instance. Exported for tests that mock the SDK. */
export function createGeminiClient(ai: GoogleGenAI): GeminiClient {
  return {
    createChat(model: string, systemInstruction: string, history: Content[]): UpstreamChat {
      const config: GenerateContentConfig = { systemInstruction };
      const chat = ai.chats.create({ model, config, history });

      return {
        async *stream(text: string, signal?: AbortSignal): AsyncIterable<string> {
          try {
            // A per-call config replaces the chat's config wholesale in the SDK,
            // so the system instruction has to travel with the abort signal.
            const response = await chat.sendMessageStream({
              message: text,
              ...(signal ? { config: { ...config, abortSignal: signal } } : {}),
            });
            for await (const chunk of response) {
              const delta = chunk.text;
              if (delta) yield delta;
            }
          } catch (err) {
            throw classifyUpstreamError(err);
          }
        },
      };
    },
  };
}
